import { Span, Token } from "../token";
import { nested, ParseError } from "../result";
import { choice, ofType } from "../parser";
import { consoleTracer, TraceEvent, TraceEventType, traceToString } from ".";

const input = [
  new Token("Id", new Span(1, 1, 2)),
  new Token("Eq", new Span(1, 4, 4))
];

test("Tracers should see every rule entered and its outcome", () => {
  const events: TraceEvent<string>[] = [];
  const either = choice<string>("either", [
    ofType("eq", "Eq"),
    ofType("id", "Id")
  ]);
  either.run(input, { tracer: event => events.push(event) });
  expect(events.map(({ type, rule }) => `${type} ${rule}`)).toEqual([
    "ENTER either",
    "ENTER eq",
    "FAIL eq",
    "ENTER id",
    "MATCH id",
    "MATCH either"
  ]);
  const last = events[events.length - 1];
  expect(last.type === TraceEventType.Match && last.to).toBe(1);
});

test("Tracers should report skipped optional rules", () => {
  const tracer = jest.fn();
  ofType<string>("eq", "Eq", true).run([], { tracer });
  expect(tracer).toHaveBeenCalledTimes(2);
  expect(tracer).toHaveBeenLastCalledWith({
    type: TraceEventType.Skip,
    rule: "eq",
    offset: 0,
    at: Span.default()
  });
});

test("Trace events should stringify to one line", () => {
  const at = new Span(2, 3, 5);
  expect(
    traceToString({ type: TraceEventType.Enter, rule: "item", offset: 4, at })
  ).toBe('Entered "item" at (2:3-5)');
  expect(
    traceToString({
      type: TraceEventType.Match,
      rule: "item",
      offset: 4,
      at,
      to: 7,
      data: nested([])
    })
  ).toBe('Matched "item" from 4 to 7');
  expect(
    traceToString({
      type: TraceEventType.Fail,
      rule: "item",
      offset: 4,
      at,
      error: new ParseError("=", new Span(2, 7, 7))
    })
  ).toBe('Failed "item" at (2:7-7)');
  expect(
    traceToString({ type: TraceEventType.Skip, rule: "item", offset: 4, at })
  ).toBe('Skipped "item" at (2:3-5)');
});

test("The console tracer should log each event", () => {
  const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
  try {
    ofType<string>("id", "Id").run(input, { tracer: consoleTracer });
    expect(log.mock.calls).toEqual([
      ['Entered "id" at (1:1-2)'],
      ['Matched "id" from 0 to 1']
    ]);
  } finally {
    log.mockRestore();
  }
});
