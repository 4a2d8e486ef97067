import { Span } from "../token";
import { ParseData, ParseError } from "../result";

// Trace events

export enum TraceEventType {
  Enter = "ENTER",
  Match = "MATCH",
  Fail = "FAIL",
  Skip = "SKIP"
}

export type TraceEvent<T = unknown> =
  | EnterEvent
  | MatchEvent<T>
  | FailEvent
  | SkipEvent;

export interface EnterEvent extends TraceCommon {
  type: TraceEventType.Enter;
}

export interface MatchEvent<T = unknown> extends TraceCommon {
  type: TraceEventType.Match;
  to: number;
  data: ParseData<T>;
}

export interface FailEvent extends TraceCommon {
  type: TraceEventType.Fail;
  error: ParseError;
}

export interface SkipEvent extends TraceCommon {
  type: TraceEventType.Skip;
}

export interface TraceCommon {
  rule: string;
  offset: number;
  at: Span;
}

// Tracer signature

export type Tracer<T = unknown> = (event: TraceEvent<T>) => void;

/**
 * Formats a trace event as a single human-readable line
 * @param event
 */

export function traceToString(event: TraceEvent<unknown>) {
  switch (event.type) {
    case TraceEventType.Enter:
      return `Entered "${event.rule}" at (${event.at})`;
    case TraceEventType.Match:
      return `Matched "${event.rule}" from ${event.offset} to ${event.to}`;
    case TraceEventType.Fail:
      return `Failed "${event.rule}" at (${event.error.span})`;
    case TraceEventType.Skip:
      return `Skipped "${event.rule}" at (${event.at})`;
  }
}

/**
 * A predefined tracer to quickly debug a grammar
 * @param event
 */

export const consoleTracer: Tracer = event => {
  console.log(traceToString(event));
};
