import { Token } from "../token";
import { Parse, ResultType } from "../result";
import { Report } from "../report";
import { TraceEventType } from "../utility";
import { Context } from "./Context";
import { defaultRunOptions } from "./misc";
import { RunOptions } from "./types";

/**
 * class Parser
 *
 * Base of every combinator. Implementations override _parse, callers go
 * through parse so that tracing sees every invocation.
 */

export abstract class Parser<T> {
  readonly label: string;
  readonly optional: boolean;

  protected constructor(label: string, optional: boolean) {
    this.label = label;
    this.optional = optional;
  }

  run(tokens: ReadonlyArray<Token<T>>, options?: Partial<RunOptions<T>>) {
    const opts: RunOptions<T> = { ...defaultRunOptions<T>(), ...options };
    const context = new Context(tokens, opts.tracer);
    return new Report(tokens, this.parse(context, 0));
  }

  test(tokens: ReadonlyArray<Token<T>>) {
    return !this.run(tokens).parse.isErr();
  }

  parse(context: Context<T>, offset: number): Parse<T> {
    if (!context.tracing) return this._parse(context, offset);
    const at = context.spanAt(offset);
    context.trace({ type: TraceEventType.Enter, rule: this.label, offset, at });
    const parse = this._parse(context, offset);
    switch (parse.data.type) {
      case ResultType.Ok:
        context.trace({
          type: TraceEventType.Match,
          rule: this.label,
          offset,
          at,
          to: parse.to,
          data: parse.data.data
        });
        break;
      case ResultType.Err:
        context.trace({
          type: TraceEventType.Fail,
          rule: this.label,
          offset,
          at,
          error: parse.data.error
        });
        break;
      case ResultType.None:
        context.trace({
          type: TraceEventType.Skip,
          rule: this.label,
          offset,
          at
        });
        break;
    }
    return parse;
  }

  abstract _parse(context: Context<T>, offset: number): Parse<T>;
}
