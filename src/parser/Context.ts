import { last } from "lodash";
import { Span, Token } from "../token";
import { endOfInput, err, none, ParseError, ParseResult } from "../result";
import { TraceEvent, Tracer } from "../utility";

/**
 * class Context
 *
 * Read-only view over the tokens of a single top-level parse.
 */

export class Context<T> {
  private readonly tokens: ReadonlyArray<Token<T>>;
  private readonly tracer: Tracer<T> | null;

  constructor(
    tokens: ReadonlyArray<Token<T>>,
    tracer: Tracer<T> | null = null
  ) {
    this.tokens = tokens;
    this.tracer = tracer;
  }

  get length() {
    return this.tokens.length;
  }

  get(index: number): Token<T> | undefined {
    return this.tokens[index];
  }

  /**
   * Returns the token at index, or the result a rule labelled "label" should
   * report when input ends there
   */

  required(
    label: string,
    index: number,
    optional: boolean
  ): Token<T> | ParseResult<T> {
    const token = this.get(index);
    if (token) return token;
    return optional
      ? none()
      : err(new ParseError(label, this.spanLast(), endOfInput));
  }

  spanLast() {
    return last(this.tokens)?.span ?? Span.default();
  }

  spanAt(index: number) {
    return this.get(index)?.span ?? this.spanLast();
  }

  get tracing() {
    return this.tracer !== null;
  }

  trace(event: TraceEvent<T>) {
    this.tracer?.(event);
  }
}
