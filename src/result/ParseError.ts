import { Span } from "../token";

export const syntaxError = "Syntax error";
export const endOfInput = "Unexpected end of input";
export const unexpectedMatch = "Unexpected match";

/**
 * class ParseError
 *
 * Names the rule that failed to match and where. Parse errors are values
 * carried by results, they are never thrown.
 */

export class ParseError {
  readonly expected: string;
  readonly span: Span;
  readonly message: string;

  constructor(expected: string, span: Span, message: string = syntaxError) {
    this.expected = expected;
    this.span = span;
    this.message = message;
  }

  toString() {
    const { line, colStart } = this.span;
    return `(${line}:${colStart}) ${this.message}, expected ${this.expected}`;
  }
}
