import { cloneDeep } from "lodash";
import { Span } from "./Span";

/**
 * class Token
 *
 * A lexical unit produced by an external lexer. T is the caller's token type.
 */

export class Token<T> {
  readonly type: T;
  readonly span: Span;

  constructor(type: T, span: Span) {
    this.type = type;
    this.span = span;
  }

  spanSize() {
    return this.span.colEnd - this.span.colStart + 1;
  }

  clone() {
    return new Token<T>(cloneDeep(this.type), this.span);
  }
}
