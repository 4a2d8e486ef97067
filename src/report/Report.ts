import { codeFrameColumns } from "@babel/code-frame";
import { Token } from "../token";
import { Parse, ParseData, ParseError, ResultType } from "../result";

/**
 * class Report
 *
 * Stores a recap of a top-level parse.
 */

export class Report<T> {
  readonly tokens: ReadonlyArray<Token<T>>;
  readonly parse: Parse<T>;

  constructor(tokens: ReadonlyArray<Token<T>>, parse: Parse<T>) {
    this.tokens = tokens;
    this.parse = parse;
  }

  get success() {
    return this.parse.data.type !== ResultType.Err;
  }

  get complete() {
    return this.success && this.parse.to === this.tokens.length;
  }

  get data(): ParseData<T> | null {
    return this.parse.data.type === ResultType.Ok ? this.parse.data.data : null;
  }

  get error(): ParseError | null {
    return this.parse.data.type === ResultType.Err
      ? this.parse.data.error
      : null;
  }

  /**
   * Stringifies the failure, with a code frame when the source text is given
   * @param source
   */

  log(source?: string) {
    const error = this.error;
    if (!error) return "";
    const message = error.toString();
    if (source === undefined) return message;
    const { line, colStart, colEnd } = error.span;
    return [
      message,
      codeFrameColumns(source, {
        start: { line, column: colStart },
        end: { line, column: colEnd + 1 }
      })
    ].join("\n");
  }
}
