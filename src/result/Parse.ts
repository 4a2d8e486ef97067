import { ErrResult, NoneResult, OkResult, ParseResult, ResultType } from ".";

/**
 * class Parse
 *
 * The outcome of one parser invocation over the token range [from, to).
 */

export class Parse<T> {
  readonly label: string;
  readonly data: ParseResult<T>;
  readonly from: number;
  readonly to: number;

  constructor(label: string, data: ParseResult<T>, from: number, to: number) {
    this.label = label;
    this.data = data;
    this.from = from;
    this.to = to;
  }

  size() {
    return this.to - this.from;
  }

  isOk(): this is Parse<T> & { data: OkResult<T> } {
    return this.data.type === ResultType.Ok;
  }

  isErr(): this is Parse<T> & { data: ErrResult } {
    return this.data.type === ResultType.Err;
  }

  isNone(): this is Parse<T> & { data: NoneResult } {
    return this.data.type === ResultType.None;
  }
}
