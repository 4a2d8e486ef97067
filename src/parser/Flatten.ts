import { ok, Parse, ResultType, tokenList, tokensOf } from "../result";
import { Context } from "./Context";
import { Parser } from "./Parser";

/**
 * class Flatten
 *
 * Collapses whatever its child matched into a flat token list. Failures and
 * misses of the child pass through under this label.
 */

export class Flatten<T> extends Parser<T> {
  readonly parser: Parser<T>;

  constructor(label: string, parser: Parser<T>) {
    super(label, false);
    this.parser = parser;
  }

  _parse(context: Context<T>, offset: number) {
    const parse = this.parser.parse(context, offset);
    if (parse.data.type !== ResultType.Ok)
      return new Parse<T>(this.label, parse.data, parse.from, parse.to);
    return new Parse<T>(
      this.label,
      ok(tokenList(tokensOf(parse.data.data))),
      parse.from,
      parse.to
    );
  }
}
