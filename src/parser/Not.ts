import { GrammarError } from "../internals";
import {
  err,
  firstToken,
  none,
  Parse,
  ParseError,
  ResultType,
  unexpectedMatch
} from "../result";
import { Context } from "./Context";
import { Parser } from "./Parser";

/**
 * class Not
 *
 * Negative lookahead. Fails where its child matches, otherwise reports no
 * match. Never consumes input and never yields data.
 */

export class Not<T> extends Parser<T> {
  readonly parser: Parser<T>;

  constructor(label: string, optional: boolean, parser: Parser<T>) {
    super(label, optional);
    this.parser = parser;
  }

  _parse(context: Context<T>, offset: number) {
    const parse = this.parser.parse(context, offset);
    if (parse.data.type !== ResultType.Ok || this.optional)
      return new Parse<T>(this.label, none(), offset, offset);
    const token = firstToken(parse.data.data);
    if (!token)
      throw new GrammarError(
        this.label,
        `child "${parse.label}" matched without yielding a token`
      );
    return new Parse<T>(
      this.label,
      err(new ParseError(this.label, token.span, unexpectedMatch)),
      offset,
      offset
    );
  }
}
