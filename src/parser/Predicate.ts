import { Token } from "../token";
import { err, ok, Parse, ParseError, single } from "../result";
import { Context } from "./Context";
import { Parser } from "./Parser";
import { TokenTest } from "./types";

/**
 * class Predicate
 *
 * Matches one token whose type passes a test, such as "any identifier".
 * A mismatch consumes nothing, as with OfType.
 */

export class Predicate<T> extends Parser<T> {
  readonly matches: TokenTest<T>;

  constructor(label: string, optional: boolean, test: TokenTest<T>) {
    super(label, optional);
    this.matches = test;
  }

  _parse(context: Context<T>, offset: number) {
    const token = context.required(this.label, offset, this.optional);
    if (!(token instanceof Token))
      return new Parse<T>(this.label, token, offset, offset);
    if (this.matches(token.type))
      return new Parse(
        this.label,
        ok(single(token.clone())),
        offset,
        offset + 1
      );
    return new Parse<T>(
      this.label,
      err(new ParseError(this.label, token.span)),
      offset,
      offset
    );
  }
}
