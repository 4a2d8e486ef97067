import { isEqual } from "lodash";
import { Token } from "../token";
import { err, ok, Parse, ParseError, single } from "../result";
import { Context } from "./Context";
import { Parser } from "./Parser";

/**
 * class OfType
 *
 * Matches one token whose type is equal by value to a fixed type.
 */

export class OfType<T> extends Parser<T> {
  readonly type: T;

  constructor(label: string, optional: boolean, type: T) {
    super(label, optional);
    this.type = type;
  }

  _parse(context: Context<T>, offset: number) {
    const token = context.required(this.label, offset, this.optional);
    if (!(token instanceof Token))
      return new Parse<T>(this.label, token, offset, offset);
    if (isEqual(token.type, this.type))
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
