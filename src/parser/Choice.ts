import { err, none, Parse, ParseError } from "../result";
import { Context } from "./Context";
import { Parser } from "./Parser";

/**
 * class Choice
 *
 * Ordered alternation: the first alternative that matches wins. When none
 * does, the individual failures are replaced by one error naming this rule.
 */

export class Choice<T> extends Parser<T> {
  readonly parsers: ReadonlyArray<Parser<T>>;

  constructor(label: string, optional: boolean, parsers: Array<Parser<T>>) {
    super(label, optional);
    this.parsers = parsers;
  }

  _parse(context: Context<T>, offset: number) {
    for (const parser of this.parsers) {
      const parse = parser.parse(context, offset);
      if (parse.isOk()) return parse;
    }
    return new Parse<T>(
      this.label,
      this.optional
        ? none()
        : err(new ParseError(this.label, context.spanLast())),
      offset,
      offset
    );
  }
}
