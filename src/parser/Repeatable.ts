import {
  countItems,
  err,
  ErrResult,
  nested,
  none,
  ok,
  Parse,
  ParseData,
  ParseError,
  ResultType
} from "../result";
import { Context } from "./Context";
import { Parser } from "./Parser";

/**
 * class Repeatable
 *
 * Applies its child as many times as it matches. The cursor advances by the
 * number of items each match represents: one per token, the length of a
 * nested or flat list. Once something matched, a trailing error is dropped.
 */

export class Repeatable<T> extends Parser<T> {
  readonly parser: Parser<T>;

  constructor(label: string, optional: boolean, parser: Parser<T>) {
    super(label, optional);
    this.parser = parser;
  }

  _parse(context: Context<T>, offset: number): Parse<T> {
    const items: ParseData<T>[] = [];
    let cursor = offset;
    let failure: ErrResult | null = null;

    while (true) {
      const parse = this.parser.parse(context, cursor);
      if (parse.data.type === ResultType.Err) failure = parse.data;
      if (parse.data.type !== ResultType.Ok) break;
      const count = countItems(parse.data.data);
      items.push(parse.data.data);
      if (count === 0) break;
      cursor += count;
    }

    if (items.length !== 0)
      return new Parse<T>(this.label, ok(nested(items)), offset, cursor);
    if (this.optional) return new Parse<T>(this.label, none(), offset, cursor);
    return new Parse<T>(
      this.label,
      failure ?? err(new ParseError(this.label, context.spanAt(cursor))),
      offset,
      cursor
    );
  }
}
