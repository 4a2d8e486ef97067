import { nested, none, ok, Parse, ParseData, ResultType } from "../result";
import { Context } from "./Context";
import { Parser } from "./Parser";

/**
 * class Sequence
 *
 * Matches its children one after the other. Children reporting no match are
 * skipped. The first error fails the whole sequence, or turns it into no match
 * when the sequence is optional.
 */

export class Sequence<T> extends Parser<T> {
  readonly parsers: ReadonlyArray<Parser<T>>;

  constructor(label: string, optional: boolean, parsers: Array<Parser<T>>) {
    super(label, optional);
    this.parsers = parsers;
  }

  _parse(context: Context<T>, offset: number): Parse<T> {
    const children: ParseData<T>[] = [];
    let cursor = offset;
    for (const parser of this.parsers) {
      const parse = parser.parse(context, cursor);
      switch (parse.data.type) {
        case ResultType.Ok:
          children.push(parse.data.data);
          cursor += parse.size();
          break;
        case ResultType.Err:
          return new Parse<T>(
            this.label,
            this.optional ? none() : parse.data,
            offset,
            cursor
          );
        case ResultType.None:
          break;
      }
    }
    return new Parse<T>(this.label, ok(nested(children)), offset, cursor);
  }
}
