import { GrammarError } from "../internals";
import { Context } from "./Context";
import { Parser } from "./Parser";

/**
 * class Rule
 *
 * A named placeholder whose parser is supplied after construction, so that
 * grammars can refer to themselves.
 */

export class Rule<T> extends Parser<T> {
  parser: Parser<T> | null = null;

  constructor(label: string) {
    super(label, false);
  }

  define(parser: Parser<T>) {
    if (this.parser)
      throw new GrammarError(this.label, "rule is already defined");
    this.parser = parser;
    return this;
  }

  _parse(context: Context<T>, offset: number) {
    if (!this.parser)
      throw new GrammarError(this.label, "cannot parse an undefined rule");
    return this.parser.parse(context, offset);
  }
}
