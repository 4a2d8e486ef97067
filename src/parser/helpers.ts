import { Choice } from "./Choice";
import { Flatten } from "./Flatten";
import { Not } from "./Not";
import { OfType } from "./OfType";
import { Parser } from "./Parser";
import { Predicate } from "./Predicate";
import { Repeatable } from "./Repeatable";
import { Rule } from "./Rule";
import { Sequence } from "./Sequence";
import { TokenTest } from "./types";

// Grammar builders

/**
 * Matches one token of the given type. When token types are a union of
 * literals, pass T explicitly (ofType<Kind>("=", "Eq")), otherwise T is
 * inferred as the single literal and the parser won't fit a Parser<Kind>
 */

export function ofType<T>(label: string, type: T, optional = false) {
  return new OfType<T>(label, optional, type);
}

/**
 * Matches one token whose type passes the test. As with ofType, pass T
 * explicitly when it would otherwise be inferred too narrowly
 */

export function predicate<T>(
  label: string,
  test: TokenTest<T>,
  optional = false
) {
  return new Predicate<T>(label, optional, test);
}

export function sequence<T>(
  label: string,
  parsers: Array<Parser<T>>,
  optional = false
) {
  return new Sequence<T>(label, optional, parsers);
}

export function repeatable<T>(
  label: string,
  parser: Parser<T>,
  optional = false
) {
  return new Repeatable<T>(label, optional, parser);
}

export function not<T>(label: string, parser: Parser<T>, optional = false) {
  return new Not<T>(label, optional, parser);
}

export function choice<T>(
  label: string,
  parsers: Array<Parser<T>>,
  optional = false
) {
  return new Choice<T>(label, optional, parsers);
}

export function flatten<T>(label: string, parser: Parser<T>) {
  return new Flatten<T>(label, parser);
}

/**
 * Creates a rule whose parser is defined later, for recursive grammars
 * @param label
 */

export function rule<T>(label: string) {
  return new Rule<T>(label);
}
