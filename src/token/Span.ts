/**
 * class Span
 *
 * A source location range on a single line. Columns are 1-based and inclusive.
 */

export class Span {
  readonly line: number;
  readonly colStart: number;
  readonly colEnd: number;

  constructor(line: number, colStart: number, colEnd: number) {
    if (line < 1 || colStart < 1)
      throw new RangeError(`Invalid span position (${line}:${colStart})`);
    if (colEnd < colStart)
      throw new RangeError(
        `Span end column ${colEnd} precedes start column ${colStart}`
      );
    this.line = line;
    this.colStart = colStart;
    this.colEnd = colEnd;
  }

  static default() {
    return new Span(1, 1, 1);
  }

  equals(other: Span) {
    return (
      this.line === other.line &&
      this.colStart === other.colStart &&
      this.colEnd === other.colEnd
    );
  }

  toString() {
    return `${this.line}:${this.colStart}-${this.colEnd}`;
  }
}
