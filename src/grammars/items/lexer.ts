import lineColumn from "line-column";
import { has } from "lodash";
import { Span, Token } from "../../token";
import { eoi, id, ItemTokenType, punct, punctuation, str } from "./tokens";

export class LexError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`(${line}:${column}) ${message}`);
    this.name = "LexError";
    this.line = line;
    this.column = column;
  }
}

const whitespace = /\s+/y;
const identifier = /[A-Za-z_][A-Za-z0-9_]*/y;
const quoted = /"([^"\r\n]*)"/y;
const unterminated = /"[^"\r\n]*/y;

function scan(pattern: RegExp, source: string, index: number) {
  pattern.lastIndex = index;
  return pattern.exec(source);
}

/**
 * Splits item source text into tokens, ending with an Eoi token placed one
 * column past the last character
 * @param source
 */

export function tokenize(source: string) {
  const finder = lineColumn(source);
  const locate = (index: number) => {
    const info = finder.fromIndex(index);
    if (!info) throw new RangeError(`Index ${index} is out of the source`);
    return info;
  };
  const spanOf = (from: number, to: number) => {
    const start = locate(from);
    return new Span(start.line, start.col, locate(to - 1).col);
  };

  const tokens: Token<ItemTokenType>[] = [];
  let index = 0;
  while (index < source.length) {
    const char = source[index];
    let match: RegExpExecArray | null;
    if ((match = scan(whitespace, source, index))) {
      index += match[0].length;
    } else if (has(punctuation, char)) {
      const type = punct(punctuation[char]);
      tokens.push(new Token(type, spanOf(index, index + 1)));
      index++;
    } else if ((match = scan(identifier, source, index))) {
      const end = index + match[0].length;
      tokens.push(new Token(id(match[0]), spanOf(index, end)));
      index = end;
    } else if ((match = scan(quoted, source, index))) {
      const end = index + match[0].length;
      tokens.push(new Token(str(match[1]), spanOf(index, end)));
      index = end;
    } else {
      const { line, col } = locate(index);
      if (scan(unterminated, source, index))
        throw new LexError("Unterminated string", line, col);
      throw new LexError(`Unexpected character "${char}"`, line, col);
    }
  }

  let end = Span.default();
  if (source.length !== 0) {
    const { line, col } = locate(source.length - 1);
    end = source.endsWith("\n")
      ? new Span(line + 1, 1, 1)
      : new Span(line, col + 1, col + 1);
  }
  tokens.push(new Token(eoi, end));
  return tokens;
}
