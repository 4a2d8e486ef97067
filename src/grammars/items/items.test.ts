import { Span, Token } from "../../token";
import {
  DataType,
  nested,
  ParseError,
  ResultType,
  single
} from "../../result";
import {
  createItemsParser,
  eoi,
  id,
  ItemTokenType,
  LexError,
  punct,
  str,
  tokenize
} from ".";

function describeTokens(tokens: Token<ItemTokenType>[]) {
  return tokens.map(({ type, span }) => {
    switch (type.kind) {
      case "Id":
        return `Id(${type.name}) ${span}`;
      case "Str":
        return `Str(${type.value}) ${span}`;
      default:
        return `${type.kind} ${span}`;
    }
  });
}

const parser = createItemsParser();

test("The lexer should produce spanned tokens ending with Eoi", () => {
  expect(describeTokens(tokenize('a = "x"'))).toEqual([
    "Id(a) 1:1-1",
    "Equals 1:3-3",
    "Str(x) 1:5-7",
    "Eoi 1:8-8"
  ]);
  expect(describeTokens(tokenize('a = "x"\nbb = "y"'))).toEqual([
    "Id(a) 1:1-1",
    "Equals 1:3-3",
    "Str(x) 1:5-7",
    "Id(bb) 2:1-2",
    "Equals 2:4-4",
    "Str(y) 2:6-8",
    "Eoi 2:9-9"
  ]);
  expect(describeTokens(tokenize("$(x)|^[];"))).toEqual([
    "Dollar 1:1-1",
    "LParen 1:2-2",
    "Id(x) 1:3-3",
    "RParen 1:4-4",
    "Or 1:5-5",
    "Caret 1:6-6",
    "LBracket 1:7-7",
    "RBracket 1:8-8",
    "Semicolon 1:9-9",
    "Eoi 1:10-10"
  ]);
  expect(describeTokens(tokenize(""))).toEqual(["Eoi 1:1-1"]);
});

test("The lexer should place Eoi on the next line after a final newline", () => {
  expect(describeTokens(tokenize('a = "x"\n'))).toEqual([
    "Id(a) 1:1-1",
    "Equals 1:3-3",
    "Str(x) 1:5-7",
    "Eoi 2:1-1"
  ]);
});

test("The lexer should reject unknown characters and open strings", () => {
  expect(() => tokenize("a = #")).toThrow(LexError);
  expect(() => tokenize("a = #")).toThrow('(1:5) Unexpected character "#"');
  expect(() => tokenize('a = "x')).toThrow("(1:5) Unterminated string");
});

test("The items parser should parse a single item followed by Eoi", () => {
  const tokens = [
    new Token(id("a"), new Span(1, 1, 1)),
    new Token(punct("Equals"), new Span(1, 3, 3)),
    new Token(str("x"), new Span(1, 5, 7)),
    new Token(eoi, new Span(1, 8, 8))
  ];
  const report = parser.run(tokens);
  expect(report.complete).toBe(true);
  expect(report.parse.label).toBe("items");
  expect(report.data).toEqual(
    nested([
      nested([
        nested([single(tokens[0]), single(tokens[1]), single(tokens[2])])
      ]),
      single(tokens[3])
    ])
  );
});

test("The items parser should parse several items", () => {
  const report = parser.run(tokenize('a = "x" b = "y"'));
  expect(report.complete).toBe(true);
  const { data } = report.parse;
  const fields =
    data.type === ResultType.Ok &&
    data.data.type === DataType.Nested &&
    data.data.children[0];
  expect(
    fields && fields.type === DataType.Nested && fields.children.length
  ).toBe(2);
});

test("The items parser should accept an empty document", () => {
  const tokens = [new Token(eoi, Span.default())];
  const report = parser.run(tokens);
  expect(report.complete).toBe(true);
  expect(report.parse.label).toBe("_");
  expect(report.data).toEqual(single(tokens[0]));
});

test("The items parser should point at Eoi when a value is missing", () => {
  const tokens = tokenize("a =");
  const report = parser.run(tokens);
  expect(report.success).toBe(false);
  expect(report.error).toEqual(new ParseError("document", new Span(1, 4, 4)));
  expect(report.error?.span).toEqual(tokens[tokens.length - 1].span);
  expect(report.log()).toBe("(1:4) Syntax error, expected document");
});
