import { Span, Token } from ".";

test("Spans should render and compare by position", () => {
  const span = new Span(3, 5, 7);
  expect(span.toString()).toBe("3:5-7");
  expect(span.equals(new Span(3, 5, 7))).toBe(true);
  expect(span.equals(new Span(3, 5, 8))).toBe(false);
  expect(Span.default().toString()).toBe("1:1-1");
});

test("Spans should reject inverted or non-positive ranges", () => {
  expect(() => new Span(1, 4, 3)).toThrow(RangeError);
  expect(() => new Span(0, 1, 1)).toThrow(RangeError);
  expect(() => new Span(1, 0, 2)).toThrow(RangeError);
});

test("Tokens should report their width and clone their type by value", () => {
  const type = { kind: "Id", name: "abc" };
  const token = new Token(type, new Span(1, 2, 4));
  const copy = token.clone();
  expect(token.spanSize()).toBe(3);
  expect(copy.type).toEqual(type);
  expect(copy.type).not.toBe(type);
  expect(copy.span).toBe(token.span);
});
