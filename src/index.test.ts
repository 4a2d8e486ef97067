import { choice, not, predicate, repeatable, sequence } from ".";
import {
  createItemsParser,
  isKind,
  ItemTokenType,
  tokenize
} from "./grammars/items";

test("The public API should build and run grammars end to end", () => {
  const document = createItemsParser();
  expect(document.test(tokenize('name = "tokcomb"'))).toBe(true);
  expect(document.test(tokenize("name = other"))).toBe(false);
});

test("Grammars should compose lookahead with repetition", () => {
  const word = predicate<ItemTokenType>("word", isKind("Id"));
  const words = sequence<ItemTokenType>("words", [
    repeatable("list", word),
    not("no-string", predicate("string", isKind("Str")))
  ]);
  const statement = choice<ItemTokenType>("statement", [words]);
  const ok = statement.run(tokenize("a b c"));
  expect(ok.success).toBe(true);
  expect(ok.parse.to).toBe(3);
  const failed = statement.run(tokenize('a b "c"'));
  expect(failed.log()).toBe("(1:8) Syntax error, expected statement");
});
