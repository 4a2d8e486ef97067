export type PunctuationKind =
  | "Semicolon"
  | "Dollar"
  | "Or"
  | "Caret"
  | "LBracket"
  | "RBracket"
  | "Equals"
  | "LParen"
  | "RParen";

export type ItemTokenType =
  | { kind: PunctuationKind }
  | { kind: "Eoi" }
  | { kind: "Id"; name: string }
  | { kind: "Str"; value: string };

export type ItemTokenKind = ItemTokenType["kind"];

export const punctuation: Readonly<Record<string, PunctuationKind>> = {
  ";": "Semicolon",
  $: "Dollar",
  "|": "Or",
  "^": "Caret",
  "[": "LBracket",
  "]": "RBracket",
  "=": "Equals",
  "(": "LParen",
  ")": "RParen"
};

export const eoi: ItemTokenType = { kind: "Eoi" };

export function id(name: string): ItemTokenType {
  return { kind: "Id", name };
}

export function str(value: string): ItemTokenType {
  return { kind: "Str", value };
}

export function punct(kind: PunctuationKind): ItemTokenType {
  return { kind };
}

export function isKind(kind: ItemTokenKind) {
  return (type: ItemTokenType) => type.kind === kind;
}
