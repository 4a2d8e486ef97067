import {
  choice,
  ofType,
  Parser,
  predicate,
  repeatable,
  sequence
} from "../../parser";
import { eoi, isKind, ItemTokenType, punct } from "./tokens";

/**
 * Builds the items grammar:
 *
 *   document = Eoi | items
 *   items    = item* Eoi
 *   item     = Id "=" Str
 */

export function createItemsParser(): Parser<ItemTokenType> {
  const item = sequence<ItemTokenType>("item", [
    predicate("id", isKind("Id")),
    ofType("=", punct("Equals")),
    predicate("value", isKind("Str"))
  ]);

  return choice<ItemTokenType>("document", [
    ofType("_", eoi),
    sequence("items", [repeatable("fields", item, true), ofType("_", eoi)])
  ]);
}
