import { Token } from "../token";
import {
  DataType,
  ErrResult,
  NoneResult,
  OkResult,
  ParseData,
  ParseError,
  ResultType
} from ".";

// Result constructors

export function ok<T>(data: ParseData<T>): OkResult<T> {
  return { type: ResultType.Ok, data };
}

export function err(error: ParseError): ErrResult {
  return { type: ResultType.Err, error };
}

export function none(): NoneResult {
  return { type: ResultType.None };
}

// Data constructors

export function nested<T>(children: ParseData<T>[]): ParseData<T> {
  return { type: DataType.Nested, children };
}

export function tokenList<T>(tokens: Token<T>[]): ParseData<T> {
  return { type: DataType.TokenList, tokens };
}

export function single<T>(token: Token<T>): ParseData<T> {
  return { type: DataType.Token, token };
}

/**
 * Finds the leftmost token of a data tree, or null if it holds none
 * @param data
 */

export function firstToken<T>(data: ParseData<T>): Token<T> | null {
  switch (data.type) {
    case DataType.Token:
      return data.token;
    case DataType.TokenList:
      return data.tokens[0] ?? null;
    case DataType.Nested:
      for (const child of data.children) {
        const token = firstToken(child);
        if (token) return token;
      }
      return null;
  }
}

/**
 * Lists every token of a data tree, left to right
 * @param data
 */

export function tokensOf<T>(data: ParseData<T>): Token<T>[] {
  switch (data.type) {
    case DataType.Token:
      return [data.token];
    case DataType.TokenList:
      return [...data.tokens];
    case DataType.Nested:
      return data.children.flatMap(child => tokensOf(child));
  }
}

/**
 * Counts the logical items a data node represents
 * @param data
 */

export function countItems<T>(data: ParseData<T>) {
  switch (data.type) {
    case DataType.Token:
      return 1;
    case DataType.TokenList:
      return data.tokens.length;
    case DataType.Nested:
      return data.children.length;
  }
}
