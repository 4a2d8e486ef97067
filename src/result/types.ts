import { Token } from "../token";
import { ParseError } from "./ParseError";

// Parse data

export enum DataType {
  Nested = "NESTED",
  TokenList = "TOKEN_LIST",
  Token = "TOKEN"
}

export type ParseData<T> = NestedData<T> | TokenListData<T> | TokenData<T>;

export interface NestedData<T> {
  type: DataType.Nested;
  children: ParseData<T>[];
}

export interface TokenListData<T> {
  type: DataType.TokenList;
  tokens: Token<T>[];
}

export interface TokenData<T> {
  type: DataType.Token;
  token: Token<T>;
}

// Parse result

export enum ResultType {
  Ok = "OK",
  Err = "ERR",
  None = "NONE"
}

export type ParseResult<T> = OkResult<T> | ErrResult | NoneResult;

export interface OkResult<T> {
  type: ResultType.Ok;
  data: ParseData<T>;
}

export interface ErrResult {
  type: ResultType.Err;
  error: ParseError;
}

export interface NoneResult {
  type: ResultType.None;
}
