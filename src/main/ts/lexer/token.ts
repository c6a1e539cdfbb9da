import { Position } from "../common/position.js";

export enum TokenType {
  // Keywords
  Let,
  Const,
  Fn,
  If,
  Else,
  While,
  Loop,
  Do,
  Until,
  For,
  In,
  Return,
  Break,
  Continue,
  Throw,
  Try,
  Catch,
  Switch,
  True,
  False,

  // Literals
  Identifier,
  String,
  Char,
  Int,
  Float,

  // Operators & Punctuation
  Plus, // +
  Minus, // -
  Star, // *
  StarStar, // **
  Slash, // /
  Percent, // %
  Equal, // =
  EqualEqual, // ==
  Bang, // !
  BangEqual, // !=
  Less, // <
  LessEqual, // <=
  Greater, // >
  GreaterEqual, // >=
  Ampersand, // &
  Pipe, // |
  Caret, // ^
  LessLess, // <<
  GreaterGreater, // >>
  AmpersandAmpersand, // &&
  PipePipe, // ||
  QuestionQuestion, // ??
  PlusEqual, // +=
  MinusEqual, // -=
  StarEqual, // *=
  StarStarEqual, // **=
  SlashEqual, // /=
  PercentEqual, // %=
  LessLessEqual, // <<=
  GreaterGreaterEqual, // >>=
  AmpersandEqual, // &=
  PipeEqual, // |=
  CaretEqual, // ^=
  Arrow, // =>
  Dot, // .
  DotDot, // ..
  DotDotEqual, // ..=
  Colon, // :
  Comma, // ,
  Semicolon, // ;
  Underscore, // _
  HashBrace, // #{
  OpenParen, // (
  CloseParen, // )
  OpenBrace, // {
  CloseBrace, // }
  OpenBracket, // [
  CloseBracket, // ]

  EOF,
}

export type TokenLiteral = bigint | number | string;

export interface Token {
  type: TokenType;
  lexeme: string;
  literal?: TokenLiteral;
  pos: Position;
  length: number;
}

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["let", TokenType.Let],
  ["const", TokenType.Const],
  ["fn", TokenType.Fn],
  ["if", TokenType.If],
  ["else", TokenType.Else],
  ["while", TokenType.While],
  ["loop", TokenType.Loop],
  ["do", TokenType.Do],
  ["until", TokenType.Until],
  ["for", TokenType.For],
  ["in", TokenType.In],
  ["return", TokenType.Return],
  ["break", TokenType.Break],
  ["continue", TokenType.Continue],
  ["throw", TokenType.Throw],
  ["try", TokenType.Try],
  ["catch", TokenType.Catch],
  ["switch", TokenType.Switch],
  ["true", TokenType.True],
  ["false", TokenType.False],
]);

/**
 * Operator and punctuation spellings, longest first, so that the first
 * prefix match is the longest one (`**=` before `**` before `*`).
 */
export const SYMBOLS: ReadonlyArray<readonly [string, TokenType]> = [
  ["**=", TokenType.StarStarEqual],
  ["<<=", TokenType.LessLessEqual],
  [">>=", TokenType.GreaterGreaterEqual],
  ["..=", TokenType.DotDotEqual],
  ["**", TokenType.StarStar],
  ["==", TokenType.EqualEqual],
  ["!=", TokenType.BangEqual],
  ["<=", TokenType.LessEqual],
  [">=", TokenType.GreaterEqual],
  ["<<", TokenType.LessLess],
  [">>", TokenType.GreaterGreater],
  ["&&", TokenType.AmpersandAmpersand],
  ["||", TokenType.PipePipe],
  ["??", TokenType.QuestionQuestion],
  ["+=", TokenType.PlusEqual],
  ["-=", TokenType.MinusEqual],
  ["*=", TokenType.StarEqual],
  ["/=", TokenType.SlashEqual],
  ["%=", TokenType.PercentEqual],
  ["&=", TokenType.AmpersandEqual],
  ["|=", TokenType.PipeEqual],
  ["^=", TokenType.CaretEqual],
  ["=>", TokenType.Arrow],
  ["..", TokenType.DotDot],
  ["#{", TokenType.HashBrace],
  ["+", TokenType.Plus],
  ["-", TokenType.Minus],
  ["*", TokenType.Star],
  ["/", TokenType.Slash],
  ["%", TokenType.Percent],
  ["=", TokenType.Equal],
  ["!", TokenType.Bang],
  ["<", TokenType.Less],
  [">", TokenType.Greater],
  ["&", TokenType.Ampersand],
  ["|", TokenType.Pipe],
  ["^", TokenType.Caret],
  [".", TokenType.Dot],
  [":", TokenType.Colon],
  [",", TokenType.Comma],
  [";", TokenType.Semicolon],
  ["(", TokenType.OpenParen],
  [")", TokenType.CloseParen],
  ["{", TokenType.OpenBrace],
  ["}", TokenType.CloseBrace],
  ["[", TokenType.OpenBracket],
  ["]", TokenType.CloseBracket],
];
