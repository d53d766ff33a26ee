/**
 * @module type-parser/tokens
 *
 * Token definitions for the text that follows `@param <name>` and
 * `@return` in an annotation comment. Every character lexes to some token,
 * so tokenizing never fails.
 */

import { createToken, Lexer } from 'chevrotain';

// =============================================================================
// Categories
// =============================================================================

/** Any token at all (used to swallow description text) */
export const AnyToken = createToken({
  name: 'AnyToken',
  pattern: Lexer.NA,
});

/** Tokens allowed inside a bracket group that are not brackets themselves */
export const InnerToken = createToken({
  name: 'InnerToken',
  pattern: Lexer.NA,
});

// =============================================================================
// Whitespace
// =============================================================================

export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// =============================================================================
// Brackets
// =============================================================================

export const LParen = createToken({ name: 'LParen', pattern: /\(/, categories: [AnyToken] });
export const RParen = createToken({ name: 'RParen', pattern: /\)/, categories: [AnyToken] });
export const LAngle = createToken({ name: 'LAngle', pattern: /</, categories: [AnyToken] });
export const RAngle = createToken({ name: 'RAngle', pattern: />/, categories: [AnyToken] });
export const LSquare = createToken({ name: 'LSquare', pattern: /\[/, categories: [AnyToken] });
export const RSquare = createToken({ name: 'RSquare', pattern: /]/, categories: [AnyToken] });
export const LCurly = createToken({ name: 'LCurly', pattern: /{/, categories: [AnyToken] });
export const RCurly = createToken({ name: 'RCurly', pattern: /}/, categories: [AnyToken] });

// =============================================================================
// Punctuation
// =============================================================================

/** Separates the type from its description */
export const Hash = createToken({ name: 'Hash', pattern: /#/, categories: [InnerToken, AnyToken] });

export const Comma = createToken({ name: 'Comma', pattern: /,/, categories: [InnerToken, AnyToken] });
export const Colon = createToken({ name: 'Colon', pattern: /:/, categories: [InnerToken, AnyToken] });
export const Pipe = createToken({ name: 'Pipe', pattern: /\|/, categories: [InnerToken, AnyToken] });

/** Optional marker: `string?` */
export const Question = createToken({
  name: 'Question',
  pattern: /\?/,
  categories: [InnerToken, AnyToken],
});

// =============================================================================
// Words
// =============================================================================

export const Word = createToken({
  name: 'Word',
  pattern: /[^\s#()<>[\]{},:|?]+/,
  categories: [InnerToken, AnyToken],
});

/** `fun(...)`: function type constructor; `function` stays a Word */
export const FunKeyword = createToken({
  name: 'FunKeyword',
  pattern: /fun/,
  longer_alt: Word,
  categories: [InnerToken, AnyToken],
});

// =============================================================================
// Token Groups
// =============================================================================

export const allTokens = [
  WhiteSpace,
  Hash,
  LParen,
  RParen,
  LAngle,
  RAngle,
  LSquare,
  RSquare,
  LCurly,
  RCurly,
  Comma,
  Colon,
  Pipe,
  Question,
  FunKeyword,
  Word,
  InnerToken,
  AnyToken,
];

export const TypeLexer = new Lexer(allTokens);
