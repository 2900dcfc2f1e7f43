import keywordList from './keywords.json'

/**
 * Spelling kinds of C++ tokens, mirroring what a C++ front end reports for
 * the tokens of a source range.
 * Uses a numeric const enum for fast comparison (inlined at compile time).
 */
export const enum TokenKind {
  Identifier = 0,
  Keyword = 1,

  // Literals
  NumericLiteral = 2,
  CharLiteral = 3,
  StringLiteral = 4,

  // Operators and brackets
  Punctuation = 5,

  // Special
  Eof = 6,
}

/**
 * Source span (byte offsets into the source string).
 */
export interface Span {
  start: number
  end: number
}

/**
 * A token with its spelling kind, its exact source text and source location.
 */
export interface Token {
  readonly kind: TokenKind
  readonly text: string
  readonly start: number
  readonly end: number
}

const keywords: ReadonlySet<string> = new Set(keywordList)

/**
 * Whether `s` is a C++ keyword (including the double-underscore vendor forms).
 * Contextual identifiers such as `override` and `final` are not keywords.
 */
export function isKeyword(s: string): boolean {
  // Fast reject: keywords are 2-16 chars
  if (s.length < 2 || s.length > 16) {
    return false
  }
  return keywords.has(s)
}

export function isLiteral(kind: TokenKind): boolean {
  return (
    kind === TokenKind.NumericLiteral ||
    kind === TokenKind.CharLiteral ||
    kind === TokenKind.StringLiteral
  )
}

export function isWord(kind: TokenKind): boolean {
  return kind === TokenKind.Identifier || kind === TokenKind.Keyword
}
