import { TokenKind, isKeyword } from './token'
import type { Token } from './token'

// Character code constants
const CH_0 = 0x30 // '0'
const CH_9 = 0x39 // '9'
const CH_A = 0x41 // 'A'
const CH_E = 0x45
const CH_P = 0x50
const CH_R = 0x52
const CH_a = 0x61 // 'a'
const CH_e = 0x65
const CH_p = 0x70
const CH_z = 0x7a
const CH_Z = 0x5a
const CH_DQUOTE = 0x22 // '"'
const CH_SQUOTE = 0x27 // "'"
const CH_BSLASH = 0x5c // '\'
const CH_UNDERSCORE = 0x5f // '_'
const CH_DOLLAR = 0x24 // '$'
const CH_DOT = 0x2e // '.'
const CH_HASH = 0x23 // '#'
const CH_SLASH = 0x2f // '/'
const CH_STAR = 0x2a // '*'
const CH_NEWLINE = 0x0a // '\n'
const CH_SPACE = 0x20 // ' '
const CH_PLUS = 0x2b
const CH_MINUS = 0x2d
const CH_LPAREN = 0x28
const CH_RPAREN = 0x29
const CH_LBRACE = 0x7b
const CH_RBRACE = 0x7d
const CH_LBRACKET = 0x5b
const CH_RBRACKET = 0x5d
const CH_SEMICOLON = 0x3b
const CH_COMMA = 0x2c
const CH_TILDE = 0x7e
const CH_QUESTION = 0x3f
const CH_COLON = 0x3a
const CH_PERCENT = 0x25
const CH_AMP = 0x26
const CH_PIPE = 0x7c
const CH_CARET = 0x5e
const CH_BANG = 0x21
const CH_EQUAL = 0x3d
const CH_LESS = 0x3c
const CH_GREATER = 0x3e

function isDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_9
}

function isAlpha(c: number): boolean {
  return (c >= CH_a && c <= CH_z) || (c >= CH_A && c <= CH_Z)
}

function isIdentStart(c: number): boolean {
  return c === CH_UNDERSCORE || c === CH_DOLLAR || isAlpha(c)
}

function isIdentContinue(c: number): boolean {
  return c === CH_UNDERSCORE || c === CH_DOLLAR || isAlpha(c) || isDigit(c)
}

function isWhitespace(c: number): boolean {
  return c === CH_SPACE || c === 0x09 || c === CH_NEWLINE || c === 0x0d || c === 0x0c || c === 0x0b
}

// Encoding prefixes that may precede a string literal: L"", u8"", R"()", LR"()", ...
function isStringPrefix(prefix: string): boolean {
  switch (prefix) {
    case 'L':
    case 'u':
    case 'U':
    case 'u8':
    case 'R':
    case 'LR':
    case 'uR':
    case 'UR':
    case 'u8R':
      return true
    default:
      return false
  }
}

function isCharPrefix(prefix: string): boolean {
  return prefix === 'L' || prefix === 'u' || prefix === 'U' || prefix === 'u8'
}

/**
 * C++ lexer that tokenizes a range of the source, keeping absolute offsets.
 * Tokens keep their exact spelling; literal values are not decoded.
 * Operates on the source string via charCodeAt() for performance.
 */
export class Scanner {
  private src: string
  private end: number
  private pos: number

  constructor(source: string, start: number = 0, end: number = source.length) {
    this.src = source
    this.end = Math.min(end, source.length)
    this.pos = Math.max(0, start)
  }

  /**
   * Eagerly scan the entire range and return all tokens (including Eof).
   */
  scan(): Token[] {
    const tokens: Token[] = []
    for (;;) {
      const tok = this.nextToken()
      tokens.push(tok)
      if (tok.kind === TokenKind.Eof) {
        break
      }
    }
    return tokens
  }

  private ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  private chAt(i: number): number {
    return i < this.end ? this.src.charCodeAt(i) : -1
  }

  private makeToken(kind: TokenKind, start: number): Token {
    return { kind, text: this.src.substring(start, this.pos), start, end: this.pos }
  }

  private nextToken(): Token {
    this.skipWhitespaceAndComments()

    if (this.pos >= this.end) {
      return { kind: TokenKind.Eof, text: '', start: this.end, end: this.end }
    }

    const start = this.pos
    const c = this.ch()

    // Number literals
    if (isDigit(c) || (c === CH_DOT && isDigit(this.chAt(this.pos + 1)))) {
      return this.lexNumber(start)
    }

    if (c === CH_DQUOTE) {
      return this.lexString(start, false)
    }

    if (c === CH_SQUOTE) {
      return this.lexChar(start)
    }

    // Identifiers, keywords and prefixed literals
    if (isIdentStart(c)) {
      return this.lexIdentifier(start)
    }

    return this.lexPunctuation(start)
  }

  // --- Whitespace and comment skipping ---
  private skipWhitespaceAndComments(): void {
    for (;;) {
      while (this.pos < this.end && isWhitespace(this.ch())) {
        this.pos++
      }

      if (this.pos >= this.end) return

      // Skip GCC-style line markers: # <number> "filename"
      if (this.ch() === CH_HASH && this.isLineMarker()) {
        while (this.pos < this.end && this.ch() !== CH_NEWLINE) {
          this.pos++
        }
        continue
      }

      // Line comments
      if (this.ch() === CH_SLASH && this.chAt(this.pos + 1) === CH_SLASH) {
        while (this.pos < this.end && this.ch() !== CH_NEWLINE) {
          this.pos++
        }
        continue
      }

      // Block comments
      if (this.ch() === CH_SLASH && this.chAt(this.pos + 1) === CH_STAR) {
        this.pos += 2
        while (this.pos < this.end) {
          if (this.ch() === CH_STAR && this.chAt(this.pos + 1) === CH_SLASH) {
            this.pos += 2
            break
          }
          this.pos++
        }
        continue
      }

      break
    }
  }

  private isLineMarker(): boolean {
    if (this.pos >= this.end || this.ch() !== CH_HASH) return false
    // '#' must be at the start of a line
    if (this.pos > 0 && this.src.charCodeAt(this.pos - 1) !== CH_NEWLINE) return false
    let j = this.pos + 1
    while (j < this.end && this.chAt(j) === CH_SPACE) {
      j++
    }
    return j < this.end && isDigit(this.chAt(j))
  }

  // --- Number lexing ---
  // Lexes a preprocessing number: digits, letters, '.', digit separators and
  // signed exponents. Covers hex, binary, octal, floats and literal suffixes
  // (including user-defined ones like 10_km).
  private lexNumber(start: number): Token {
    this.pos++
    while (this.pos < this.end) {
      const c = this.ch()
      if (
        (c === CH_e || c === CH_E || c === CH_p || c === CH_P) &&
        (this.chAt(this.pos + 1) === CH_PLUS || this.chAt(this.pos + 1) === CH_MINUS)
      ) {
        this.pos += 2
      } else if (isIdentContinue(c) || c === CH_DOT) {
        this.pos++
      } else if (c === CH_SQUOTE && isIdentContinue(this.chAt(this.pos + 1))) {
        // C++14 digit separator: 1'000'000
        this.pos += 2
      } else {
        break
      }
    }
    return this.makeToken(TokenKind.NumericLiteral, start)
  }

  // --- String lexing ---
  // `this.pos` is at the opening quote; `start` includes any encoding prefix.
  private lexString(start: number, raw: boolean): Token {
    if (raw) {
      this.lexRawStringBody()
    } else {
      this.lexQuoted(CH_DQUOTE)
    }
    this.lexUserDefinedSuffix()
    return this.makeToken(TokenKind.StringLiteral, start)
  }

  // R"delim( ... )delim"
  private lexRawStringBody(): void {
    this.pos++ // skip opening "
    const delimStart = this.pos
    while (this.pos < this.end && this.ch() !== CH_LPAREN) {
      this.pos++
    }
    const terminator = ')' + this.src.substring(delimStart, this.pos) + '"'
    const close = this.src.indexOf(terminator, this.pos)
    this.pos = close < 0 || close + terminator.length > this.end ? this.end : close + terminator.length
  }

  private lexQuoted(quote: number): void {
    this.pos++ // skip opening quote
    while (this.pos < this.end && this.ch() !== quote && this.ch() !== CH_NEWLINE) {
      if (this.ch() === CH_BSLASH) {
        this.pos++
      }
      this.pos++
    }
    if (this.pos < this.end && this.ch() === quote) {
      this.pos++ // skip closing quote
    }
    if (this.pos > this.end) this.pos = this.end
  }

  private lexUserDefinedSuffix(): void {
    if (this.pos < this.end && isIdentStart(this.ch())) {
      while (this.pos < this.end && isIdentContinue(this.ch())) {
        this.pos++
      }
    }
  }

  // --- Char lexing ---
  private lexChar(start: number): Token {
    this.lexQuoted(CH_SQUOTE)
    this.lexUserDefinedSuffix()
    return this.makeToken(TokenKind.CharLiteral, start)
  }

  // --- Identifier lexing ---
  private lexIdentifier(start: number): Token {
    while (this.pos < this.end && isIdentContinue(this.ch())) {
      this.pos++
    }

    // Check for encoding prefixes: L'x', u8"...", R"(...)", LR"(...)", ...
    if (this.pos < this.end) {
      const next = this.ch()
      const prefix = this.src.substring(start, this.pos)
      if (next === CH_DQUOTE && isStringPrefix(prefix)) {
        return this.lexString(start, prefix.charCodeAt(prefix.length - 1) === CH_R)
      }
      if (next === CH_SQUOTE && isCharPrefix(prefix)) {
        return this.lexChar(start)
      }
    }

    const text = this.src.substring(start, this.pos)
    const kind = isKeyword(text) ? TokenKind.Keyword : TokenKind.Identifier
    return { kind, text, start, end: this.pos }
  }

  // --- Punctuation and operators ---
  // Longest match, so `>>` and `&&` are single tokens.
  private lexPunctuation(start: number): Token {
    const c = this.ch()
    this.pos++

    switch (c) {
      case CH_LPAREN:
      case CH_RPAREN:
      case CH_LBRACE:
      case CH_RBRACE:
      case CH_LBRACKET:
      case CH_RBRACKET:
      case CH_SEMICOLON:
      case CH_COMMA:
      case CH_TILDE:
      case CH_QUESTION:
        break
      case CH_COLON:
        this.consumeChar(CH_COLON)
        break
      case CH_HASH:
        this.consumeChar(CH_HASH)
        break
      case CH_DOT:
        if (this.chAt(this.pos) === CH_DOT && this.chAt(this.pos + 1) === CH_DOT) {
          this.pos += 2
        } else {
          this.consumeChar(CH_STAR)
        }
        break
      case CH_PLUS:
        if (!this.consumeChar(CH_PLUS)) this.consumeChar(CH_EQUAL)
        break
      case CH_MINUS:
        if (this.consumeChar(CH_GREATER)) {
          this.consumeChar(CH_STAR)
        } else if (!this.consumeChar(CH_MINUS)) {
          this.consumeChar(CH_EQUAL)
        }
        break
      case CH_AMP:
        if (!this.consumeChar(CH_AMP)) this.consumeChar(CH_EQUAL)
        break
      case CH_PIPE:
        if (!this.consumeChar(CH_PIPE)) this.consumeChar(CH_EQUAL)
        break
      case CH_STAR:
      case CH_SLASH:
      case CH_PERCENT:
      case CH_CARET:
      case CH_BANG:
      case CH_EQUAL:
        this.consumeChar(CH_EQUAL)
        break
      case CH_LESS:
        if (this.consumeChar(CH_LESS)) {
          this.consumeChar(CH_EQUAL)
        } else if (this.consumeChar(CH_EQUAL)) {
          // C++20 three-way comparison: <=>
          this.consumeChar(CH_GREATER)
        }
        break
      case CH_GREATER:
        this.consumeChar(CH_GREATER)
        this.consumeChar(CH_EQUAL)
        break
      default:
        // Unknown character: skip and continue
        return this.nextToken()
    }
    return this.makeToken(TokenKind.Punctuation, start)
  }

  private consumeChar(expected: number): boolean {
    if (this.pos < this.end && this.ch() === expected) {
      this.pos++
      return true
    }
    return false
  }
}
