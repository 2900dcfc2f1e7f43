// Token stream over the tokens of one declaration.
//
// Bracket matching here is a heuristic, not a parser: it only counts
// brackets. For `(`, `[` and `{` only the same bracket kind is counted. For
// `<` the tokens inside nested `()`, `[]` and `{}` are ignored and `>>`
// closes two levels, but a bare comparison such as `Foo<(a > b)>` works
// only because of the parentheses; `Foo<a > b>` is miscounted.

import { TokenKind, isWord } from '../lexer/token'
import type { Token } from '../lexer/token'
import type { Tokenizer } from '../lexer/tokenizer'
import type { Cursor } from '../oracle/cursor'
import { InternalError, unreachable } from '../errors'

const CLOSING_BRACKETS: ReadonlyMap<string, string> = new Map([
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
  ['<', '>'],
])

const WORD_CHAR = /^[A-Za-z0-9_$]/

export function isOpeningBracket(token: Token): boolean {
  return token.kind === TokenKind.Punctuation && CLOSING_BRACKETS.has(token.text)
}

function isNonTemplateOpener(text: string): boolean {
  return text === '(' || text === '[' || text === '{'
}

function isNonTemplateCloser(text: string): boolean {
  return text === ')' || text === ']' || text === '}'
}

export class TokenStream {
  // The declaration the tokens belong to
  readonly cursor: Cursor
  private tokens: readonly Token[]
  private pos: number

  constructor(tokenizer: Tokenizer, cursor: Cursor) {
    this.cursor = cursor
    this.tokens = tokenizer.tokens
    this.pos = 0
  }

  get position(): number {
    return this.pos
  }

  done(): boolean {
    return this.pos >= this.tokens.length
  }

  peek(offset: number = 0): Token {
    const i = this.pos + offset
    if (i >= 0 && i < this.tokens.length) {
      return this.tokens[i]
    }
    const end = this.cursor.extent.end
    return { kind: TokenKind.Eof, text: '', start: end, end }
  }

  bump(): void {
    if (this.pos < this.tokens.length) {
      this.pos++
    }
  }

  /**
   * Consumes the next token iff its text is `text`. With `isKeyword` the
   * token must also be lexically a keyword, so an identifier spelled the
   * same way does not match.
   */
  skipIf(text: string, isKeyword: boolean = false): boolean {
    const tok = this.peek()
    if (tok.kind === TokenKind.Eof || tok.text !== text) return false
    if (isKeyword && tok.kind !== TokenKind.Keyword) return false
    this.pos++
    return true
  }

  skip(text: string, isKeyword: boolean = false): void {
    if (!this.skipIf(text, isKeyword)) {
      throw new InternalError({
        message: `expected '${text}', got '${this.peek().text}'`,
        cursor: this.cursor,
      })
    }
  }

  /**
   * Consumes a name that may span several tokens, e.g. `operator+`,
   * `operator()` or `operator new[]`. Whitespace inside `name` is ignored.
   * On failure nothing is consumed.
   */
  skipName(name: string): boolean {
    const save = this.pos
    let rest = name.trim()
    while (rest.length > 0) {
      const tok = this.peek()
      if (tok.kind === TokenKind.Eof || !rest.startsWith(tok.text)) {
        this.pos = save
        return false
      }
      rest = rest.slice(tok.text.length)
      // `foo` must not match the start of `fooBar`; a literal may be followed
      // by a word, as in `operator"" _km`
      if (isWord(tok.kind) && WORD_CHAR.test(rest)) {
        this.pos = save
        return false
      }
      rest = rest.trimStart()
      this.pos++
    }
    return true
  }

  /**
   * Position of the bracket closing the opener at the current position.
   * Nothing is consumed.
   */
  findClosingBracket(): number {
    const open = this.peek()
    const close = CLOSING_BRACKETS.get(open.text)
    if (open.kind !== TokenKind.Punctuation || close === undefined) {
      return unreachable(this.cursor, `expected a bracket, got '${open.text}'`)
    }

    const isTemplate = open.text === '<'
    let depth = 1
    // Template brackets only: depth of other brackets inside the group
    let nested = 0
    for (let i = this.pos + 1; i < this.tokens.length; i++) {
      const text = this.tokens[i].text
      if (isTemplate) {
        if (isNonTemplateOpener(text)) nested++
        else if (isNonTemplateCloser(text)) nested--
        else if (nested === 0 && text === '<') depth++
        else if (nested === 0 && text === '>') depth--
        else if (nested === 0 && text === '>>') depth -= 2
      } else if (text === open.text) {
        depth++
      } else if (text === close) {
        depth--
      }
      if (depth <= 0) return i
    }
    return unreachable(this.cursor, `missing '${close}' for '${open.text}'`)
  }

  /**
   * Advances past the balanced group starting at the current opener,
   * stopping right after the matching closer.
   */
  skipBrackets(): void {
    this.pos = this.findClosingBracket() + 1
  }

  /**
   * Skips an attribute-specifier sequence: any mix of `[[...]]`,
   * `__attribute__((...))`, `__declspec(...)` and `alignas(...)`.
   */
  skipAttribute(): boolean {
    let skipped = false
    for (;;) {
      if (this.peek().text === '[' && this.peek(1).text === '[') {
        this.skipBrackets()
      } else if (
        this.skipIf('__attribute__', true) ||
        this.skipIf('__attribute', true) ||
        this.skipIf('__declspec', true) ||
        this.skipIf('alignas', true)
      ) {
        if (this.peek().text === '(') this.skipBrackets()
      } else {
        return skipped
      }
      skipped = true
    }
  }
}
