// Default expression parser. Expressions are kept opaque: the tokens are
// joined back into a spelling, literals are told apart from the rest.

import type { ExpressionParser, ParseContext } from './context'
import type { TokenStream } from './stream'
import { TokenKind, isLiteral } from '../lexer/token'
import type { Token } from '../lexer/token'
import { Tokenizer } from '../lexer/tokenizer'
import type * as AST from '../ast/nodes'
import { ParseError } from '../errors'
import { isLiteralCursor } from '../oracle/cursor'
import type { Cursor } from '../oracle/cursor'

const LITERAL_KEYWORDS: ReadonlySet<string> = new Set(['true', 'false', 'nullptr'])

function isLiteralToken(token: Token): boolean {
  return isLiteral(token.kind) || (token.kind === TokenKind.Keyword && LITERAL_KEYWORDS.has(token.text))
}

// Whitespace between tokens collapses to one space: `a  +\n b` -> `a + b`,
// `f(x)` stays `f(x)`.
export function spellTokens(tokens: readonly Token[]): string {
  let out = ''
  let prev: Token | null = null
  for (const token of tokens) {
    if (prev !== null && prev.end < token.start) {
      out += ' '
    }
    out += token.text
    prev = token
  }
  return out
}

function buildExpression(tokens: readonly Token[], exprType: AST.CppType, literal: boolean): AST.Expression {
  const start = tokens[0].start
  const end = tokens[tokens.length - 1].end
  const spelling = spellTokens(tokens)
  if (literal || (tokens.length === 1 && isLiteralToken(tokens[0]))) {
    return { type: 'LiteralExpression', exprType, value: spelling, start, end }
  }
  return { type: 'UnexposedExpression', exprType, spelling, start, end }
}

export const defaultExpressionParser: ExpressionParser = {
  parseExpression(context: ParseContext, cursor: Cursor): AST.Expression {
    if (cursor.type === null) {
      throw new ParseError({ message: 'expression has no type', cursor })
    }
    const exprType = context.types.parseType(context, cursor.type)
    const tokens = new Tokenizer(context.tu, cursor).tokens
    if (tokens.length === 0) {
      throw new ParseError({ message: 'empty expression', cursor })
    }
    return buildExpression(tokens, exprType, isLiteralCursor(cursor))
  },

  parseRawExpression(
    _context: ParseContext,
    stream: TokenStream,
    end: number,
    type: AST.CppType,
  ): AST.Expression {
    const tokens: Token[] = []
    while (stream.position < end && !stream.done()) {
      tokens.push(stream.peek())
      stream.bump()
    }
    if (tokens.length === 0) {
      throw new ParseError({ message: 'empty expression', cursor: stream.cursor })
    }
    return buildExpression(tokens, type, false)
  },
}
