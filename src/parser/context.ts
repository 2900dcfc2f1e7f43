import type { TokenStream } from './stream'
import type { EntityIndex } from '../ast/entity-index'
import type * as AST from '../ast/nodes'
import type { Logger } from '../diagnostics'
import type { Cursor, TranslationUnit, TypeHandle } from '../oracle/cursor'

/**
 * Converts a front-end type handle into the entity model's types.
 * May throw a ParseError.
 */
export interface TypeParser {
  parseType(context: ParseContext, handle: TypeHandle): AST.CppType
}

export interface ExpressionParser {
  // An expression the front end exposes as a child cursor
  parseExpression(context: ParseContext, cursor: Cursor): AST.Expression
  // The tokens from the stream's position up to `end` (exclusive), with a
  // result type fixed by the caller
  parseRawExpression(
    context: ParseContext,
    stream: TokenStream,
    end: number,
    type: AST.CppType,
  ): AST.Expression
}

/**
 * Everything a declaration is resolved against. Passed explicitly through
 * every call; nothing here is global.
 */
export interface ParseContext {
  readonly tu: TranslationUnit
  readonly index: EntityIndex
  readonly logger: Logger
  readonly types: TypeParser
  readonly expressions: ExpressionParser
}
