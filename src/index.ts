// Public API for the declarator resolver.
// Usage: import { resolve } from 'cxx-declarator-ts';

import { EntityIndex } from './ast/entity-index'
import * as AST from './ast/nodes'
import { DiagnosticCollector } from './diagnostics'
import type { Diagnostic, Logger } from './diagnostics'
import type { ExpressionParser, ParseContext, TypeParser } from './parser/context'
import { parseEntities } from './parser/entities'
import { defaultExpressionParser } from './parser/expressions'
import { defaultTypeParser } from './parser/types'
import type { Cursor, TranslationUnit } from './oracle/cursor'

export interface ResolveOptions {
  // Receives every diagnostic as it is reported. Default: none
  logger?: Logger
  // Rethrow internal errors instead of dropping the declaration. Default: false
  fatalInternalErrors?: boolean
  typeParser?: TypeParser
  expressionParser?: ExpressionParser
}

export interface ResolveResult {
  entities: AST.FunctionLikeEntity[]
  index: EntityIndex
  diagnostics: Diagnostic[]
  // Diagnostics of severity 'error' or 'critical'
  errorCount: number
}

export function resolve(
  tu: TranslationUnit,
  cursors: readonly Cursor[],
  options?: ResolveOptions,
): ResolveResult {
  const collector = new DiagnosticCollector(options?.logger ?? null)
  const context: ParseContext = {
    tu,
    index: new EntityIndex(),
    logger: collector,
    types: options?.typeParser ?? defaultTypeParser,
    expressions: options?.expressionParser ?? defaultExpressionParser,
  }

  const entities = parseEntities(context, cursors, {
    fatalInternalErrors: options?.fatalInternalErrors ?? false,
  })

  return {
    entities,
    index: context.index,
    diagnostics: collector.diagnostics,
    errorCount: collector.errorCount,
  }
}

// Re-export types for consumers
export { AST }
export { EntityIndex } from './ast/entity-index'
export { typeToString } from './ast/builders'
export { DiagnosticCollector, formatDiagnostic, LOG_SOURCE } from './diagnostics'
export type { Diagnostic, DiagnosticLocation, Logger, Severity } from './diagnostics'
export { DeclaratorError, InternalError, ParseError } from './errors'
export type { ExpressionParser, ParseContext, TypeParser } from './parser/context'
export { defaultExpressionParser } from './parser/expressions'
export { defaultTypeParser } from './parser/types'
export { parseEntities, parseEntity } from './parser/entities'
export type { Cursor, FunctionCursor, TranslationUnit, TypeHandle } from './oracle/cursor'
export { Tokenizer } from './lexer/tokenizer'
export type { Token } from './lexer/token'
