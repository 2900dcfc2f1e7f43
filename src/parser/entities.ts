// Batch driver over the front end's cursor tree.

import type { ParseContext } from './context'
import {
  parseConversionOp,
  parseFunction,
  parseMemberFunction,
  tryParseStaticFunction,
} from './functions'
import type * as AST from '../ast/nodes'
import { LOG_SOURCE, diagnosticFor } from '../diagnostics'
import { InternalError, ParseError } from '../errors'
import { isContainerCursor } from '../oracle/cursor'
import type { Cursor } from '../oracle/cursor'

export interface DriverOptions {
  // Rethrow InternalError instead of logging it and going on
  fatalInternalErrors: boolean
}

// null for cursors that are not function-like
export function parseEntity(context: ParseContext, cursor: Cursor): AST.FunctionLikeEntity | null {
  switch (cursor.kind) {
    case 'FunctionDecl':
      return parseFunction(context, cursor)
    case 'CXXMethod':
      return tryParseStaticFunction(context, cursor) ?? parseMemberFunction(context, cursor)
    case 'ConversionFunction':
      return parseConversionOp(context, cursor)
    default:
      return null
  }
}

/**
 * Resolves every function-like cursor in `cursors`, descending into
 * namespaces and classes. A declaration that fails is logged and skipped.
 */
export function parseEntities(
  context: ParseContext,
  cursors: readonly Cursor[],
  options: DriverOptions,
): AST.FunctionLikeEntity[] {
  const entities: AST.FunctionLikeEntity[] = []

  const visit = (cursor: Cursor): void => {
    if (isContainerCursor(cursor)) {
      for (const child of cursor.children) visit(child)
      return
    }
    try {
      const entity = parseEntity(context, cursor)
      if (entity !== null) entities.push(entity)
    } catch (err) {
      if (err instanceof ParseError || (err instanceof InternalError && !options.fatalInternalErrors)) {
        context.logger.log(LOG_SOURCE, diagnosticFor(context.tu, err, cursor))
      } else {
        throw err
      }
    }
  }

  for (const cursor of cursors) visit(cursor)
  return entities
}
