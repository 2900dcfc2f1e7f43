// Parameter resolution. Names and types come from the front end; only the
// default value is read from the parameter's child cursor.

import type { ParseContext } from './context'
import { buildParameter } from '../ast/builders'
import type { FunctionBaseBuilder } from '../ast/builders'
import type * as AST from '../ast/nodes'
import { LOG_SOURCE, diagnosticFor } from '../diagnostics'
import { ParseError } from '../errors'
import { isExpressionCursor, isReferenceCursor } from '../oracle/cursor'
import type { Cursor, FunctionCursor } from '../oracle/cursor'

export function parseParameter(context: ParseContext, cursor: Cursor): AST.FunctionParameter {
  if (cursor.type === null) {
    throw new ParseError({ message: `parameter '${cursor.spelling}' has no type`, cursor })
  }
  const paramType = context.types.parseType(context, cursor.type)

  let defaultValue: AST.Expression | null = null
  for (const child of cursor.children) {
    // `std::string s`: TypeRef/NamespaceRef children name the type
    if (isReferenceCursor(child)) continue
    if (!isExpressionCursor(child) || defaultValue !== null) {
      throw new ParseError({ message: 'unexpected child cursor of function parameter', cursor: child })
    }
    defaultValue = context.expressions.parseExpression(context, child)
  }

  return buildParameter(context.index, cursor.usr, cursor.spelling, paramType, defaultValue, cursor.extent)
}

/**
 * Adds every parameter that can be resolved. A parameter failing with a
 * ParseError is logged and left out; the rest of the signature stays.
 */
export function addParameters<E extends AST.FunctionLikeEntity>(
  context: ParseContext,
  builder: FunctionBaseBuilder<E>,
  cursor: FunctionCursor,
): void {
  for (const child of cursor.children) {
    if (child.kind !== 'ParmDecl') continue
    try {
      builder.addParameter(parseParameter(context, child))
    } catch (err) {
      if (!(err instanceof ParseError)) throw err
      context.logger.log(LOG_SOURCE, diagnosticFor(context.tu, err, child))
    }
  }
}
