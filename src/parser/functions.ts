// Entry points per function-like cursor kind.
//
// Each one builds the skeleton from the front end (name, result type,
// parameters), then scans the tokens: prefix up to the name, the parameter
// list, then the suffix.

import type { ParseContext } from './context'
import { DeclaratorParser } from './parser'
import { addParameters } from './parameters'
import { reconcileVirtualInfo } from './virtual'
import { ConversionOpBuilder, FunctionBuilder, MemberFunctionBuilder } from '../ast/builders'
import type { MemberBuilderBase } from '../ast/builders'
import type * as AST from '../ast/nodes'
import { assertInternal } from '../errors'
import type { Cursor, FunctionCursor } from '../oracle/cursor'

// Register the prototype methods used below
import './prefix'
import './suffix'

function parseFunctionImpl(context: ParseContext, cursor: FunctionCursor): AST.FunctionEntity {
  const builder = new FunctionBuilder(
    cursor.spelling,
    context.types.parseType(context, cursor.resultType),
    cursor.extent,
  )
  addParameters(context, builder, cursor)
  if (cursor.isVariadic) builder.isVariadic()
  builder.storageClass(cursor.storageClass)

  const parser = new DeclaratorParser(context, cursor)
  const prefix = parser.parsePrefixInfo(cursor.spelling)
  assertInternal(!prefix.isVirtual, cursor, 'free function cannot be virtual')
  if (prefix.isConstexpr) builder.isConstexpr()

  parser.skipParameters()

  const suffix = parser.parseSuffixInfo()
  assertInternal(
    suffix.cvQualifier === 'None' && suffix.refQualifier === 'None' && suffix.virtualFlags === null,
    cursor,
    'unexpected tokens in function suffix',
  )
  if (suffix.noexceptCondition !== null) builder.noexceptCondition(suffix.noexceptCondition)

  return builder.finish(context.index, cursor.usr, suffix.bodyKind)
}

export function parseFunction(context: ParseContext, cursor: Cursor): AST.FunctionEntity {
  assertInternal(cursor.kind === 'FunctionDecl', cursor, `expected a function, got ${cursor.kind}`)
  return parseFunctionImpl(context, cursor)
}

// Static member functions have no implicit object: they are resolved like
// free functions. Returns null for any other member function.
export function tryParseStaticFunction(
  context: ParseContext,
  cursor: Cursor,
): AST.FunctionEntity | null {
  assertInternal(cursor.kind === 'CXXMethod', cursor, `expected a method, got ${cursor.kind}`)
  return cursor.isStatic ? parseFunctionImpl(context, cursor) : null
}

// Shared by member functions and conversion operators
function handleSuffix<E extends AST.MemberEntity>(
  parser: DeclaratorParser,
  builder: MemberBuilderBase<E>,
  virtualKeyword: boolean,
): E {
  const suffix = parser.parseSuffixInfo()
  builder.cvRefQualifier(suffix.cvQualifier, suffix.refQualifier)
  if (suffix.noexceptCondition !== null) builder.noexceptCondition(suffix.noexceptCondition)

  const virtualInfo = reconcileVirtualInfo(parser.cursor, virtualKeyword, suffix)
  if (virtualInfo !== null) builder.virtualInfo(virtualInfo)

  return builder.finish(parser.context.index, parser.cursor.usr, suffix.bodyKind)
}

export function parseMemberFunction(context: ParseContext, cursor: Cursor): AST.MemberFunctionEntity {
  assertInternal(cursor.kind === 'CXXMethod', cursor, `expected a method, got ${cursor.kind}`)
  const builder = new MemberFunctionBuilder(
    cursor.spelling,
    context.types.parseType(context, cursor.resultType),
    cursor.extent,
  )
  addParameters(context, builder, cursor)
  if (cursor.isVariadic) builder.isVariadic()

  const parser = new DeclaratorParser(context, cursor)
  const prefix = parser.parsePrefixInfo(cursor.spelling)
  if (prefix.isConstexpr) builder.isConstexpr()

  parser.skipParameters()
  return handleSuffix(parser, builder, prefix.isVirtual)
}

export function parseConversionOp(context: ParseContext, cursor: Cursor): AST.ConversionOpEntity {
  assertInternal(
    cursor.kind === 'ConversionFunction',
    cursor,
    `expected a conversion function, got ${cursor.kind}`,
  )
  const builder = new ConversionOpBuilder(context.types.parseType(context, cursor.resultType), cursor.extent)

  const parser = new DeclaratorParser(context, cursor)
  const prefix = parser.parseConversionPrefix()
  if (prefix.isConstexpr) builder.isConstexpr()
  if (prefix.isExplicit) builder.isExplicit()

  parser.skipConversionArguments()
  return handleSuffix(parser, builder, prefix.isVirtual)
}
