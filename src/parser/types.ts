// Default type parser: front-end type handles to CppType.

import type { ParseContext, TypeParser } from './context'
import type * as AST from '../ast/nodes'
import { ParseError } from '../errors'
import type { TypeHandle } from '../oracle/cursor'

// Front ends print qualifiers into the spelling ('const Foo', 'int const');
// they are kept in CvQualifiedType instead
const LEADING_CV = /^(?:(?:const|volatile)\s+)+/
const TRAILING_CV = /(?:\s+(?:const|volatile))+$/

function cvQualifier(handle: TypeHandle): AST.CvQualifier {
  const isConst = handle.isConst ?? false
  const isVolatile = handle.isVolatile ?? false
  if (isConst && isVolatile) return 'ConstVolatile'
  if (isConst) return 'Const'
  if (isVolatile) return 'Volatile'
  return 'None'
}

function typeName(handle: TypeHandle): string {
  if (cvQualifier(handle) === 'None') return handle.spelling
  return handle.spelling.replace(LEADING_CV, '').replace(TRAILING_CV, '')
}

function pointeeOf(handle: TypeHandle): TypeHandle {
  if (handle.pointee === undefined) {
    throw new ParseError({ message: `missing pointee of type '${handle.spelling}'` })
  }
  return handle.pointee
}

function parseUnqualified(handle: TypeHandle): AST.CppType {
  switch (handle.kind) {
    case 'Invalid':
      throw new ParseError({ message: `invalid type '${handle.spelling}'` })
    case 'Builtin':
      return { type: 'BuiltinType', name: typeName(handle) }
    case 'Record':
    case 'Enum':
    case 'Typedef':
    case 'Elaborated':
      return { type: 'UserDefinedType', name: typeName(handle) }
    case 'Pointer':
      return { type: 'PointerType', pointee: parseTypeHandle(pointeeOf(handle)) }
    case 'LValueReference':
      return { type: 'ReferenceType', referee: parseTypeHandle(pointeeOf(handle)), referenceKind: 'LValue' }
    case 'RValueReference':
      return { type: 'ReferenceType', referee: parseTypeHandle(pointeeOf(handle)), referenceKind: 'RValue' }
    case 'Unexposed':
      return { type: 'UnexposedType', spelling: typeName(handle) }
  }
}

export function parseTypeHandle(handle: TypeHandle): AST.CppType {
  const inner = parseUnqualified(handle)
  const cv = cvQualifier(handle)
  return cv === 'None' ? inner : { type: 'CvQualifiedType', inner, cv }
}

export const defaultTypeParser: TypeParser = {
  parseType(_context: ParseContext, handle: TypeHandle): AST.CppType {
    return parseTypeHandle(handle)
  },
}
