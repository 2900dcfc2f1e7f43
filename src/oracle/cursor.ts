// ---------------------------------------------------------------------------
// Oracle interface -- the facts a C++ front end reports about a declaration
// ---------------------------------------------------------------------------
//
// The front end has already accepted the source. It is trusted for what it
// reports, but it does not expose cv/ref qualifiers, exception
// specifications, virt-specifiers or defaulted/deleted bodies; those are
// recovered from the declaration's tokens.

import type { Span } from '../lexer/token'
import type { StorageClass } from '../ast/nodes'

export interface TranslationUnit {
  path: string
  source: string
}

export type TypeKind =
  | 'Invalid'
  | 'Builtin'
  | 'Record'
  | 'Enum'
  | 'Typedef'
  | 'Elaborated'
  | 'Pointer'
  | 'LValueReference'
  | 'RValueReference'
  | 'Unexposed'

export interface TypeHandle {
  kind: TypeKind
  // As printed by the front end, e.g. 'const char *'
  spelling: string
  isConst?: boolean
  isVolatile?: boolean
  // Pointer and reference types only
  pointee?: TypeHandle
}

export type FunctionCursorKind = 'FunctionDecl' | 'CXXMethod' | 'ConversionFunction'

export type ContainerCursorKind =
  | 'Namespace'
  | 'ClassDecl'
  | 'StructDecl'
  | 'UnionDecl'
  | 'ClassTemplate'

export type ReferenceCursorKind = 'TypeRef' | 'TemplateRef' | 'NamespaceRef' | 'MemberRef'

export type LiteralCursorKind =
  | 'IntegerLiteral'
  | 'FloatingLiteral'
  | 'StringLiteral'
  | 'CharacterLiteral'
  | 'CXXBoolLiteralExpr'
  | 'CXXNullPtrLiteralExpr'

export type ExpressionCursorKind =
  | LiteralCursorKind
  | 'UnexposedExpr'
  | 'DeclRefExpr'
  | 'CallExpr'
  | 'UnaryOperator'
  | 'BinaryOperator'
  | 'ParenExpr'
  | 'InitListExpr'

export type CursorKind =
  | FunctionCursorKind
  | ContainerCursorKind
  | ReferenceCursorKind
  | ExpressionCursorKind
  | 'ParmDecl'
  | 'FieldDecl'
  | 'VarDecl'
  | 'UnexposedDecl'

interface CursorBase {
  // Unified symbol reference; stable id of the entity
  usr: string
  // Name as reported by the front end, e.g. 'f' or 'operator+'
  spelling: string
  extent: Span
  type: TypeHandle | null
  children: readonly Cursor[]
}

export interface FunctionCursor extends CursorBase {
  kind: FunctionCursorKind
  resultType: TypeHandle
  storageClass: StorageClass
  isVariadic: boolean
  isDefinition: boolean
  isStatic: boolean
  isVirtual: boolean
  isPureVirtual: boolean
  // Base class methods this method overrides
  overriddenCursors: readonly Cursor[]
}

export interface PlainCursor extends CursorBase {
  kind: Exclude<CursorKind, FunctionCursorKind>
}

export type Cursor = FunctionCursor | PlainCursor

export function isContainerCursor(cursor: Cursor): boolean {
  switch (cursor.kind) {
    case 'Namespace':
    case 'ClassDecl':
    case 'StructDecl':
    case 'UnionDecl':
    case 'ClassTemplate':
      return true
    default:
      return false
  }
}

export function isReferenceCursor(cursor: Cursor): boolean {
  switch (cursor.kind) {
    case 'TypeRef':
    case 'TemplateRef':
    case 'NamespaceRef':
    case 'MemberRef':
      return true
    default:
      return false
  }
}

export function isLiteralCursor(cursor: Cursor): boolean {
  switch (cursor.kind) {
    case 'IntegerLiteral':
    case 'FloatingLiteral':
    case 'StringLiteral':
    case 'CharacterLiteral':
    case 'CXXBoolLiteralExpr':
    case 'CXXNullPtrLiteralExpr':
      return true
    default:
      return false
  }
}

export function isExpressionCursor(cursor: Cursor): boolean {
  switch (cursor.kind) {
    case 'UnexposedExpr':
    case 'DeclRefExpr':
    case 'CallExpr':
    case 'UnaryOperator':
    case 'BinaryOperator':
    case 'ParenExpr':
    case 'InitListExpr':
      return true
    default:
      return isLiteralCursor(cursor)
  }
}
