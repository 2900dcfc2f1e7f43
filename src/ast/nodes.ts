// ---------------------------------------------------------------------------
// C++ entity model -- functions, member functions and conversion operators
// ---------------------------------------------------------------------------

// ---- Source Position ----
export interface SourcePosition {
  line: number // 1-based
  column: number // 0-based
}

// ---- Qualifiers and kinds ----
export type CvQualifier = 'None' | 'Const' | 'Volatile' | 'ConstVolatile'

export type RefQualifier = 'None' | 'LValue' | 'RValue'

export type BodyKind = 'Declaration' | 'Definition' | 'Defaulted' | 'Deleted'

export type StorageClass = 'None' | 'Static' | 'Extern'

// ---- Virtual specifiers ----
// A bit set over the masks below. `null` (not virtual) and `0` (virtual,
// no specifiers written) are different states.
export type VirtualFlags = number

export const VIRTUAL_PURE = 1 << 0
export const VIRTUAL_OVERRIDE = 1 << 1
export const VIRTUAL_FINAL = 1 << 2

export function hasVirtualFlag(flags: VirtualFlags | null, mask: number): boolean {
  return flags !== null && (flags & mask) !== 0
}

export function withVirtualFlag(flags: VirtualFlags | null, mask: number): VirtualFlags {
  return (flags ?? 0) | mask
}

// ---- Types ----
export type CppType =
  | BuiltinType
  | UserDefinedType
  | PointerType
  | ReferenceType
  | CvQualifiedType
  | UnexposedType

export interface BuiltinType {
  type: 'BuiltinType'
  name: string
}

export interface UserDefinedType {
  type: 'UserDefinedType'
  name: string
}

export interface PointerType {
  type: 'PointerType'
  pointee: CppType
}

export interface ReferenceType {
  type: 'ReferenceType'
  referee: CppType
  referenceKind: 'LValue' | 'RValue'
}

export interface CvQualifiedType {
  type: 'CvQualifiedType'
  inner: CppType
  cv: CvQualifier
}

export interface UnexposedType {
  type: 'UnexposedType'
  spelling: string
}

// ---- Expressions ----
// Captured opaquely: default arguments and noexcept conditions.
export type Expression = LiteralExpression | UnexposedExpression

export interface LiteralExpression {
  type: 'LiteralExpression'
  exprType: CppType
  value: string
  start: number
  end: number
}

export interface UnexposedExpression {
  type: 'UnexposedExpression'
  exprType: CppType
  spelling: string
  start: number
  end: number
}

// ---- Entities ----
export interface BaseEntity {
  readonly type: string
  // Unified symbol reference reported by the front end
  readonly id: string
  readonly name: string
  readonly start: number
  readonly end: number
}

export interface FunctionParameter extends BaseEntity {
  readonly type: 'FunctionParameter'
  readonly paramType: CppType
  readonly defaultValue: Expression | null
}

export interface FunctionBase extends BaseEntity {
  readonly returnType: CppType
  readonly parameters: readonly FunctionParameter[]
  readonly isVariadic: boolean
  readonly isConstexpr: boolean
  readonly noexceptCondition: Expression | null
  readonly bodyKind: BodyKind
}

export interface FunctionEntity extends FunctionBase {
  readonly type: 'Function'
  readonly storageClass: StorageClass
}

export interface MemberFunctionEntity extends FunctionBase {
  readonly type: 'MemberFunction'
  readonly cvQualifier: CvQualifier
  readonly refQualifier: RefQualifier
  readonly virtualInfo: VirtualFlags | null
}

export interface ConversionOpEntity extends FunctionBase {
  readonly type: 'ConversionOp'
  readonly cvQualifier: CvQualifier
  readonly refQualifier: RefQualifier
  readonly virtualInfo: VirtualFlags | null
  readonly isExplicit: boolean
}

export type MemberEntity = MemberFunctionEntity | ConversionOpEntity

export type FunctionLikeEntity = FunctionEntity | MemberEntity

export type Entity = FunctionParameter | FunctionLikeEntity
