// ---------------------------------------------------------------------------
// Entity builders -- collect declarator facts, then finish() into an entity
// ---------------------------------------------------------------------------
//
// One builder per entity kind. They share the function-like base so that
// parameter handling and the suffix resolution can be written once against
// FunctionBaseBuilder / MemberBuilderBase.

import type {
  BodyKind,
  ConversionOpEntity,
  CppType,
  CvQualifier,
  Expression,
  FunctionBase,
  FunctionEntity,
  FunctionLikeEntity,
  FunctionParameter,
  MemberEntity,
  MemberFunctionEntity,
  RefQualifier,
  StorageClass,
  VirtualFlags,
} from './nodes'
import type { EntityIndex } from './entity-index'
import type { Span } from '../lexer/token'

export function cvSpelling(cv: CvQualifier): string {
  switch (cv) {
    case 'None':
      return ''
    case 'Const':
      return 'const'
    case 'Volatile':
      return 'volatile'
    case 'ConstVolatile':
      return 'const volatile'
  }
}

export function typeToString(type: CppType): string {
  switch (type.type) {
    case 'BuiltinType':
    case 'UserDefinedType':
      return type.name
    case 'PointerType':
      return `${typeToString(type.pointee)}*`
    case 'ReferenceType':
      return `${typeToString(type.referee)}${type.referenceKind === 'LValue' ? '&' : '&&'}`
    case 'CvQualifiedType': {
      const qualifier = cvSpelling(type.cv)
      const inner = typeToString(type.inner)
      return qualifier.length > 0 ? `${qualifier} ${inner}` : inner
    }
    case 'UnexposedType':
      return type.spelling
  }
}

export function buildParameter(
  index: EntityIndex,
  id: string,
  name: string,
  paramType: CppType,
  defaultValue: Expression | null,
  span: Span,
): FunctionParameter {
  const parameter: FunctionParameter = {
    type: 'FunctionParameter',
    id,
    name,
    start: span.start,
    end: span.end,
    paramType,
    defaultValue,
  }
  index.register(parameter)
  return parameter
}

type FunctionBaseFields = Omit<FunctionBase, 'type'>

export abstract class FunctionBaseBuilder<E extends FunctionLikeEntity> {
  protected readonly name: string
  protected readonly returnType: CppType
  protected readonly span: Span
  private parameters: FunctionParameter[]
  private variadic: boolean
  private constexpr: boolean
  private noexcept: Expression | null

  constructor(name: string, returnType: CppType, span: Span) {
    this.name = name
    this.returnType = returnType
    this.span = span
    this.parameters = []
    this.variadic = false
    this.constexpr = false
    this.noexcept = null
  }

  addParameter(parameter: FunctionParameter): void {
    this.parameters.push(parameter)
  }

  isVariadic(): void {
    this.variadic = true
  }

  isConstexpr(): void {
    this.constexpr = true
  }

  noexceptCondition(condition: Expression): void {
    this.noexcept = condition
  }

  finish(index: EntityIndex, id: string, bodyKind: BodyKind): E {
    const entity = this.build({
      id,
      name: this.name,
      start: this.span.start,
      end: this.span.end,
      returnType: this.returnType,
      parameters: [...this.parameters],
      isVariadic: this.variadic,
      isConstexpr: this.constexpr,
      noexceptCondition: this.noexcept,
      bodyKind,
    })
    index.register(entity)
    return entity
  }

  protected abstract build(fields: FunctionBaseFields): E
}

export class FunctionBuilder extends FunctionBaseBuilder<FunctionEntity> {
  private storage: StorageClass = 'None'

  storageClass(storage: StorageClass): void {
    this.storage = storage
  }

  protected build(fields: FunctionBaseFields): FunctionEntity {
    return { ...fields, type: 'Function', storageClass: this.storage }
  }
}

export abstract class MemberBuilderBase<E extends MemberEntity> extends FunctionBaseBuilder<E> {
  protected cv: CvQualifier = 'None'
  protected ref: RefQualifier = 'None'
  protected virtualFlags: VirtualFlags | null = null

  cvRefQualifier(cv: CvQualifier, ref: RefQualifier): void {
    this.cv = cv
    this.ref = ref
  }

  virtualInfo(flags: VirtualFlags): void {
    this.virtualFlags = flags
  }
}

export class MemberFunctionBuilder extends MemberBuilderBase<MemberFunctionEntity> {
  protected build(fields: FunctionBaseFields): MemberFunctionEntity {
    return {
      ...fields,
      type: 'MemberFunction',
      cvQualifier: this.cv,
      refQualifier: this.ref,
      virtualInfo: this.virtualFlags,
    }
  }
}

export class ConversionOpBuilder extends MemberBuilderBase<ConversionOpEntity> {
  private explicit = false

  // The name of a conversion operator is derived from its target type
  constructor(targetType: CppType, span: Span) {
    super(`operator ${typeToString(targetType)}`, targetType, span)
  }

  isExplicit(): void {
    this.explicit = true
  }

  protected build(fields: FunctionBaseFields): ConversionOpEntity {
    return {
      ...fields,
      type: 'ConversionOp',
      cvQualifier: this.cv,
      refQualifier: this.ref,
      virtualInfo: this.virtualFlags,
      isExplicit: this.explicit,
    }
  }
}
