import { resolve, formatDiagnostic, InternalError, LOG_SOURCE } from '../src/index'
import type { Diagnostic, Logger, TypeParser } from '../src/index'
import { VIRTUAL_OVERRIDE, VIRTUAL_PURE } from '../src/ast/nodes'
import type { Cursor, TypeHandle } from '../src/oracle/cursor'
import {
  builtin,
  conversionCursor,
  expressionCursor,
  functionCursor,
  lvalueRef,
  methodCursor,
  paramCursor,
  plainCursor,
  record,
  translationUnit,
} from './helpers/cursors'

const SHAPES = [
  'namespace geo {',
  'struct Shape {',
  '  virtual double area() const = 0;',
  '  static Shape* make(int sides);',
  '  int id;',
  '};',
  'struct Square : Shape {',
  '  double area() const override;',
  '  explicit operator bool() const;',
  '};',
  'void scale(Shape& shape, double factor = 2.0, int steps = bad bad);',
  '}',
].join('\n')

function shapes() {
  const tu = translationUnit(SHAPES, 'shapes.cpp')
  const shapePtr: TypeHandle = { kind: 'Pointer', spelling: 'Shape *', pointee: record('Shape') }

  const shapeArea = methodCursor(tu, 'virtual double area() const = 0', 'area', {
    usr: 'c:@N@geo@S@Shape@F@area#1',
    resultType: builtin('double'),
    isVirtual: true,
    isPureVirtual: true,
  })
  const make = methodCursor(tu, 'static Shape* make(int sides)', 'make', {
    usr: 'c:@N@geo@S@Shape@F@make#I#S',
    resultType: shapePtr,
    storageClass: 'Static',
    isStatic: true,
    children: [paramCursor(tu, 'int sides', 'sides', builtin('int'))],
  })
  const shape: Cursor = {
    ...plainCursor(tu, 'StructDecl', 'struct Shape {'),
    children: [shapeArea, make, plainCursor(tu, 'FieldDecl', 'int id')],
  }

  const squareArea = methodCursor(tu, 'double area() const override', 'area', {
    usr: 'c:@N@geo@S@Square@F@area#1',
    resultType: builtin('double'),
    isVirtual: true,
    overriddenCursors: [shapeArea],
  })
  const toBool = conversionCursor(tu, 'explicit operator bool() const', builtin('bool'), {
    usr: 'c:@N@geo@S@Square@F@operator bool#1',
  })
  const square: Cursor = {
    ...plainCursor(tu, 'StructDecl', 'struct Square : Shape {'),
    children: [squareArea, toBool],
  }

  const firstBad = SHAPES.indexOf('bad')
  const scale = functionCursor(tu, 'void scale(Shape& shape, double factor = 2.0, int steps = bad bad)', 'scale', {
    usr: 'c:@N@geo@F@scale#&$@N@geo@S@Shape#d#I#',
    children: [
      paramCursor(tu, 'Shape& shape', 'shape', lvalueRef(record('Shape'))),
      paramCursor(tu, 'double factor = 2.0', 'factor', builtin('double'), [
        expressionCursor(tu, '2.0', builtin('double'), 'FloatingLiteral'),
      ]),
      paramCursor(tu, 'int steps = bad bad', 'steps', builtin('int'), [
        expressionCursor(tu, 'bad', builtin('int'), 'DeclRefExpr', firstBad),
        expressionCursor(tu, 'bad', builtin('int'), 'DeclRefExpr', firstBad + 1),
      ]),
    ],
  })

  const namespace: Cursor = {
    ...plainCursor(tu, 'Namespace', 'namespace geo {'),
    children: [shape, square, scale],
  }
  return { tu, cursors: [namespace] }
}

describe('resolve', () => {
  it('resolves every function-like declaration in order', () => {
    const { tu, cursors } = shapes()
    const { entities } = resolve(tu, cursors)
    expect(entities.map((e) => [e.type, e.name])).toEqual([
      ['MemberFunction', 'area'],
      ['Function', 'make'],
      ['MemberFunction', 'area'],
      ['ConversionOp', 'operator bool'],
      ['Function', 'scale'],
    ])
  })

  it('recovers the declarator facts of each entity', () => {
    const { tu, cursors } = shapes()
    const [shapeArea, make, squareArea, toBool, scale] = resolve(tu, cursors).entities

    expect(shapeArea).toMatchObject({ cvQualifier: 'Const', virtualInfo: VIRTUAL_PURE, bodyKind: 'Declaration' })
    expect(make).toMatchObject({
      storageClass: 'Static',
      returnType: { type: 'PointerType', pointee: { type: 'UserDefinedType', name: 'Shape' } },
    })
    expect(squareArea).toMatchObject({ cvQualifier: 'Const', virtualInfo: VIRTUAL_OVERRIDE })
    expect(toBool).toMatchObject({ isExplicit: true, cvQualifier: 'Const', virtualInfo: null })
    expect(scale.parameters.map((p) => p.name)).toEqual(['shape', 'factor'])
    expect(scale.parameters[0].paramType).toEqual({
      type: 'ReferenceType',
      referee: { type: 'UserDefinedType', name: 'Shape' },
      referenceKind: 'LValue',
    })
    expect(scale.parameters[1].defaultValue).toMatchObject({ type: 'LiteralExpression', value: '2.0' })
  })

  it('reports a malformed default argument without losing the declaration', () => {
    const { tu, cursors } = shapes()
    const result = resolve(tu, cursors)
    expect(result.diagnostics).toEqual([
      {
        severity: 'error',
        message: 'unexpected child cursor of function parameter',
        location: { file: 'shapes.cpp', line: 11, column: 62, entity: null },
      },
    ])
    expect(result.errorCount).toBe(1)
  })

  it('registers entities and parameters in the index', () => {
    const { tu, cursors } = shapes()
    const { entities, index } = resolve(tu, cursors)
    expect(index.lookup('c:@N@geo@S@Square@F@area#1')).toBe(entities[2])
    expect(index.lookup('c:@N@geo@F@scale#&$@N@geo@S@Shape#d#I#')).toBe(entities[4])
    expect(index.lookup('c:@N@geo@F@missing')).toBeNull()
    // 5 entities and 3 parameters: sides, shape, factor
    expect(index.size).toBe(8)
  })

  it('forwards diagnostics to the caller logger', () => {
    const { tu, cursors } = shapes()
    const lines: string[] = []
    const logger: Logger = {
      log(source: string, diagnostic: Diagnostic) {
        lines.push(formatDiagnostic(source, diagnostic))
      },
    }
    resolve(tu, cursors, { logger })
    expect(lines).toEqual([
      `[${LOG_SOURCE}] shapes.cpp:11:62: error: unexpected child cursor of function parameter`,
    ])
  })

  describe('failing declarations', () => {
    const source = 'T make();\nvirtual void broken();\nvoid fine();'
    const tu = translationUnit(source, 'broken.cpp')
    const cursors = [
      functionCursor(tu, 'T make()', 'make', { resultType: { kind: 'Invalid', spelling: 'T' } }),
      functionCursor(tu, 'virtual void broken()', 'broken'),
      functionCursor(tu, 'void fine()', 'fine'),
    ]

    it('logs and skips them by default', () => {
      const result = resolve(tu, cursors)
      expect(result.entities.map((e) => e.name)).toEqual(['fine'])
      expect(result.diagnostics).toEqual([
        {
          severity: 'error',
          message: "invalid type 'T'",
          location: { file: 'broken.cpp', line: 1, column: 0, entity: 'make' },
        },
        {
          severity: 'critical',
          message: 'free function cannot be virtual',
          location: { file: 'broken.cpp', line: 2, column: 0, entity: 'broken' },
        },
      ])
      expect(result.errorCount).toBe(2)
    })

    it('rethrows internal errors when they are fatal', () => {
      expect(() => resolve(tu, cursors, { fatalInternalErrors: true })).toThrow(InternalError)
    })

    it('formats a critical diagnostic with its entity', () => {
      const [, critical] = resolve(tu, cursors).diagnostics
      expect(formatDiagnostic(LOG_SOURCE, critical)).toBe(
        '[declarator parser] broken.cpp:2:0: critical: free function cannot be virtual (broken)',
      )
    })
  })

  describe('redeclarations', () => {
    const source = 'int f();\nint f() { return 1; }'
    const tu = translationUnit(source)
    const declaration = functionCursor(tu, 'int f()', 'f', { resultType: builtin('int') })
    const definition = functionCursor(tu, 'int f() { return 1; }', 'f', {
      resultType: builtin('int'),
      isDefinition: true,
    })

    it('index the definition', () => {
      const forward = resolve(tu, [declaration, definition])
      expect(forward.index.lookup('c:@F@f')).toBe(forward.entities[1])
      const backward = resolve(tu, [definition, declaration])
      expect(backward.index.lookup('c:@F@f')).toBe(backward.entities[0])
    })
  })

  it('uses a caller-supplied type parser', () => {
    const source = 'Opaque make();'
    const tu = translationUnit(source)
    const typeParser: TypeParser = {
      parseType: (_context, handle) => ({ type: 'UnexposedType', spelling: `custom ${handle.spelling}` }),
    }
    const cursor = functionCursor(tu, 'Opaque make()', 'make', { resultType: record('Opaque') })
    const [fn] = resolve(tu, [cursor], { typeParser }).entities
    expect(fn.returnType).toEqual({ type: 'UnexposedType', spelling: 'custom Opaque' })
  })
})
