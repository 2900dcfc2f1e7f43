import { FunctionBuilder } from '../src/ast/builders'
import { LOG_SOURCE } from '../src/diagnostics'
import { ParseError } from '../src/errors'
import { addParameters, parseParameter } from '../src/parser/parameters'
import {
  builtin,
  expressionCursor,
  functionCursor,
  paramCursor,
  plainCursor,
  record,
  testContext,
  translationUnit,
} from './helpers/cursors'

const INT = { type: 'BuiltinType', name: 'int' }

describe('parseParameter', () => {
  it('takes name and type from the front end', () => {
    const tu = translationUnit('void f(int count);')
    const { context } = testContext(tu)
    const parameter = parseParameter(context, paramCursor(tu, 'int count', 'count', builtin('int')))
    expect(parameter).toEqual({
      type: 'FunctionParameter',
      id: 'c:@P@7@count',
      name: 'count',
      start: 7,
      end: 16,
      paramType: INT,
      defaultValue: null,
    })
  })

  it('parses a literal default value', () => {
    const tu = translationUnit('void f(int count = 42);')
    const { context } = testContext(tu)
    const value = expressionCursor(tu, '42', builtin('int'), 'IntegerLiteral')
    const parameter = parseParameter(context, paramCursor(tu, 'int count = 42', 'count', builtin('int'), [value]))
    expect(parameter.defaultValue).toEqual({
      type: 'LiteralExpression',
      exprType: INT,
      value: '42',
      start: 19,
      end: 21,
    })
  })

  it('ignores type references and keeps other defaults opaque', () => {
    const source = 'void f(std::string name = std::string("x"));'
    const tu = translationUnit(source)
    const { context } = testContext(tu)
    const typeRef = plainCursor(tu, 'TypeRef', 'string')
    const value = expressionCursor(tu, 'std::string("x")', record('std::string'), 'CallExpr')
    const parameter = parseParameter(
      context,
      paramCursor(tu, 'std::string name = std::string("x")', 'name', record('std::string'), [typeRef, value]),
    )
    expect(parameter.paramType).toEqual({ type: 'UserDefinedType', name: 'std::string' })
    expect(parameter.defaultValue).toMatchObject({ type: 'UnexposedExpression', spelling: 'std::string("x")' })
  })

  it.each([
    ['x - -y', 'x - -y'],
    ['p / *q', 'p / *q'],
    ['(a  +\n  b)', '(a + b)'],
  ])('keeps the token separation of %j', (written, spelled) => {
    const tu = translationUnit(`void f(int d = ${written});`)
    const { context } = testContext(tu)
    const value = expressionCursor(tu, written, builtin('int'), 'BinaryOperator')
    const parameter = parseParameter(context, paramCursor(tu, `int d = ${written}`, 'd', builtin('int'), [value]))
    expect(parameter.defaultValue).toMatchObject({ type: 'UnexposedExpression', spelling: spelled })
  })

  it('treats a bool keyword default as a literal', () => {
    const tu = translationUnit('void f(bool quiet = false);')
    const { context } = testContext(tu)
    const value = expressionCursor(tu, 'false', builtin('bool'))
    const parameter = parseParameter(context, paramCursor(tu, 'bool quiet = false', 'quiet', builtin('bool'), [value]))
    expect(parameter.defaultValue).toMatchObject({ type: 'LiteralExpression', value: 'false' })
  })

  it('rejects a second expression child', () => {
    const tu = translationUnit('void f(int a = 1 2);')
    const { context } = testContext(tu)
    const children = [
      expressionCursor(tu, '1', builtin('int'), 'IntegerLiteral'),
      expressionCursor(tu, '2', builtin('int'), 'IntegerLiteral'),
    ]
    const cursor = paramCursor(tu, 'int a = 1 2', 'a', builtin('int'), children)
    expect(() => parseParameter(context, cursor)).toThrow(ParseError)
    expect(() => parseParameter(context, cursor)).toThrow('unexpected child cursor of function parameter')
  })

  it('registers the parameter in the index', () => {
    const tu = translationUnit('void f(int count);')
    const { context } = testContext(tu)
    const parameter = parseParameter(context, paramCursor(tu, 'int count', 'count', builtin('int')))
    expect(context.index.lookup('c:@P@7@count')).toBe(parameter)
  })
})

describe('addParameters', () => {
  const source = 'void configure(int width,\n               int height = oops oops,\n               bool visible = true);'

  function configureCursor() {
    const tu = translationUnit(source)
    const height = paramCursor(tu, 'int height = oops oops', 'height', builtin('int'), [
      expressionCursor(tu, 'oops', builtin('int'), 'DeclRefExpr'),
      expressionCursor(tu, 'oops', builtin('int'), 'DeclRefExpr', source.indexOf('oops') + 4),
    ])
    const cursor = functionCursor(tu, source.slice(0, -1), 'configure', {
      children: [
        paramCursor(tu, 'int width', 'width', builtin('int')),
        height,
        paramCursor(tu, 'bool visible = true', 'visible', builtin('bool'), [
          expressionCursor(tu, 'true', builtin('bool'), 'CXXBoolLiteralExpr'),
        ]),
      ],
    })
    return { tu, cursor }
  }

  it('drops a parameter that fails and keeps the others', () => {
    const { tu, cursor } = configureCursor()
    const { context } = testContext(tu)
    const builder = new FunctionBuilder('configure', { type: 'BuiltinType', name: 'void' }, cursor.extent)
    addParameters(context, builder, cursor)
    const entity = builder.finish(context.index, cursor.usr, 'Declaration')
    expect(entity.parameters.map((p) => p.name)).toEqual(['width', 'visible'])
  })

  it('logs the failure with its location', () => {
    const { tu, cursor } = configureCursor()
    const { context, collector } = testContext(tu)
    const builder = new FunctionBuilder('configure', { type: 'BuiltinType', name: 'void' }, cursor.extent)
    addParameters(context, builder, cursor)
    expect(collector.entries).toEqual([
      {
        source: LOG_SOURCE,
        diagnostic: {
          severity: 'error',
          message: 'unexpected child cursor of function parameter',
          location: { file: 'test.cpp', line: 2, column: 33, entity: null },
        },
      },
    ])
    expect(collector.errorCount).toBe(1)
  })

  it('ignores children that are not parameters', () => {
    const tu = translationUnit('void f(int a) [[deprecated]];')
    const { context } = testContext(tu)
    const cursor = functionCursor(tu, 'void f(int a) [[deprecated]]', 'f', {
      children: [plainCursor(tu, 'UnexposedDecl', '[[deprecated]]'), paramCursor(tu, 'int a', 'a', builtin('int'))],
    })
    const builder = new FunctionBuilder('f', { type: 'BuiltinType', name: 'void' }, cursor.extent)
    addParameters(context, builder, cursor)
    expect(builder.finish(context.index, cursor.usr, 'Declaration').parameters).toHaveLength(1)
  })
})
