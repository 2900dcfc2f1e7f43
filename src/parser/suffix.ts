// Suffix resolution: everything after the parameter list.
//
// Grammar order handled here:
//   ( params ) attributes cv ref throw(...) noexcept[(expr)]
//     [ ) (...) ]                 leftovers of a function-pointer return type
//     [ -> trailing-type ]
//     override/final
//     [ = default | = delete | = 0 ]

import { DeclaratorParser, defaultSuffixInfo } from './parser'
import type { SuffixInfo } from './parser'
import { isOpeningBracket } from './stream'
import type * as AST from '../ast/nodes'
import { VIRTUAL_FINAL, VIRTUAL_OVERRIDE, VIRTUAL_PURE, withVirtualFlag } from '../ast/nodes'
import { assertInternal, unreachable } from '../errors'

// Extend DeclaratorParser prototype
declare module './parser' {
  interface DeclaratorParser {
    skipParameters(): void
    parseSuffixInfo(): SuffixInfo
    parseCv(): AST.CvQualifier
    parseRef(): AST.RefQualifier
    parseNoexcept(): AST.Expression | null
    parseBodyKind(): [AST.BodyKind, boolean]
    parseBody(result: SuffixInfo): void
    parseTrailingReturn(result: SuffixInfo): void
    parseVirtSpecifiers(result: SuffixInfo): void
  }
}

// Parameters come from the front end; only their tokens are skipped.
DeclaratorParser.prototype.skipParameters = function (this: DeclaratorParser): void {
  const stream = this.stream
  // explicit template arguments, e.g. `f<int>(int)`
  while (stream.peek().text === '<') {
    stream.skipBrackets()
  }
  assertInternal(stream.peek().text === '(', this.cursor, 'parameter list not found')
  stream.skipBrackets()
}

DeclaratorParser.prototype.parseSuffixInfo = function (this: DeclaratorParser): SuffixInfo {
  const stream = this.stream
  const result = defaultSuffixInfo(this.cursor)

  stream.skipAttribute()
  result.cvQualifier = this.parseCv()
  result.refQualifier = this.parseRef()
  if (stream.skipIf('throw', true)) {
    stream.skipBrackets()
  }
  result.noexceptCondition = this.parseNoexcept()

  // `void (*f(int) const)(int)`: the `)` and `(int)` after the qualifiers
  // belong to the return type
  while (stream.skipIf(')')) {
    if (isOpeningBracket(stream.peek())) {
      stream.skipBrackets()
    }
  }

  if (stream.skipIf('->')) {
    this.parseTrailingReturn(result)
  } else {
    this.parseVirtSpecifiers(result)
  }
  return result
}

DeclaratorParser.prototype.parseCv = function (this: DeclaratorParser): AST.CvQualifier {
  const stream = this.stream
  if (stream.skipIf('const', true)) {
    return stream.skipIf('volatile', true) ? 'ConstVolatile' : 'Const'
  }
  if (stream.skipIf('volatile', true)) {
    return stream.skipIf('const', true) ? 'ConstVolatile' : 'Volatile'
  }
  return 'None'
}

DeclaratorParser.prototype.parseRef = function (this: DeclaratorParser): AST.RefQualifier {
  if (this.stream.skipIf('&')) return 'LValue'
  if (this.stream.skipIf('&&')) return 'RValue'
  return 'None'
}

DeclaratorParser.prototype.parseNoexcept = function (
  this: DeclaratorParser,
): AST.Expression | null {
  const stream = this.stream
  const keyword = stream.peek()
  if (!stream.skipIf('noexcept', true)) {
    return null
  }

  const type: AST.CppType = { type: 'BuiltinType', name: 'bool' }
  if (stream.peek().text !== '(') {
    return { type: 'LiteralExpression', exprType: type, value: 'true', start: keyword.start, end: keyword.end }
  }

  const closing = stream.findClosingBracket()
  stream.skip('(')
  const expr = this.context.expressions.parseRawExpression(this.context, stream, closing, type)
  stream.skip(')')
  return expr
}

// Returns the body kind and whether the body was `= 0`
DeclaratorParser.prototype.parseBodyKind = function (
  this: DeclaratorParser,
): [AST.BodyKind, boolean] {
  const stream = this.stream
  if (stream.skipIf('default', true)) return ['Defaulted', false]
  if (stream.skipIf('delete', true)) return ['Deleted', false]
  if (stream.skipIf('0')) return ['Declaration', true]
  return unreachable(this.cursor, `unexpected token '${stream.peek().text}' for function body kind`)
}

DeclaratorParser.prototype.parseBody = function (this: DeclaratorParser, result: SuffixInfo): void {
  const [bodyKind, pure] = this.parseBodyKind()
  result.bodyKind = bodyKind
  if (pure) {
    result.virtualFlags = withVirtualFlag(result.virtualFlags, VIRTUAL_PURE)
  }
}

/**
 * After `->`. The trailing type can contain anything, so this only looks
 * for `override`, `final` and `=` outside of bracket groups until the end
 * of the declaration.
 */
DeclaratorParser.prototype.parseTrailingReturn = function (
  this: DeclaratorParser,
  result: SuffixInfo,
): void {
  const stream = this.stream
  while (!stream.done()) {
    if (isOpeningBracket(stream.peek())) {
      stream.skipBrackets()
    } else if (stream.skipIf('override')) {
      result.virtualFlags = withVirtualFlag(result.virtualFlags, VIRTUAL_OVERRIDE)
    } else if (stream.skipIf('final')) {
      result.virtualFlags = withVirtualFlag(result.virtualFlags, VIRTUAL_FINAL)
    } else if (stream.skipIf('=')) {
      this.parseBody(result)
    } else {
      stream.bump()
    }
  }
}

// `override` and `final` are contextual: matched by text, not as keywords
DeclaratorParser.prototype.parseVirtSpecifiers = function (
  this: DeclaratorParser,
  result: SuffixInfo,
): void {
  const stream = this.stream
  if (stream.skipIf('override')) {
    result.virtualFlags = VIRTUAL_OVERRIDE
    if (stream.skipIf('final')) {
      result.virtualFlags |= VIRTUAL_FINAL
    }
  } else if (stream.skipIf('final')) {
    result.virtualFlags = VIRTUAL_FINAL
    if (stream.skipIf('override')) {
      result.virtualFlags |= VIRTUAL_OVERRIDE
    }
  }

  if (stream.skipIf('=')) {
    this.parseBody(result)
  }
}
