// Prefix resolution: the tokens in front of the declarator name.

import { DeclaratorParser } from './parser'
import type { ConversionPrefixInfo, PrefixInfo } from './parser'
import { isOpeningBracket } from './stream'
import { assertInternal } from '../errors'

// Extend DeclaratorParser prototype
declare module './parser' {
  interface DeclaratorParser {
    parsePrefixInfo(name: string): PrefixInfo
    parseConversionPrefix(): ConversionPrefixInfo
    skipConversionArguments(): void
  }
}

/**
 * Scans up to and including the declarator name, recording `constexpr` and
 * `virtual` on the way. The name spans several tokens for operators.
 */
DeclaratorParser.prototype.parsePrefixInfo = function (
  this: DeclaratorParser,
  name: string,
): PrefixInfo {
  const stream = this.stream
  const result: PrefixInfo = { isConstexpr: false, isVirtual: false }

  for (;;) {
    // an attribute argument may be spelled like the name
    stream.skipAttribute()
    if (stream.skipName(name)) return result
    assertInternal(!stream.done(), this.cursor, `function name '${name}' not found`)
    if (stream.skipIf('constexpr', true)) {
      result.isConstexpr = true
    } else if (stream.skipIf('virtual', true)) {
      result.isVirtual = true
    } else {
      stream.bump()
    }
  }
}

// A conversion operator has no name token of its own; the specifiers come
// before the `operator` keyword.
DeclaratorParser.prototype.parseConversionPrefix = function (
  this: DeclaratorParser,
): ConversionPrefixInfo {
  const stream = this.stream
  const result: ConversionPrefixInfo = { isConstexpr: false, isVirtual: false, isExplicit: false }

  while (!stream.skipIf('operator', true)) {
    assertInternal(!stream.done(), this.cursor, "'operator' keyword not found")
    if (stream.skipIf('virtual', true)) {
      result.isVirtual = true
    } else if (stream.skipIf('constexpr', true)) {
      result.isConstexpr = true
    } else if (stream.skipIf('explicit', true)) {
      result.isExplicit = true
    } else {
      stream.bump()
    }
  }
  return result
}

/**
 * Skips the target type up to and including the empty argument list `()`.
 * Bracket groups inside the target type (`Foo<int>`, `decltype(x)`) are
 * skipped whole.
 */
DeclaratorParser.prototype.skipConversionArguments = function (this: DeclaratorParser): void {
  const stream = this.stream
  for (;;) {
    assertInternal(!stream.done(), this.cursor, 'conversion operator arguments not found')
    if (stream.peek().text === '(' && stream.peek(1).text === ')') {
      stream.bump()
      stream.bump()
      return
    }
    if (isOpeningBracket(stream.peek())) {
      stream.skipBrackets()
    } else {
      stream.bump()
    }
  }
}
