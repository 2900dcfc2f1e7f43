import { Scanner } from './scanner'
import { TokenKind } from './token'
import type { Token } from './token'
import type { Cursor, TranslationUnit } from '../oracle/cursor'

/**
 * The tokens covering exactly one cursor's extent in the translation unit.
 */
export class Tokenizer {
  readonly tokens: readonly Token[]

  constructor(tu: TranslationUnit, cursor: Cursor) {
    const { start, end } = cursor.extent
    const scanner = new Scanner(tu.source, start, end)
    this.tokens = scanner.scan().filter((t) => t.kind !== TokenKind.Eof)
  }
}
