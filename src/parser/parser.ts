// Core DeclaratorParser class: the token stream of one function-like
// declaration plus the context it is resolved in.
// Methods are added to the prototype by other modules (prefix.ts, suffix.ts)

import { TokenStream } from './stream'
import type { ParseContext } from './context'
import { Tokenizer } from '../lexer/tokenizer'
import type * as AST from '../ast/nodes'
import type { FunctionCursor } from '../oracle/cursor'

// Keywords found before the declarator name
export interface PrefixInfo {
  isConstexpr: boolean
  isVirtual: boolean
}

export interface ConversionPrefixInfo extends PrefixInfo {
  isExplicit: boolean
}

// Everything recovered after the parameter list
export interface SuffixInfo {
  noexceptCondition: AST.Expression | null
  bodyKind: AST.BodyKind
  cvQualifier: AST.CvQualifier
  refQualifier: AST.RefQualifier
  virtualFlags: AST.VirtualFlags | null
}

export function defaultSuffixInfo(cursor: FunctionCursor): SuffixInfo {
  return {
    noexceptCondition: null,
    bodyKind: cursor.isDefinition ? 'Definition' : 'Declaration',
    cvQualifier: 'None',
    refQualifier: 'None',
    virtualFlags: null,
  }
}

export class DeclaratorParser {
  readonly context: ParseContext
  readonly cursor: FunctionCursor
  readonly stream: TokenStream

  constructor(context: ParseContext, cursor: FunctionCursor) {
    this.context = context
    this.cursor = cursor
    this.stream = new TokenStream(new Tokenizer(context.tu, cursor), cursor)
  }
}
