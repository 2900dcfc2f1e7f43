import type { SuffixInfo } from './parser'
import { VIRTUAL_OVERRIDE, VIRTUAL_PURE, hasVirtualFlag } from '../ast/nodes'
import type { VirtualFlags } from '../ast/nodes'
import { assertInternal } from '../errors'
import type { FunctionCursor } from '../oracle/cursor'

/**
 * Combines the front end's virtualness with the `virtual` keyword and the
 * specifiers found after the parameter list.
 *
 * A method is taken to override when it is virtual without the `virtual`
 * keyword (it can only be virtual through a base class), when `override` is
 * written, or when the front end reports overridden methods.
 */
export function reconcileVirtualInfo(
  cursor: FunctionCursor,
  virtualKeyword: boolean,
  suffix: SuffixInfo,
): VirtualFlags | null {
  const flags = suffix.virtualFlags

  if (!cursor.isVirtual) {
    assertInternal(!virtualKeyword && flags === null, cursor, 'virtualness not parsed properly')
    return null
  }

  if (cursor.isPureVirtual) {
    assertInternal(hasVirtualFlag(flags, VIRTUAL_PURE), cursor, 'pure virtual not detected')
    assertInternal(
      suffix.bodyKind !== 'Definition',
      cursor,
      'pure virtual function with a body in its declaration',
    )
    return flags
  }

  assertInternal(
    !hasVirtualFlag(flags, VIRTUAL_PURE),
    cursor,
    'pure virtual function detected, even though it is not',
  )
  const overrides =
    !virtualKeyword || hasVirtualFlag(flags, VIRTUAL_OVERRIDE) || cursor.overriddenCursors.length > 0

  const result = flags ?? 0
  return overrides ? result | VIRTUAL_OVERRIDE : result
}
