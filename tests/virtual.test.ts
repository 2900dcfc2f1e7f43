import { VIRTUAL_FINAL, VIRTUAL_OVERRIDE, VIRTUAL_PURE } from '../src/ast/nodes'
import type { BodyKind, VirtualFlags } from '../src/ast/nodes'
import { InternalError } from '../src/errors'
import type { SuffixInfo } from '../src/parser/parser'
import { reconcileVirtualInfo } from '../src/parser/virtual'
import { methodCursor, translationUnit } from './helpers/cursors'
import type { FunctionCursorInit } from './helpers/cursors'

const tu = translationUnit('void Widget::draw();')

function cursor(init: FunctionCursorInit) {
  return methodCursor(tu, 'void Widget::draw()', 'draw', init)
}

function suffix(virtualFlags: VirtualFlags | null, bodyKind: BodyKind = 'Declaration'): SuffixInfo {
  return { noexceptCondition: null, bodyKind, cvQualifier: 'None', refQualifier: 'None', virtualFlags }
}

describe('reconcileVirtualInfo', () => {
  describe('non-virtual methods', () => {
    const plain = cursor({ isVirtual: false })

    it('have no virtual info', () => {
      expect(reconcileVirtualInfo(plain, false, suffix(null))).toBeNull()
    })

    it('reject the virtual keyword', () => {
      expect(() => reconcileVirtualInfo(plain, true, suffix(null))).toThrow('virtualness not parsed properly')
    })

    it('reject virtual specifiers', () => {
      expect(() => reconcileVirtualInfo(plain, false, suffix(VIRTUAL_OVERRIDE))).toThrow(InternalError)
    })
  })

  describe('pure virtual methods', () => {
    const pure = cursor({ isVirtual: true, isPureVirtual: true })

    it('keep the specifiers found after the parameters', () => {
      expect(reconcileVirtualInfo(pure, true, suffix(VIRTUAL_PURE))).toBe(VIRTUAL_PURE)
      expect(reconcileVirtualInfo(pure, false, suffix(VIRTUAL_PURE | VIRTUAL_OVERRIDE))).toBe(
        VIRTUAL_PURE | VIRTUAL_OVERRIDE,
      )
    })

    it('require = 0', () => {
      expect(() => reconcileVirtualInfo(pure, true, suffix(null))).toThrow('pure virtual not detected')
      expect(() => reconcileVirtualInfo(pure, true, suffix(VIRTUAL_OVERRIDE))).toThrow(InternalError)
    })

    it('cannot be a definition at the same time', () => {
      expect(() => reconcileVirtualInfo(pure, true, suffix(VIRTUAL_PURE, 'Definition'))).toThrow(InternalError)
    })
  })

  describe('virtual methods', () => {
    it('declared virtual without specifiers have the empty set', () => {
      const method = cursor({ isVirtual: true })
      const flags = reconcileVirtualInfo(method, true, suffix(null))
      expect(flags).toBe(0)
      expect(flags).not.toBeNull()
    })

    it('override when virtual only through a base class', () => {
      const method = cursor({ isVirtual: true })
      expect(reconcileVirtualInfo(method, false, suffix(null))).toBe(VIRTUAL_OVERRIDE)
    })

    it('override when the front end reports overridden methods', () => {
      const base = methodCursor(tu, 'void Widget::draw()', 'draw', { usr: 'c:@S@Base@F@draw' })
      const method = cursor({ isVirtual: true, overriddenCursors: [base] })
      expect(reconcileVirtualInfo(method, true, suffix(null))).toBe(VIRTUAL_OVERRIDE)
    })

    it('keep final and add override', () => {
      const method = cursor({ isVirtual: true })
      expect(reconcileVirtualInfo(method, true, suffix(VIRTUAL_FINAL))).toBe(VIRTUAL_FINAL)
      expect(reconcileVirtualInfo(method, false, suffix(VIRTUAL_FINAL))).toBe(VIRTUAL_FINAL | VIRTUAL_OVERRIDE)
    })

    it('reject = 0 when the front end says the method is not pure', () => {
      const method = cursor({ isVirtual: true })
      expect(() => reconcileVirtualInfo(method, true, suffix(VIRTUAL_PURE))).toThrow(
        'pure virtual function detected, even though it is not',
      )
    })
  })
})
