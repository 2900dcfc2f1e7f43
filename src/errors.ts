// Two tiers of failure while recovering a declarator:
//
//  - ParseError: something about one unit (a parameter, a type, a default
//    value) could not be recovered. The caller catches it at the narrowest
//    scope, logs it and drops that unit.
//  - InternalError: the token-level scan contradicts the front end's facts
//    (e.g. a free function scanned as virtual). Processing of the current
//    declaration stops; the driver decides whether the run goes on.

import type { Cursor } from './oracle/cursor'
import type { Severity } from './diagnostics'

export interface DeclaratorErrorData {
  readonly message: string
  // The cursor the failure is about, when the thrower knows it
  readonly cursor?: Cursor | undefined
}

/**
 * Base class for all declarator recovery errors.
 */
export class DeclaratorError extends Error {
  readonly severity: Severity
  readonly cursor: Cursor | null

  constructor(data: DeclaratorErrorData, severity: Severity) {
    super(data.message)
    this.name = 'DeclaratorError'
    this.severity = severity
    this.cursor = data.cursor ?? null
  }
}

/** Recoverable: the affected unit is dropped and resolution continues */
export class ParseError extends DeclaratorError {
  constructor(data: DeclaratorErrorData) {
    super(data, 'error')
    this.name = 'ParseError'
  }
}

/** Unrecoverable: the scan and the front end's facts disagree */
export class InternalError extends DeclaratorError {
  constructor(data: DeclaratorErrorData) {
    super(data, 'critical')
    this.name = 'InternalError'
  }
}

export function assertInternal(
  condition: boolean,
  cursor: Cursor,
  message: string,
): asserts condition {
  if (!condition) {
    throw new InternalError({ message, cursor })
  }
}

export function unreachable(cursor: Cursor, message: string): never {
  throw new InternalError({ message, cursor })
}
