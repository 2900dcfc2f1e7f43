// Diagnostics reported while recovering declarators. There is no logging
// backend here: callers plug in a Logger, the default one collects.

import { locate } from './ast/locations'
import type { DeclaratorError } from './errors'
import type { Cursor, TranslationUnit } from './oracle/cursor'

// Source name passed to Logger.log for everything this library reports
export const LOG_SOURCE = 'declarator parser'

export type Severity = 'warning' | 'error' | 'critical'

export interface DiagnosticLocation {
  file: string
  line: number // 1-based
  column: number // 0-based
  // Name of the entity the diagnostic is about, when known
  entity: string | null
}

export interface Diagnostic {
  severity: Severity
  message: string
  location: DiagnosticLocation
}

export interface Logger {
  log(source: string, diagnostic: Diagnostic): void
}

export function makeDiagnostic(
  tu: TranslationUnit,
  cursor: Cursor,
  message: string,
  severity: Severity,
): Diagnostic {
  const { line, column } = locate(tu.source, cursor.extent.start)
  return {
    severity,
    message,
    location: {
      file: tu.path,
      line,
      column,
      entity: cursor.spelling.length > 0 ? cursor.spelling : null,
    },
  }
}

/**
 * Diagnostic for a caught error. `fallback` is the cursor being processed
 * where the error was caught; it locates errors thrown without one.
 */
export function diagnosticFor(tu: TranslationUnit, error: DeclaratorError, fallback: Cursor): Diagnostic {
  return makeDiagnostic(tu, error.cursor ?? fallback, error.message, error.severity)
}

export function formatDiagnostic(source: string, diagnostic: Diagnostic): string {
  const { file, line, column, entity } = diagnostic.location
  const where = entity !== null ? ` (${entity})` : ''
  return `[${source}] ${file}:${line}:${column}: ${diagnostic.severity}: ${diagnostic.message}${where}`
}

export interface LoggedDiagnostic {
  source: string
  diagnostic: Diagnostic
}

/**
 * Records diagnostics in arrival order and optionally forwards them.
 */
export class DiagnosticCollector implements Logger {
  readonly entries: LoggedDiagnostic[]
  errorCount: number
  private forward: Logger | null

  constructor(forward: Logger | null = null) {
    this.entries = []
    this.errorCount = 0
    this.forward = forward
  }

  log(source: string, diagnostic: Diagnostic): void {
    this.entries.push({ source, diagnostic })
    if (diagnostic.severity !== 'warning') {
      this.errorCount++
    }
    this.forward?.log(source, diagnostic)
  }

  get diagnostics(): Diagnostic[] {
    return this.entries.map((e) => e.diagnostic)
  }
}
