import type { SourcePosition } from './nodes'

// 1-based line and 0-based column of `offset`, clamped to the source.
export function locate(source: string, offset: number): SourcePosition {
  const end = Math.min(Math.max(Math.trunc(offset), 0), source.length)
  let line = 1
  let lineStart = 0
  for (let i = source.indexOf('\n'); i !== -1 && i < end; i = source.indexOf('\n', i + 1)) {
    line++
    lineStart = i + 1
  }
  return { line, column: end - lineStart }
}
