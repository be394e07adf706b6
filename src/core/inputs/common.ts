/** Shared normalization and validation helpers for typed step inputs. */

export class InputsError extends Error {
  readonly code = 'INPUTS_INVALID'

  constructor(message: string) {
    super(message)
    this.name = 'InputsError'
  }
}

export interface KeyValue {
  readonly key: string
  readonly value: string
}

const SHA256_HEX = /^[0-9a-f]{64}$/

export function normalizeString(s: string): string {
  return s.trim()
}

/** Lexically sorted copy. */
export function sortStrings(items: readonly string[]): string[] {
  return [...items].sort()
}

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/** Trim keys and values, then sort by key. */
export function normalizeKeyValues(items: readonly KeyValue[]): KeyValue[] {
  return items
    .map((kv) => ({ key: normalizeString(kv.key), value: normalizeString(kv.value) }))
    .sort((a, b) => byText(a.key, b.key))
}

export function sortByName<T extends { readonly name: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => byText(a.name, b.name))
}

/**
 * Normalize a path that must stay inside the workspace.
 * Backslashes become slashes and repeated slashes collapse; absolute paths,
 * home-relative paths and `.`/`..` segments are rejected, except a lone `.`.
 */
export function normalizePath(raw: string, field: string): string {
  const p = raw.replace(/\\/g, '/').trim()
  if (p === '') throw new InputsError(`${field}: path is empty`)
  if (p.startsWith('/') || p.startsWith('~') || p.includes(':/')) {
    throw new InputsError(`${field}: path must be relative: "${p}"`)
  }
  if (p === '.') return '.'
  const segments = p.split('/')
  if (segments.some((s) => s === '.' || s === '..')) {
    throw new InputsError(`${field}: path must not contain '.' or '..' segments: "${p}"`)
  }
  return segments.filter((s) => s !== '').join('/')
}

export function isSha256Hex(hash: string): boolean {
  return SHA256_HEX.test(hash)
}

/** Problems with an optional expected compose hash pair. */
export function checkComposeHash(alg: string | undefined, hash: string | undefined): string[] {
  if (!alg && !hash) return []
  if (alg !== 'sha256') return ["expected_compose_hash_alg must be 'sha256'"]
  if (!isSha256Hex(hash ?? '')) return [`expected_compose_hash: sha256 hash must be 64 lowercase hex chars: "${hash ?? ''}"`]
  return []
}

/** A zero count or duration means unset; only negative values are reported. */
export function checkPositive(value: number | undefined, field: string): string[] {
  return value !== undefined && value < 0 ? [`${field} must be > 0 if present`] : []
}

export function checkNoEmpty(items: readonly string[] | undefined, field: string): string[] {
  return (items ?? []).some((s) => s === '') ? [`${field} contains empty value`] : []
}
