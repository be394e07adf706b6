import type { KeyValue } from './common'
import { checkComposeHash, normalizeKeyValues, normalizePath, normalizeString, sortByName } from './common'

export interface ComposeOverlay {
  readonly name: string
  readonly path: string
}

/**
 * Inputs of a `render_compose` step. The base compose file comes from exactly one
 * of `base_compose_path` or `base_compose_inline`.
 */
export interface RenderComposeInputs {
  readonly environment: string
  readonly base_compose_path?: string
  readonly base_compose_inline?: string
  readonly overlays?: readonly ComposeOverlay[]
  readonly variables?: readonly KeyValue[]
  readonly output_path: string
  readonly expected_compose_hash_alg?: string
  readonly expected_compose_hash?: string
}

export function normalizeRenderComposeInputs(input: RenderComposeInputs): RenderComposeInputs {
  const basePath = normalizeString(input.base_compose_path ?? '')
  const overlays = input.overlays
    ? sortByName(input.overlays).map((o, i) => ({ name: normalizeString(o.name), path: normalizePath(o.path, `overlays[${i}].path`) }))
    : undefined
  return {
    environment: normalizeString(input.environment),
    ...(basePath !== '' ? { base_compose_path: normalizePath(basePath, 'base_compose_path') } : {}),
    ...(input.base_compose_inline ? { base_compose_inline: normalizeString(input.base_compose_inline) } : {}),
    ...(overlays ? { overlays } : {}),
    ...(input.variables ? { variables: normalizeKeyValues(input.variables) } : {}),
    output_path: normalizePath(input.output_path, 'output_path'),
    ...(input.expected_compose_hash_alg !== undefined ? { expected_compose_hash_alg: normalizeString(input.expected_compose_hash_alg) } : {}),
    ...(input.expected_compose_hash !== undefined ? { expected_compose_hash: normalizeString(input.expected_compose_hash) } : {})
  }
}

export function validateRenderComposeInputs(input: RenderComposeInputs): string[] {
  const problems: string[] = []
  if (input.environment === '') problems.push('environment is required')
  if (input.output_path === '') problems.push('output_path is required')
  const hasPath = Boolean(input.base_compose_path)
  const hasInline = Boolean(input.base_compose_inline)
  if (hasPath === hasInline) problems.push('exactly one of base_compose_path or base_compose_inline must be provided')
  problems.push(...checkComposeHash(input.expected_compose_hash_alg, input.expected_compose_hash))
  if ((input.overlays ?? []).some((o) => o.name === '')) problems.push('overlays.name is required')
  if ((input.variables ?? []).some((v) => v.key === '')) problems.push('variables.key is required')
  return problems
}
