import { checkComposeHash, checkNoEmpty, normalizePath, normalizeString, sortStrings } from './common'

/** Inputs of an `apply_compose` step. `pull` and `detach` must be explicit on the wire. */
export interface ApplyComposeInputs {
  readonly environment: string
  readonly compose_path: string
  readonly project_name: string
  readonly pull: boolean
  readonly detach: boolean
  readonly services?: readonly string[]
  readonly expected_compose_hash_alg?: string
  readonly expected_compose_hash?: string
}

export function normalizeApplyComposeInputs(input: ApplyComposeInputs): ApplyComposeInputs {
  return {
    environment: normalizeString(input.environment),
    compose_path: normalizePath(input.compose_path, 'compose_path'),
    project_name: normalizeString(input.project_name),
    pull: input.pull,
    detach: input.detach,
    ...(input.services ? { services: sortStrings(input.services.map(normalizeString)) } : {}),
    ...(input.expected_compose_hash_alg !== undefined ? { expected_compose_hash_alg: normalizeString(input.expected_compose_hash_alg) } : {}),
    ...(input.expected_compose_hash !== undefined ? { expected_compose_hash: normalizeString(input.expected_compose_hash) } : {})
  }
}

export function validateApplyComposeInputs(input: ApplyComposeInputs): string[] {
  const problems: string[] = []
  if (input.environment === '') problems.push('environment is required')
  if (input.compose_path === '') problems.push('compose_path is required')
  if (input.project_name === '') problems.push('project_name is required')
  problems.push(...checkNoEmpty(input.services, 'services'))
  problems.push(...checkComposeHash(input.expected_compose_hash_alg, input.expected_compose_hash))
  return problems
}
