import type { KeyValue } from './common'
import { checkNoEmpty, checkPositive, normalizeKeyValues, normalizeString, sortByName, sortStrings } from './common'

export interface HealthEndpoint {
  readonly name: string
  readonly url: string
  readonly expected_status: number
  readonly method: string
  readonly headers?: readonly KeyValue[]
}

/** Inputs of a `health_check` step. Exactly one of `endpoints` or `services` is set. */
export interface HealthCheckInputs {
  readonly environment: string
  readonly endpoints?: readonly HealthEndpoint[]
  readonly services?: readonly string[]
  readonly timeout_seconds?: number
  readonly interval_seconds?: number
  readonly retries?: number
}

function normalizeEndpoint(ep: HealthEndpoint): HealthEndpoint {
  return {
    name: normalizeString(ep.name),
    url: normalizeString(ep.url),
    expected_status: ep.expected_status,
    method: normalizeString(ep.method),
    ...(ep.headers ? { headers: normalizeKeyValues(ep.headers) } : {})
  }
}

export function normalizeHealthCheckInputs(input: HealthCheckInputs): HealthCheckInputs {
  return {
    environment: normalizeString(input.environment),
    ...(input.endpoints ? { endpoints: sortByName(input.endpoints.map(normalizeEndpoint)) } : {}),
    ...(input.services ? { services: sortStrings(input.services.map(normalizeString)) } : {}),
    ...(input.timeout_seconds ? { timeout_seconds: input.timeout_seconds } : {}),
    ...(input.interval_seconds ? { interval_seconds: input.interval_seconds } : {}),
    ...(input.retries !== undefined ? { retries: input.retries } : {})
  }
}

export function validateHealthCheckInputs(input: HealthCheckInputs): string[] {
  const problems: string[] = []
  if (input.environment === '') problems.push('environment is required')
  const hasEndpoints = (input.endpoints ?? []).length > 0
  const hasServices = (input.services ?? []).length > 0
  if (hasEndpoints === hasServices) problems.push('exactly one of endpoints or services must be provided')
  problems.push(...checkPositive(input.timeout_seconds, 'timeout_seconds'))
  problems.push(...checkPositive(input.interval_seconds, 'interval_seconds'))
  if (input.retries !== undefined && input.retries < 0) problems.push('retries must be >= 0 if present')
  problems.push(...checkNoEmpty(input.services, 'services'))
  for (const ep of input.endpoints ?? []) {
    if (ep.name === '') problems.push('endpoints.name is required')
    if (ep.url === '') problems.push(`endpoints[${ep.name}].url is required`)
    if (ep.expected_status <= 0) problems.push(`endpoints[${ep.name}].expected_status must be a valid HTTP status`)
    if (ep.method === '') problems.push(`endpoints[${ep.name}].method is required (producer must set explicitly)`)
    if ((ep.headers ?? []).some((h) => h.key === '')) problems.push(`endpoints[${ep.name}].headers.key is required`)
  }
  return problems
}
