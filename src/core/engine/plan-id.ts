import { createHash } from 'node:crypto'
import type { PlanStep } from '../../types/plan'
import type { JsonValue } from '../../types/resource'
import { compareSteps } from './slice'

function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value)
}

/** JSON with object keys sorted at every depth; arrays keep their order. */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value)
  if (isJsonArray(value)) return `[${value.map((v) => canonicalJson(v)).join(',')}]`
  const obj = value
  const parts = Object.keys(obj).sort().map((k) => `${JSON.stringify(k)}:${canonicalJson(obj[k])}`)
  return `{${parts.join(',')}}`
}

export interface PlanIdInput {
  readonly environment: string
  readonly steps: readonly PlanStep[]
}

/**
 * Content-derived plan id: the first 12 bytes of a SHA-256 over the canonical
 * form of the environment and the steps, as 24 lowercase hex chars.
 * Labels and meta do not participate.
 */
export function computePlanId(input: PlanIdInput): string {
  const steps: JsonValue[] = [...input.steps].sort(compareSteps).map((s) => ({
    id: s.id,
    index: s.index,
    action: s.action,
    target: { kind: s.target.kind, name: s.target.name, provider: s.target.provider },
    host: s.host.logicalId,
    inputs: s.inputs ?? null,
    dependsOn: s.dependsOn ? [...s.dependsOn] : []
  }))
  const digest = createHash('sha256').update(canonicalJson({ environment: input.environment, steps }), 'utf8').digest('hex')
  return digest.slice(0, 24)
}
