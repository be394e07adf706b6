import type { Plan, PlanStep, StepAction } from '../types/plan'
import type { JsonValue } from '../types/resource'

interface StepSpec {
  readonly id: string
  readonly index: number
  readonly host?: string
  readonly action?: StepAction
  readonly dependsOn?: readonly string[]
  readonly inputs?: JsonValue
}

export function step(s: StepSpec): PlanStep {
  return {
    id: s.id,
    index: s.index,
    action: s.action ?? 'noop',
    target: { kind: 'service', name: s.id, provider: 'compose' },
    host: { logicalId: s.host ?? '' },
    ...(s.inputs !== undefined ? { inputs: s.inputs } : {}),
    ...(s.dependsOn ? { dependsOn: s.dependsOn } : {})
  }
}

export function plan(steps: readonly PlanStep[], id: string = 'plan-1'): Plan {
  return { version: 'v1', id, steps }
}

/** s1 global, s2 on host-a after s1, s3 on host-a after s2. */
export function sameHostScenario(): Plan {
  return plan([
    step({ id: 's1', index: 0 }),
    step({ id: 's2', index: 1, host: 'host-a', dependsOn: ['s1'] }),
    step({ id: 's3', index: 2, host: 'host-a', dependsOn: ['s2'] })
  ])
}

export const FIXED_TIME: string = '2024-01-01T00:00:00.000Z'

export const fixedClock = (): string => FIXED_TIME

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

/** The `{ final: true }` summary among captured console.log calls. */
export function finalSummary(calls: readonly (readonly unknown[])[]): Record<string, unknown> {
  for (const call of calls) {
    const text = call[0]
    if (typeof text !== 'string') continue
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch {
      continue
    }
    if (isRecord(parsed) && parsed.final === true) return parsed
  }
  throw new Error('no final summary was printed')
}
