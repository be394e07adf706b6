import { HOST_PLAN_SCHEMA_VERSION } from '../../types/plan'
import type { HostPlan, HostPlanStep, HostRef, Plan, PlanStep, SliceResult } from '../../types/plan'
import type { JsonValue, ResourceRef, StringMap } from '../../types/resource'
import { PlanValidationError } from './errors'

export type SliceOutcome =
  | { readonly ok: true; readonly result: SliceResult }
  | { readonly ok: false; readonly error: PlanValidationError }

interface StepOrder {
  readonly index: number
  readonly id: string
}

/** Canonical order used everywhere: index ascending, then id. */
export function compareSteps(a: StepOrder, b: StepOrder): number {
  if (a.index !== b.index) return a.index - b.index
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

export function sortedUnique(ids: readonly string[]): string[] {
  return [...new Set(ids)].sort()
}

function copyMap(m: StringMap | undefined): StringMap | undefined {
  return m === undefined ? undefined : { ...m }
}

function copyRef(ref: ResourceRef): ResourceRef {
  return { ...ref }
}

function copyHost(host: HostRef): HostRef {
  const labels = copyMap(host.labels)
  return { logicalId: host.logicalId, ...(labels ? { labels } : {}) }
}

function copyInputs(inputs: JsonValue | undefined): { readonly inputs?: JsonValue } {
  return inputs === undefined ? {} : { inputs: structuredClone(inputs) }
}

function copyPlanStep(step: PlanStep): PlanStep {
  const meta = copyMap(step.meta)
  return {
    id: step.id,
    index: step.index,
    action: step.action,
    target: copyRef(step.target),
    host: copyHost(step.host),
    ...copyInputs(step.inputs),
    ...(step.dependsOn !== undefined ? { dependsOn: [...step.dependsOn] } : {}),
    ...(meta ? { meta } : {})
  }
}

function failWith(error: PlanValidationError): SliceOutcome {
  return { ok: false, error }
}

/**
 * Partition a plan into per-host plans plus global steps.
 *
 * Steps with an empty `host.logicalId` are global. A host step may depend on steps
 * of its own host (kept in `dependsOn`) or on global steps (moved to
 * `globalDependencyRefs`); a dependency on another host's step or on an unknown id
 * fails the whole slice. The input plan is never mutated and nothing in the result
 * aliases it. Slicing the same plan twice yields identical output.
 */
export function slicePlan(plan: Plan): SliceOutcome {
  const ordered: PlanStep[] = [...plan.steps].sort(compareSteps)

  // Step id → owning host; '' is the global owner.
  const owner = new Map<string, string>()
  for (const step of ordered) {
    if (owner.has(step.id)) {
      const indexes = plan.steps.filter((s) => s.id === step.id).map((s) => s.index)
      return failWith(new PlanValidationError(
        'PLAN_DUPLICATE_STEP_ID',
        `duplicate step id "${step.id}" (indexes ${indexes.join(', ')})`,
        { stepIds: [step.id] }
      ))
    }
    owner.set(step.id, step.host.logicalId)
  }

  const globalSteps: PlanStep[] = []
  for (const step of ordered) {
    if (step.host.logicalId !== '') continue
    for (const dep of step.dependsOn ?? []) {
      if (!owner.has(dep)) {
        return failWith(new PlanValidationError('PLAN_UNKNOWN_STEP', `step "${step.id}" depends on unknown step "${dep}"`, { stepIds: [step.id, dep] }))
      }
    }
    globalSteps.push(copyPlanStep(step))
  }
  const globalStepIds: string[] = globalSteps.map((s) => s.id)

  const hostSteps = new Map<string, HostPlanStep[]>()
  const hostRefs = new Map<string, HostRef>()
  const globalDeps = new Map<string, string[]>()
  for (const step of ordered) {
    const hostId = step.host.logicalId
    if (hostId === '') continue
    const local: string[] = []
    const global: string[] = []
    for (const dep of step.dependsOn ?? []) {
      const depHost = owner.get(dep)
      if (depHost === undefined) {
        return failWith(new PlanValidationError('PLAN_UNKNOWN_STEP', `step "${step.id}" depends on unknown step "${dep}"`, { stepIds: [step.id, dep], hostIds: [hostId] }))
      }
      if (depHost === '') {
        global.push(dep)
        continue
      }
      if (depHost !== hostId) {
        return failWith(new PlanValidationError(
          'PLAN_CROSS_HOST_DEPENDENCY',
          `step "${step.id}" on host "${hostId}" depends on step "${dep}" on host "${depHost}" (cross-host dependencies are not allowed)`,
          { stepIds: [step.id, dep], hostIds: [hostId, depHost] }
        ))
      }
      local.push(dep)
    }
    if (global.length > 0) globalDeps.set(step.id, sortedUnique(global))

    const deps = sortedUnique(local)
    const meta = copyMap(step.meta)
    const hostStep: HostPlanStep = {
      id: step.id,
      index: step.index,
      action: step.action,
      target: copyRef(step.target),
      ...copyInputs(step.inputs),
      ...(deps.length > 0 ? { dependsOn: deps } : {}),
      ...(meta ? { meta } : {})
    }
    const list = hostSteps.get(hostId)
    if (list === undefined) {
      hostSteps.set(hostId, [hostStep])
      hostRefs.set(hostId, copyHost(step.host))
    } else {
      list.push(hostStep)
    }
  }

  // Built from entries so ids such as "__proto__" stay own keys.
  const hostPlans: Record<string, HostPlan> = Object.fromEntries(
    [...hostSteps.keys()].sort().map((hostId): [string, HostPlan] => [hostId, {
      version: HOST_PLAN_SCHEMA_VERSION,
      planId: plan.id,
      host: hostRefs.get(hostId) ?? { logicalId: hostId },
      steps: (hostSteps.get(hostId) ?? []).sort(compareSteps)
    }])
  )
  const globalDependencyRefs: Record<string, readonly string[]> = Object.fromEntries(
    [...globalDeps.keys()].sort().map((stepId): [string, readonly string[]] => [stepId, globalDeps.get(stepId) ?? []])
  )

  return { ok: true, result: { hostPlans, globalSteps, globalStepIds, globalDependencyRefs } }
}
