import type { JsonValue, ResourceRef, StringMap } from './resource'

/** Wire contract versions. */
export const PLAN_SCHEMA_VERSION = 'v1'
export const HOST_PLAN_SCHEMA_VERSION = 'v1'

export const STEP_ACTIONS = [
  'create',
  'update',
  'delete',
  'noop',
  'render_compose',
  'apply_compose',
  'rollout',
  'build',
  'migrate',
  'health_check'
] as const

export type StepAction = typeof STEP_ACTIONS[number]

/** Where a step executes. An empty `logicalId` marks a global step. */
export interface HostRef {
  readonly logicalId: string
  readonly labels?: StringMap
}

export interface PlanStep {
  /** Unique within the plan. */
  readonly id: string
  /** Stable creation order across the whole plan. */
  readonly index: number
  readonly action: StepAction
  readonly target: ResourceRef
  readonly host: HostRef
  /** Opaque payload owned by the provider that produced the step. */
  readonly inputs?: JsonValue
  readonly dependsOn?: readonly string[]
  readonly meta?: StringMap
}

/**
 * Output of a planner. `id` should be derived from content so that identical
 * inputs produce the same plan id (see computePlanId).
 */
export interface Plan {
  readonly version: string
  readonly id: string
  readonly summary?: string
  readonly steps: readonly PlanStep[]
  readonly meta?: StringMap
}

export interface HostPlanStep {
  readonly id: string
  readonly index: number
  readonly action: StepAction
  readonly target: ResourceRef
  readonly inputs?: JsonValue
  /** Only ids of steps in the same host plan. */
  readonly dependsOn?: readonly string[]
  readonly meta?: StringMap
}

/** Self-contained work order for one host; an agent needs nothing else to run it. */
export interface HostPlan {
  readonly version: string
  readonly planId: string
  readonly host: HostRef
  readonly steps: readonly HostPlanStep[]
  readonly meta?: StringMap
}

export interface SliceResult {
  /** Keyed by host logical id. */
  readonly hostPlans: Readonly<Record<string, HostPlan>>
  /** Steps without host affinity, ordered by index then id. */
  readonly globalSteps: readonly PlanStep[]
  readonly globalStepIds: readonly string[]
  /** Host step id → global step ids that must succeed before its host plan is dispatched. */
  readonly globalDependencyRefs: Readonly<Record<string, readonly string[]>>
}
