import { PLAN_SCHEMA_VERSION } from '../../types/plan'
import type { HostPlan, HostPlanStep, HostRef, Plan, PlanStep, SliceResult } from '../../types/plan'
import type { StateSnapshot, TopologySnapshot } from '../../types/resource'
import type { ExecutionReport, StepExecution } from '../../types/execution-report'
import { HostPlanExecutor, reportStatus, skippedStep, systemClock } from '../agent/executor'
import type { Clock, StepExecutorTable } from '../agent/executor'
import { mapLimit } from '../../utils/concurrency'
import { EngineError } from './errors'
import type { EngineEvent, EventSink } from './events'
import { slicePlan } from './slice'

export interface PlanOptions {
  /** Environment name the planner targets; also feeds the plan id. */
  readonly environment?: string
}

export interface ExecOptions {
  /** Slice and report without running anything. */
  readonly dryRun?: boolean
  /** Host plans in flight at once. Defaults to 1. */
  readonly maxParallel?: number
  /** Only these step ids run; everything else is skipped. */
  readonly stepFilter?: readonly string[]
  readonly signal?: AbortSignal
}

export interface ComputePlanRequest {
  readonly topology: TopologySnapshot
  readonly state: StateSnapshot
  readonly options?: PlanOptions
}

export interface ComputePlanResponse {
  readonly plan: Plan
}

export interface ExecutePlanRequest {
  readonly plan: Plan
  readonly options?: ExecOptions
}

export interface ExecutePlanResponse {
  readonly report: ExecutionReport
}

export interface InspectStateRequest {
  readonly host: HostRef
  /** Runtime selector, e.g. "docker-compose". */
  readonly runtime: string
}

export interface InspectStateResponse {
  readonly state: StateSnapshot
}

/**
 * Planner/executor contract. Anchors both local execution from the CLI and a
 * controller that ships host plans to remote agents.
 */
export interface Engine {
  computePlan(req: ComputePlanRequest): Promise<ComputePlanResponse>
  executePlan(req: ExecutePlanRequest): Promise<ExecutePlanResponse>
  inspectState(req: InspectStateRequest): Promise<InspectStateResponse>
}

/** Turns desired and observed state into a plan. Provided by provider integrations. */
export interface Planner {
  computePlan(topology: TopologySnapshot, state: StateSnapshot, options: PlanOptions): Promise<Plan>
}

/** Reads observed state for one runtime on one host. */
export interface StateInspector {
  inspect(host: HostRef): Promise<StateSnapshot>
}

export interface LocalEngineOptions {
  readonly planner?: Planner
  readonly executors: StepExecutorTable
  /** Keyed by runtime name. */
  readonly inspectors?: ReadonlyMap<string, StateInspector>
  readonly now?: Clock
  readonly onEvent?: EventSink
}

const GLOBAL_HOST: HostRef = { logicalId: '' }

function asHostStep(step: PlanStep): HostPlanStep {
  return {
    id: step.id,
    index: step.index,
    action: step.action,
    target: step.target,
    ...(step.inputs !== undefined ? { inputs: step.inputs } : {}),
    ...(step.dependsOn !== undefined ? { dependsOn: step.dependsOn } : {}),
    ...(step.meta !== undefined ? { meta: step.meta } : {})
  }
}

function dryRunSteps(result: SliceResult): StepExecution[] {
  const meta = { reason: 'dry-run' }
  const steps: StepExecution[] = result.globalSteps.map((s): StepExecution => ({ stepId: s.id, host: GLOBAL_HOST, status: 'skipped', meta }))
  for (const hostId of Object.keys(result.hostPlans).sort()) {
    const hp = result.hostPlans[hostId]
    for (const s of hp.steps) steps.push({ stepId: s.id, host: hp.host, status: 'skipped', meta })
  }
  return steps
}

/** First global dependency of the host plan that did not succeed, if any. */
function unsatisfiedGlobal(hp: HostPlan, refs: SliceResult['globalDependencyRefs'], succeeded: ReadonlySet<string>): { readonly stepId: string; readonly globalId: string } | undefined {
  for (const step of hp.steps) {
    const globalIds = Object.hasOwn(refs, step.id) ? refs[step.id] : []
    for (const globalId of globalIds) {
      if (!succeeded.has(globalId)) return { stepId: step.id, globalId }
    }
  }
  return undefined
}

/**
 * Engine for local execution: computes through an injected planner, slices, runs
 * global steps first and then dispatches host plans, one worker per host.
 *
 * A host plan is dispatched only when every global step its steps reference has
 * succeeded; otherwise all of its steps are reported as skipped.
 */
export class LocalEngine implements Engine {
  private readonly planner?: Planner
  private readonly inspectors: ReadonlyMap<string, StateInspector>
  private readonly onEvent?: EventSink
  private readonly agent: HostPlanExecutor

  constructor(opts: LocalEngineOptions) {
    this.planner = opts.planner
    this.inspectors = opts.inspectors ?? new Map<string, StateInspector>()
    this.onEvent = opts.onEvent
    this.agent = new HostPlanExecutor({ executors: opts.executors, now: opts.now ?? systemClock, onEvent: opts.onEvent, action: 'apply' })
  }

  async computePlan(req: ComputePlanRequest): Promise<ComputePlanResponse> {
    if (this.planner === undefined) throw new EngineError('NO_PLANNER', 'no planner configured; load a plan file instead')
    const plan = await this.planner.computePlan(req.topology, req.state, req.options ?? {})
    this.assertVersion(plan)
    const sliced = slicePlan(plan)
    if (!sliced.ok) throw sliced.error
    return { plan }
  }

  async inspectState(req: InspectStateRequest): Promise<InspectStateResponse> {
    const inspector = this.inspectors.get(req.runtime)
    if (inspector === undefined) {
      const known = [...this.inspectors.keys()].sort().join(', ') || 'none'
      throw new EngineError('UNKNOWN_RUNTIME', `no state inspector registered for runtime "${req.runtime}" (known: ${known})`)
    }
    return { state: await inspector.inspect(req.host) }
  }

  async executePlan(req: ExecutePlanRequest): Promise<ExecutePlanResponse> {
    const { plan } = req
    const options: ExecOptions = req.options ?? {}
    this.assertVersion(plan)
    const sliced = slicePlan(plan)
    if (!sliced.ok) throw sliced.error
    const result = sliced.result
    const hostIds = Object.keys(result.hostPlans).sort()
    this.emit({ event: 'slice', planId: plan.id, ok: true, message: `${hostIds.length} host plan(s), ${result.globalSteps.length} global step(s)` })

    if (options.dryRun === true) {
      const report: ExecutionReport = { planId: plan.id, status: 'succeeded', steps: dryRunSteps(result) }
      this.emit({ event: 'done', planId: plan.id, status: report.status, ok: true, message: 'dry run' })
      return { report }
    }

    const runOpts = {
      signal: options.signal,
      stepFilter: options.stepFilter ? new Set(options.stepFilter) : undefined
    }
    const globalRuns = await this.agent.executeSteps(plan.id, GLOBAL_HOST, result.globalSteps.map(asHostStep), runOpts)
    const globalSucceeded = new Set(globalRuns.filter((s) => s.status === 'succeeded').map((s) => s.stepId))

    const hostRuns = await mapLimit(hostIds, options.maxParallel ?? 1, async (hostId: string): Promise<readonly StepExecution[]> => {
      const hp = result.hostPlans[hostId]
      const blocker = unsatisfiedGlobal(hp, result.globalDependencyRefs, globalSucceeded)
      if (blocker !== undefined) {
        const message = `host plan "${hostId}" not dispatched: step "${blocker.stepId}" requires global step "${blocker.globalId}" which has not succeeded`
        this.emit({ event: 'host', planId: plan.id, host: hostId, ok: false, message })
        return hp.steps.map((s) => skippedStep(s.id, hp.host, { code: 'GLOBAL_DEPENDENCY_UNSATISFIED', message }))
      }
      this.emit({ event: 'host', planId: plan.id, host: hostId, ok: true, message: `dispatching ${hp.steps.length} step(s)` })
      const hostReport = await this.agent.executeHostPlan(hp, runOpts)
      return hostReport.steps
    })

    const steps: StepExecution[] = [...globalRuns, ...hostRuns.flat()]
    const report: ExecutionReport = { planId: plan.id, status: reportStatus(steps), steps }
    this.emit({ event: 'done', planId: plan.id, status: report.status, ok: report.status === 'succeeded' })
    return { report }
  }

  private assertVersion(plan: Plan): void {
    if (plan.version !== PLAN_SCHEMA_VERSION) {
      throw new EngineError('PLAN_VERSION_MISMATCH', `plan "${plan.id}" has unsupported version "${plan.version}" (expected "${PLAN_SCHEMA_VERSION}")`)
    }
  }

  private emit(event: Omit<EngineEvent, 'action'>): void {
    this.onEvent?.({ action: 'apply', ...event })
  }
}
