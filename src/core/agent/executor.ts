import { HOST_PLAN_SCHEMA_VERSION } from '../../types/plan'
import type { HostPlan, HostPlanStep, HostRef, StepAction } from '../../types/plan'
import type { ExecutionError, ExecutionReport, ExecutionStatus, LogLine, LogStream, StepExecution } from '../../types/execution-report'
import { EngineError } from '../engine/errors'
import type { EngineEvent, EventSink } from '../engine/events'

/** What a step executor can see and do while it runs. */
export interface StepContext {
  readonly planId: string
  readonly host: HostRef
  readonly signal?: AbortSignal
  log(stream: LogStream, message: string): void
}

/** Performs one step against real (or simulated) infrastructure. Throw to fail the step. */
export interface StepExecutor {
  execute(step: HostPlanStep, ctx: StepContext): Promise<void>
}

/** Action → executor lookup, passed in explicitly by whoever composes the agent. */
export type StepExecutorTable = ReadonlyMap<StepAction, StepExecutor>

/** Returns the current time as an ISO-8601 string. */
export type Clock = () => string

export const systemClock: Clock = () => new Date().toISOString()

export interface HostPlanExecutorOptions {
  readonly executors: StepExecutorTable
  readonly now?: Clock
  readonly onEvent?: EventSink
  /** Tag for emitted events. */
  readonly action?: EngineEvent['action']
}

export interface StepRunOptions {
  readonly signal?: AbortSignal
  /** When set, only these step ids run; the rest are skipped. */
  readonly stepFilter?: ReadonlySet<string>
}

export function skippedStep(stepId: string, host: HostRef, error: ExecutionError): StepExecution {
  return { stepId, host, status: 'skipped', error }
}

/** failed if any step failed, partial if any was skipped, succeeded otherwise. */
export function reportStatus(steps: readonly StepExecution[]): ExecutionStatus {
  if (steps.some((s) => s.status === 'failed')) return 'failed'
  if (steps.some((s) => s.status === 'skipped')) return 'partial'
  return 'succeeded'
}

/**
 * Runs a host plan step by step on one host.
 *
 * Steps run in host-plan order. A step runs only when each of its dependencies has
 * already succeeded in this run. The first failure halts the host; everything after
 * it is reported as skipped.
 */
export class HostPlanExecutor {
  private readonly executors: StepExecutorTable
  private readonly now: Clock
  private readonly onEvent?: EventSink
  private readonly action: EngineEvent['action']

  constructor(opts: HostPlanExecutorOptions) {
    this.executors = opts.executors
    this.now = opts.now ?? systemClock
    this.onEvent = opts.onEvent
    this.action = opts.action ?? 'agent-run'
  }

  async executeHostPlan(hostPlan: HostPlan, opts: StepRunOptions = {}): Promise<ExecutionReport> {
    if (hostPlan.host.logicalId === '') {
      throw new EngineError('HOST_PLAN_INVALID', `host plan for plan "${hostPlan.planId}" has empty host.logicalId (required for host plans)`)
    }
    if (hostPlan.version !== HOST_PLAN_SCHEMA_VERSION) {
      throw new EngineError('HOST_PLAN_INVALID', `host plan for host "${hostPlan.host.logicalId}" has unsupported version "${hostPlan.version}" (expected "${HOST_PLAN_SCHEMA_VERSION}")`)
    }
    const steps = await this.executeSteps(hostPlan.planId, hostPlan.host, hostPlan.steps, opts)
    return { planId: hostPlan.planId, status: reportStatus(steps), steps }
  }

  async executeSteps(planId: string, host: HostRef, steps: readonly HostPlanStep[], opts: StepRunOptions = {}): Promise<StepExecution[]> {
    const succeeded = new Set<string>()
    const out: StepExecution[] = []
    let halted: ExecutionError | undefined
    for (const step of steps) {
      if (halted === undefined && opts.signal?.aborted === true) {
        halted = { code: 'CANCELLED', message: 'execution cancelled' }
      }
      const blocker = halted ?? this.checkRunnable(step, succeeded, opts.stepFilter)
      if (blocker !== undefined) {
        out.push(skippedStep(step.id, host, blocker))
        this.emit({ event: 'step', planId, host: host.logicalId, stepId: step.id, status: 'skipped', message: blocker.message })
        continue
      }
      const executor = this.executors.get(step.action)
      if (executor === undefined) {
        const error: ExecutionError = { code: 'NO_EXECUTOR', message: `no executor registered for action "${step.action}"` }
        out.push(skippedStep(step.id, host, error))
        this.emit({ event: 'step', planId, host: host.logicalId, stepId: step.id, status: 'skipped', message: error.message })
        continue
      }
      const result = await this.runStep(executor, step, planId, host, opts.signal)
      out.push(result)
      this.emit({ event: 'step', planId, host: host.logicalId, stepId: step.id, status: result.status, ok: result.status === 'succeeded', message: result.error?.message })
      if (result.status === 'succeeded') {
        succeeded.add(step.id)
      } else {
        halted = { code: 'HALTED_AFTER_FAILURE', message: `not run: step "${step.id}" failed on host "${host.logicalId}"` }
      }
    }
    return out
  }

  private checkRunnable(step: HostPlanStep, succeeded: ReadonlySet<string>, filter: ReadonlySet<string> | undefined): ExecutionError | undefined {
    if (filter !== undefined && !filter.has(step.id)) {
      return { code: 'FILTERED', message: `step "${step.id}" excluded by step filter` }
    }
    const unmet = (step.dependsOn ?? []).filter((dep) => !succeeded.has(dep))
    if (unmet.length > 0) {
      return { code: 'DEPENDENCY_NOT_SATISFIED', message: `step "${step.id}" waits on dependencies that did not succeed: ${unmet.map((d) => `"${d}"`).join(', ')}` }
    }
    return undefined
  }

  private async runStep(executor: StepExecutor, step: HostPlanStep, planId: string, host: HostRef, signal: AbortSignal | undefined): Promise<StepExecution> {
    const logs: LogLine[] = []
    const ctx: StepContext = {
      planId,
      host,
      signal,
      log: (stream: LogStream, message: string): void => { logs.push({ time: this.now(), stream, message }) }
    }
    const startedAt = this.now()
    try {
      await executor.execute(step, ctx)
      return { stepId: step.id, host, status: 'succeeded', startedAt, completedAt: this.now(), ...(logs.length > 0 ? { logs } : {}) }
    } catch (err) {
      const message: string = err instanceof Error ? err.message : String(err)
      return {
        stepId: step.id,
        host,
        status: 'failed',
        startedAt,
        completedAt: this.now(),
        error: { code: 'EXECUTION_ERROR', message },
        ...(logs.length > 0 ? { logs } : {})
      }
    }
  }

  private emit(event: Omit<EngineEvent, 'action'>): void {
    this.onEvent?.({ action: this.action, ...event })
  }
}
