import type { HostRef } from './plan'
import type { StringMap } from './resource'

/**
 * Execution report filled in by executors.
 * Timestamps are ISO-8601 strings rather than Date values so reports stay
 * deterministic in tests and portable across processes.
 */

export type ExecutionStatus = 'succeeded' | 'failed' | 'partial'

export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped'

export type LogStream = 'stdout' | 'stderr' | 'system'

export interface ExecutionError {
  readonly code?: string
  readonly message: string
}

export interface LogLine {
  readonly time?: string
  readonly stream: LogStream
  readonly message: string
}

export interface StepExecution {
  readonly stepId: string
  readonly host: HostRef
  readonly status: StepStatus
  readonly startedAt?: string
  readonly completedAt?: string
  readonly error?: ExecutionError
  readonly logs?: readonly LogLine[]
  readonly meta?: StringMap
}

export interface ExecutionReport {
  readonly planId: string
  readonly status: ExecutionStatus
  readonly steps: readonly StepExecution[]
  readonly meta?: StringMap
}
