/**
 * Progress events emitted while a plan executes. Streamed as NDJSON by the CLI.
 */
import type { ExecutionStatus, StepStatus } from '../../types/execution-report'

export type EngineEventKind = 'slice' | 'host' | 'step' | 'done'

export interface EngineEvent {
  readonly action: 'apply' | 'agent-run'
  readonly event: EngineEventKind
  readonly planId: string
  readonly host?: string
  readonly stepId?: string
  readonly status?: StepStatus | ExecutionStatus
  readonly ok?: boolean
  readonly message?: string
}

export type EventSink = (event: EngineEvent) => void

