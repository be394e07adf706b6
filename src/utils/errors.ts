import { DecodeError, EngineError, PlanValidationError } from '../core/engine/errors'
import { InputsError } from '../core/inputs'

export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

const REMEDIES: Readonly<Record<string, string>> = {
  PLAN_DUPLICATE_STEP_ID: 'Give every step a unique id.',
  PLAN_UNKNOWN_STEP: 'Remove the dependency or add the missing step to the plan.',
  PLAN_CROSS_HOST_DEPENDENCY: 'Move both steps to the same host, or make the dependency a global step.',
  DECODE_MALFORMED: 'Check that the file holds a single JSON document.',
  DECODE_TRAILING_CONTENT: 'Remove everything after the JSON document.',
  DECODE_UNKNOWN_FIELD: 'Remove the field or upgrade fleetplan to a release that knows it.',
  DECODE_SHAPE_MISMATCH: 'Fix the field type shown in the message.',
  DECODE_VERSION_MISMATCH: 'Regenerate the payload with a matching fleetplan release.',
  NO_PLANNER: 'Pass an existing plan file instead of computing one.',
  UNKNOWN_RUNTIME: 'Use one of the runtimes listed in the message.',
  HOST_PLAN_INVALID: 'Regenerate the host plan with `fleetplan plan slice`.',
  PLAN_VERSION_MISMATCH: 'Regenerate the plan with a matching fleetplan release.',
  HOST_FILE_COLLISION: 'Rename one of the hosts so their ids differ in more than punctuation or case.',
  INPUTS_INVALID: 'Fix the step inputs named in the message.'
}

/** Maps any thrown or returned error to the code, message and remedy the CLI prints. */
export function describeError(err: unknown): ErrorInfo {
  if (err instanceof PlanValidationError || err instanceof DecodeError || err instanceof EngineError || err instanceof InputsError) {
    return { code: err.code, message: err.message, remedy: REMEDIES[err.code] }
  }
  if (err instanceof Error) return { code: 'UNEXPECTED', message: err.message }
  return { code: 'UNEXPECTED', message: String(err) }
}
