/**
 * Typed errors for the plan engine. Every error carries a stable `code` so the CLI
 * and controllers can render diagnostics without parsing messages.
 */

export type PlanValidationCode =
  | 'PLAN_DUPLICATE_STEP_ID'
  | 'PLAN_UNKNOWN_STEP'
  | 'PLAN_CROSS_HOST_DEPENDENCY'

export type DecodeErrorCode =
  | 'DECODE_MALFORMED'
  | 'DECODE_TRAILING_CONTENT'
  | 'DECODE_UNKNOWN_FIELD'
  | 'DECODE_SHAPE_MISMATCH'
  | 'DECODE_VERSION_MISMATCH'

export type EngineErrorCode =
  | 'NO_PLANNER'
  | 'UNKNOWN_RUNTIME'
  | 'HOST_PLAN_INVALID'
  | 'PLAN_VERSION_MISMATCH'
  | 'HOST_FILE_COLLISION'

/** Deterministic, caller-fixable problem with a plan's step graph. */
export class PlanValidationError extends Error {
  readonly code: PlanValidationCode
  /** Step ids named by the message, dependent step first. */
  readonly stepIds: readonly string[]
  /** Host ids named by the message, in the same order as `stepIds`. */
  readonly hostIds: readonly string[]

  constructor(code: PlanValidationCode, message: string, details: { readonly stepIds: readonly string[]; readonly hostIds?: readonly string[] }) {
    super(message)
    this.name = 'PlanValidationError'
    this.code = code
    this.stepIds = details.stepIds
    this.hostIds = details.hostIds ?? []
  }
}

/** A payload that failed strict decoding. */
export class DecodeError extends Error {
  readonly code: DecodeErrorCode
  /** JSON pointer of the offending field, when one applies. */
  readonly path?: string

  constructor(code: DecodeErrorCode, message: string, path?: string) {
    super(message)
    this.name = 'DecodeError'
    this.code = code
    this.path = path
  }
}

export class EngineError extends Error {
  readonly code: EngineErrorCode

  constructor(code: EngineErrorCode, message: string) {
    super(message)
    this.name = 'EngineError'
    this.code = code
  }
}
