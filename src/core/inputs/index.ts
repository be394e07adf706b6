import Ajv2020 from 'ajv/dist/2020'
import type { SchemaObject, ValidateFunction } from 'ajv'
import type { StepAction } from '../../types/plan'
import type { JsonValue } from '../../types/resource'
import {
  applyComposeInputsSchema,
  buildInputsSchema,
  healthCheckInputsSchema,
  migrateInputsSchema,
  renderComposeInputsSchema,
  rolloutInputsSchema
} from '../../schemas/step-inputs.schema'
import { InputsError } from './common'
import { normalizeBuildInputs, validateBuildInputs, type BuildInputs } from './build'
import { normalizeMigrateInputs, validateMigrateInputs, type MigrateInputs } from './migrate'
import { normalizeHealthCheckInputs, validateHealthCheckInputs, type HealthCheckInputs } from './health-check'
import { normalizeRolloutInputs, validateRolloutInputs, type RolloutInputs } from './rollout'
import { normalizeRenderComposeInputs, validateRenderComposeInputs, type RenderComposeInputs } from './render-compose'
import { normalizeApplyComposeInputs, validateApplyComposeInputs, type ApplyComposeInputs } from './apply-compose'

export { InputsError } from './common'
export type { KeyValue } from './common'
export type { BuildInputs } from './build'
export type { MigrateInputs } from './migrate'
export type { HealthCheckInputs, HealthEndpoint } from './health-check'
export type { RolloutInputs } from './rollout'
export type { RenderComposeInputs, ComposeOverlay } from './render-compose'
export type { ApplyComposeInputs } from './apply-compose'

export type TypedStepInputs =
  | { readonly action: 'build'; readonly inputs: BuildInputs }
  | { readonly action: 'migrate'; readonly inputs: MigrateInputs }
  | { readonly action: 'health_check'; readonly inputs: HealthCheckInputs }
  | { readonly action: 'rollout'; readonly inputs: RolloutInputs }
  | { readonly action: 'render_compose'; readonly inputs: RenderComposeInputs }
  | { readonly action: 'apply_compose'; readonly inputs: ApplyComposeInputs }
  | { readonly action: 'create' | 'update' | 'delete' | 'noop'; readonly inputs: JsonValue | undefined }

export type StepInputsOutcome =
  | { readonly ok: true; readonly value: TypedStepInputs }
  | { readonly ok: false; readonly error: InputsError }

const ajv = new Ajv2020({ allErrors: true, strict: false })

interface Contract<T> {
  readonly validate: ValidateFunction<T>
  readonly normalize: (input: T) => T
  readonly check: (input: T) => string[]
}

function contract<T>(schema: SchemaObject, normalize: (input: T) => T, check: (input: T) => string[]): Contract<T> {
  return { validate: ajv.compile<T>(schema), normalize, check }
}

const contracts = {
  build: contract<BuildInputs>(buildInputsSchema, normalizeBuildInputs, validateBuildInputs),
  migrate: contract<MigrateInputs>(migrateInputsSchema, normalizeMigrateInputs, validateMigrateInputs),
  health_check: contract<HealthCheckInputs>(healthCheckInputsSchema, normalizeHealthCheckInputs, validateHealthCheckInputs),
  rollout: contract<RolloutInputs>(rolloutInputsSchema, normalizeRolloutInputs, validateRolloutInputs),
  render_compose: contract<RenderComposeInputs>(renderComposeInputsSchema, normalizeRenderComposeInputs, validateRenderComposeInputs),
  apply_compose: contract<ApplyComposeInputs>(applyComposeInputsSchema, normalizeApplyComposeInputs, validateApplyComposeInputs)
}

/** Actions whose inputs have a typed contract. */
export function hasTypedInputs(action: StepAction): boolean {
  return action in contracts
}

function run<T>(action: string, c: Contract<T>, raw: JsonValue | undefined): T {
  if (raw === undefined || raw === null) throw new InputsError(`invalid ${action} inputs: inputs are required`)
  if (!c.validate(raw)) {
    const first = c.validate.errors?.[0]
    if (first?.keyword === 'additionalProperties') {
      const field: unknown = first.params.additionalProperty
      throw new InputsError(`invalid ${action} inputs: unknown field "${typeof field === 'string' ? field : '?'}"`)
    }
    const where: string = first?.instancePath || '/'
    throw new InputsError(`invalid ${action} inputs: ${where} ${first?.message ?? 'is invalid'}`)
  }
  const normalized = c.normalize(raw)
  const problems = c.check(normalized)
  if (problems.length > 0) throw new InputsError(`${action} inputs validation failed: ${problems.join('; ')}`)
  return normalized
}

function decodeTyped(action: StepAction, raw: JsonValue | undefined): TypedStepInputs {
  switch (action) {
    case 'build': return { action, inputs: run(action, contracts.build, raw) }
    case 'migrate': return { action, inputs: run(action, contracts.migrate, raw) }
    case 'health_check': return { action, inputs: run(action, contracts.health_check, raw) }
    case 'rollout': return { action, inputs: run(action, contracts.rollout, raw) }
    case 'render_compose': return { action, inputs: run(action, contracts.render_compose, raw) }
    case 'apply_compose': return { action, inputs: run(action, contracts.apply_compose, raw) }
    case 'create':
    case 'update':
    case 'delete':
    case 'noop':
      return { action, inputs: raw }
  }
}

/**
 * Strict-decode, normalize and validate the opaque inputs of a step.
 * Actions without a typed contract pass their inputs through untouched.
 */
export function decodeStepInputs(action: StepAction, raw: JsonValue | undefined): StepInputsOutcome {
  try {
    return { ok: true, value: decodeTyped(action, raw) }
  } catch (err) {
    if (err instanceof InputsError) return { ok: false, error: err }
    throw err
  }
}
