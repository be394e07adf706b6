import Ajv2020 from 'ajv/dist/2020'
import type { ErrorObject, ValidateFunction } from 'ajv'
import { planSchema } from '../../schemas/plan.schema'
import { hostPlanSchema } from '../../schemas/host-plan.schema'
import { executionReportSchema } from '../../schemas/execution-report.schema'
import { HOST_PLAN_SCHEMA_VERSION, PLAN_SCHEMA_VERSION } from '../../types/plan'
import type { HostPlan, HostPlanStep, HostRef, Plan, PlanStep, SliceResult } from '../../types/plan'
import type { ExecutionReport, StepExecution } from '../../types/execution-report'
import type { ResourceRef, StringMap } from '../../types/resource'
import { DecodeError } from './errors'

/**
 * Strict wire codec for plans crossing a process or machine boundary.
 *
 * Decoding accepts exactly one JSON value, rejects fields the schema does not
 * name and rejects anything but whitespace after the value. Encoding is
 * deterministic: wire field order is fixed, map keys are sorted and empty
 * optional fields are omitted.
 */

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeError }

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validatePlan: ValidateFunction<Plan> = ajv.compile<Plan>(planSchema)
const validateHostPlan: ValidateFunction<HostPlan> = ajv.compile<HostPlan>(hostPlanSchema)
const validateReport: ValidateFunction<ExecutionReport> = ajv.compile<ExecutionReport>(executionReportSchema)

const utf8 = new TextDecoder('utf-8', { fatal: true })

function fail<T>(error: DecodeError): DecodeResult<T> {
  return { ok: false, error }
}

function isJsonWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r'
}

function skipWhitespace(text: string, from: number): number {
  let i = from
  while (i < text.length && isJsonWhitespace(text.charAt(i))) i++
  return i
}

/** Offset just past the JSON value starting at `start`, or -1 when the text ends first. */
function scanValueEnd(text: string, start: number): number {
  const first = text.charAt(start)
  if (first === '"') {
    for (let i = start + 1; i < text.length; i++) {
      const ch = text.charAt(i)
      if (ch === '\\') i++
      else if (ch === '"') return i + 1
    }
    return -1
  }
  if (first === '{' || first === '[') {
    let depth = 0
    let inString = false
    for (let i = start; i < text.length; i++) {
      const ch = text.charAt(i)
      if (inString) {
        if (ch === '\\') i++
        else if (ch === '"') inString = false
        continue
      }
      if (ch === '"') inString = true
      else if (ch === '{' || ch === '[') depth++
      else if (ch === '}' || ch === ']') {
        depth--
        if (depth === 0) return i + 1
      }
    }
    return -1
  }
  // number, true, false, null
  let i = start
  while (i < text.length && !isJsonWhitespace(text.charAt(i)) && !'{}[],:"'.includes(text.charAt(i))) i++
  return i
}

function readSingleValue(payload: string | Uint8Array, label: string): DecodeResult<unknown> {
  let text: string
  if (typeof payload === 'string') {
    text = payload
  } else {
    try {
      text = utf8.decode(payload)
    } catch {
      return fail(new DecodeError('DECODE_MALFORMED', `${label}: payload is not valid UTF-8`))
    }
  }
  const start = skipWhitespace(text, 0)
  if (start >= text.length) return fail(new DecodeError('DECODE_MALFORMED', `${label}: payload is empty`))
  const end = scanValueEnd(text, start)
  if (end === -1) return fail(new DecodeError('DECODE_MALFORMED', `${label}: unexpected end of JSON input`))
  let value: unknown
  try {
    value = JSON.parse(text.slice(start, end))
  } catch (err) {
    const msg: string = err instanceof Error ? err.message : String(err)
    return fail(new DecodeError('DECODE_MALFORMED', `${label}: ${msg}`))
  }
  const rest = skipWhitespace(text, end)
  if (rest < text.length) {
    return fail(new DecodeError('DECODE_TRAILING_CONTENT', `${label}: trailing content after JSON value at offset ${rest}`))
  }
  return { ok: true, value }
}

function describeSchemaErrors<T>(errors: readonly ErrorObject[], label: string): DecodeResult<T> {
  for (const e of errors) {
    if (e.keyword !== 'additionalProperties') continue
    const field: unknown = e.params.additionalProperty
    const name: string = typeof field === 'string' ? field : '?'
    const path = `${e.instancePath}/${name}`
    return fail(new DecodeError('DECODE_UNKNOWN_FIELD', `${label}: unknown field "${name}" at ${path}`, path))
  }
  const first = errors[0]
  if (first === undefined) return fail(new DecodeError('DECODE_SHAPE_MISMATCH', `${label}: payload does not match schema`))
  const where: string = first.instancePath || '/'
  return fail(new DecodeError('DECODE_SHAPE_MISMATCH', `${label}: ${where} ${first.message ?? 'is invalid'}`.trim(), where))
}

function decodeWith<T>(payload: string | Uint8Array, validate: ValidateFunction<T>, label: string): DecodeResult<T> {
  const read = readSingleValue(payload, label)
  if (!read.ok) return fail(read.error)
  const value: unknown = read.value
  if (validate(value)) return { ok: true, value }
  return describeSchemaErrors(validate.errors ?? [], label)
}

function checkVersion<T extends { readonly version: string }>(decoded: DecodeResult<T>, expected: string, label: string): DecodeResult<T> {
  if (!decoded.ok) return decoded
  const got = decoded.value.version
  if (got === expected) return decoded
  return fail(new DecodeError('DECODE_VERSION_MISMATCH', `${label}: unsupported schema version "${got}" (expected "${expected}")`, '/version'))
}

/** Decode a Plan, rejecting unknown fields, trailing content and a foreign schema version. */
export function decodePlanStrict(payload: string | Uint8Array): DecodeResult<Plan> {
  const label = 'strict decode plan'
  return checkVersion(decodeWith(payload, validatePlan, label), PLAN_SCHEMA_VERSION, label)
}

/**
 * Decode a HostPlan received by an agent.
 * `planId` only adds context to error messages; it never changes the outcome.
 */
export function decodeHostPlanStrict(payload: string | Uint8Array, planId?: string): DecodeResult<HostPlan> {
  const label = planId ? `strict decode host plan (planId: "${planId}")` : 'strict decode host plan'
  return checkVersion(decodeWith(payload, validateHostPlan, label), HOST_PLAN_SCHEMA_VERSION, label)
}

export function decodeExecutionReportStrict(payload: string | Uint8Array): DecodeResult<ExecutionReport> {
  return decodeWith(payload, validateReport, 'strict decode execution report')
}

/** Best-effort read of `planId` for error context before the strict decode runs. */
export function peekPlanId(payload: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(payload)
    if (parsed !== null && typeof parsed === 'object' && 'planId' in parsed && typeof parsed.planId === 'string') return parsed.planId
    return undefined
  } catch {
    return undefined
  }
}

function wireMap(m: StringMap | undefined): StringMap | undefined {
  if (m === undefined) return undefined
  const keys = Object.keys(m).sort()
  if (keys.length === 0) return undefined
  return Object.fromEntries(keys.map((k): [string, string] => [k, m[k]]))
}

function wireRefs(refs: SliceResult['globalDependencyRefs']): Record<string, readonly string[]> {
  return Object.fromEntries(Object.keys(refs).sort().map((stepId): [string, readonly string[]] => [stepId, [...refs[stepId]]]))
}

function wireRef(ref: ResourceRef): ResourceRef {
  return {
    kind: ref.kind,
    name: ref.name,
    provider: ref.provider,
    ...(ref.namespace ? { namespace: ref.namespace } : {})
  }
}

function wireHost(host: HostRef): HostRef {
  const labels = wireMap(host.labels)
  return { logicalId: host.logicalId, ...(labels ? { labels } : {}) }
}

function wireDeps(deps: readonly string[] | undefined): { readonly dependsOn?: readonly string[] } {
  return deps !== undefined && deps.length > 0 ? { dependsOn: [...deps] } : {}
}

function wirePlanStep(step: PlanStep): PlanStep {
  const meta = wireMap(step.meta)
  return {
    id: step.id,
    index: step.index,
    action: step.action,
    target: wireRef(step.target),
    host: wireHost(step.host),
    ...(step.inputs !== undefined ? { inputs: step.inputs } : {}),
    ...wireDeps(step.dependsOn),
    ...(meta ? { meta } : {})
  }
}

function wireHostPlanStep(step: HostPlanStep): HostPlanStep {
  const meta = wireMap(step.meta)
  return {
    id: step.id,
    index: step.index,
    action: step.action,
    target: wireRef(step.target),
    ...(step.inputs !== undefined ? { inputs: step.inputs } : {}),
    ...wireDeps(step.dependsOn),
    ...(meta ? { meta } : {})
  }
}

function wirePlan(plan: Plan): Plan {
  const meta = wireMap(plan.meta)
  return {
    version: plan.version,
    id: plan.id,
    ...(plan.summary ? { summary: plan.summary } : {}),
    steps: plan.steps.map(wirePlanStep),
    ...(meta ? { meta } : {})
  }
}

function wireHostPlan(hp: HostPlan): HostPlan {
  const meta = wireMap(hp.meta)
  return {
    version: hp.version,
    planId: hp.planId,
    host: wireHost(hp.host),
    steps: hp.steps.map(wireHostPlanStep),
    ...(meta ? { meta } : {})
  }
}

function wireStepExecution(s: StepExecution): StepExecution {
  const meta = wireMap(s.meta)
  return {
    stepId: s.stepId,
    host: wireHost(s.host),
    status: s.status,
    ...(s.startedAt ? { startedAt: s.startedAt } : {}),
    ...(s.completedAt ? { completedAt: s.completedAt } : {}),
    ...(s.error ? { error: { ...(s.error.code ? { code: s.error.code } : {}), message: s.error.message } } : {}),
    ...(s.logs && s.logs.length > 0 ? { logs: s.logs.map((l) => ({ ...(l.time ? { time: l.time } : {}), stream: l.stream, message: l.message })) } : {}),
    ...(meta ? { meta } : {})
  }
}

function stringify(value: unknown): string {
  return JSON.stringify(value, null, 2)
}

export function encodePlan(plan: Plan): string {
  return stringify(wirePlan(plan))
}

export function encodeHostPlan(hostPlan: HostPlan): string {
  return stringify(wireHostPlan(hostPlan))
}

export function encodeSliceResult(result: SliceResult): string {
  const hostPlans: Record<string, HostPlan> = Object.fromEntries(
    Object.keys(result.hostPlans).sort().map((hostId): [string, HostPlan] => [hostId, wireHostPlan(result.hostPlans[hostId])])
  )
  const refs = wireRefs(result.globalDependencyRefs)
  return stringify({
    hostPlans,
    globalSteps: result.globalSteps.map(wirePlanStep),
    globalStepIds: [...result.globalStepIds],
    globalDependencyRefs: refs
  })
}

export function encodeExecutionReport(report: ExecutionReport): string {
  const meta = wireMap(report.meta)
  return stringify({
    planId: report.planId,
    status: report.status,
    steps: report.steps.map(wireStepExecution),
    ...(meta ? { meta } : {})
  })
}

/** The global-step file written next to the host plans by `plan slice`. */
export function encodeGlobalSteps(planId: string, result: SliceResult): string {
  const refs = wireRefs(result.globalDependencyRefs)
  return stringify({ planId, steps: result.globalSteps.map(wirePlanStep), globalDependencyRefs: refs })
}
