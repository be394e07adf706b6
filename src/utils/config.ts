import Ajv2020 from 'ajv/dist/2020'
import type { ValidateFunction } from 'ajv'
import { join } from 'node:path'
import { configSchema } from '../schemas/config.schema'
import type { FleetplanConfig } from '../types/config'
import { fsx } from './fs'

export const CONFIG_FILE: string = 'fleetplan.config.json'

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateConfig: ValidateFunction<FleetplanConfig> = ajv.compile<FleetplanConfig>(configSchema)

type Env = Readonly<Record<string, string | undefined>>

function parseConfig(text: string, path: string): FleetplanConfig {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (err) {
    const msg: string = err instanceof Error ? err.message : String(err)
    throw new Error(`Config ${path} is not valid JSON: ${msg}`)
  }
  if (validateConfig(data)) return data
  const problems: string[] = (validateConfig.errors ?? []).map((e) => {
    const field: unknown = e.params.additionalProperty
    if (e.keyword === 'additionalProperties' && typeof field === 'string') return `unknown field "${field}"`
    return `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`
  })
  throw new Error(`Config ${path} is invalid: ${problems.join('; ')}`)
}

function envOverrides(env: Env): FleetplanConfig {
  const out: { outputDir?: string; maxParallel?: number; environment?: string } = {}
  if (env.FLEETPLAN_OUTPUT_DIR) out.outputDir = env.FLEETPLAN_OUTPUT_DIR
  if (env.FLEETPLAN_ENVIRONMENT) out.environment = env.FLEETPLAN_ENVIRONMENT
  if (env.FLEETPLAN_MAX_PARALLEL) out.maxParallel = parsePositiveInt(env.FLEETPLAN_MAX_PARALLEL, 'FLEETPLAN_MAX_PARALLEL')
  return out
}

/** Parses a positive integer flag or variable; `label` names it in the error. */
export function parsePositiveInt(raw: string, label: string): number {
  const trimmed = raw.trim()
  const n = Number(trimmed)
  if (trimmed === '' || !Number.isInteger(n) || n < 1) throw new Error(`${label} must be a positive integer (got "${raw}")`)
  return n
}

/**
 * Loads fleetplan.config.json from `cwd` (or `file`, relative to `cwd`) and applies
 * FLEETPLAN_* environment overrides on top. A missing default file is an empty
 * config; a missing explicit file is an error. Command flags override the result.
 */
export async function loadConfig(cwd: string, file?: string, env: Env = process.env): Promise<FleetplanConfig> {
  const path: string = join(cwd, file ?? CONFIG_FILE)
  let fromFile: FleetplanConfig = {}
  if (await fsx.exists(path)) {
    fromFile = parseConfig(await fsx.readText(path), path)
  } else if (file !== undefined) {
    throw new Error(`Config not found: ${path}`)
  }
  return { ...fromFile, ...envOverrides(env) }
}
