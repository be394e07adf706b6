import { checkPositive, normalizePath, normalizeString } from './common'

/** Inputs of a `migrate` step. */
export interface MigrateInputs {
  readonly database: string
  readonly strategy: string
  readonly engine: string
  readonly path: string
  /** Name of the env var holding the connection string, never the string itself. */
  readonly conn_env: string
  readonly timeout_seconds?: number
  /** Order is significant; never sorted. */
  readonly args?: readonly string[]
}

export function normalizeMigrateInputs(input: MigrateInputs): MigrateInputs {
  return {
    database: normalizeString(input.database),
    strategy: normalizeString(input.strategy),
    engine: normalizeString(input.engine),
    path: normalizePath(input.path, 'path'),
    conn_env: normalizeString(input.conn_env),
    ...(input.timeout_seconds ? { timeout_seconds: input.timeout_seconds } : {}),
    ...(input.args ? { args: input.args.map(normalizeString) } : {})
  }
}

export function validateMigrateInputs(input: MigrateInputs): string[] {
  const problems: string[] = []
  if (input.database === '') problems.push('database is required')
  if (input.strategy === '') problems.push('strategy is required')
  if (input.engine === '') problems.push('engine is required')
  if (input.path === '') problems.push('path is required')
  if (input.conn_env === '') problems.push('conn_env is required')
  problems.push(...checkPositive(input.timeout_seconds, 'timeout_seconds'))
  return problems
}
