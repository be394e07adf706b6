import { checkNoEmpty, checkPositive, normalizeString, sortStrings } from './common'

export interface RolloutInputs {
  readonly mode: string
  readonly batch_size?: number
  readonly targets?: readonly string[]
}

export function normalizeRolloutInputs(input: RolloutInputs): RolloutInputs {
  return {
    mode: normalizeString(input.mode),
    ...(input.batch_size ? { batch_size: input.batch_size } : {}),
    ...(input.targets ? { targets: sortStrings(input.targets.map(normalizeString)) } : {})
  }
}

export function validateRolloutInputs(input: RolloutInputs): string[] {
  const problems: string[] = []
  if (input.mode === '') problems.push('mode is required')
  problems.push(...checkPositive(input.batch_size, 'batch_size'))
  problems.push(...checkNoEmpty(input.targets, 'targets'))
  return problems
}
