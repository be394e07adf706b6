import type { KeyValue } from './common'
import { checkNoEmpty, normalizeKeyValues, normalizePath, normalizeString, sortStrings } from './common'

/** Inputs of a `build` step: one container image build. */
export interface BuildInputs {
  readonly provider: string
  readonly workdir: string
  readonly target?: string
  readonly dockerfile: string
  readonly context: string
  readonly tags?: readonly string[]
  readonly build_args?: readonly KeyValue[]
  readonly labels?: readonly KeyValue[]
}

export function normalizeBuildInputs(input: BuildInputs): BuildInputs {
  const workdir = normalizeString(input.workdir)
  const dockerfile = normalizeString(input.dockerfile)
  const context = normalizeString(input.context)
  return {
    provider: normalizeString(input.provider),
    workdir: workdir === '' ? '' : normalizePath(workdir, 'workdir'),
    ...(input.target !== undefined ? { target: normalizeString(input.target) } : {}),
    dockerfile: dockerfile === '' ? '' : normalizePath(dockerfile, 'dockerfile'),
    context: context === '' ? '' : normalizePath(context, 'context'),
    ...(input.tags ? { tags: sortStrings(input.tags) } : {}),
    ...(input.build_args ? { build_args: normalizeKeyValues(input.build_args) } : {}),
    ...(input.labels ? { labels: normalizeKeyValues(input.labels) } : {})
  }
}

export function validateBuildInputs(input: BuildInputs): string[] {
  const problems: string[] = []
  if (input.provider === '') problems.push('provider is required')
  if (input.workdir === '') problems.push('workdir is required')
  if (input.dockerfile === '') problems.push('dockerfile is required (producer must set explicitly)')
  if (input.context === '') problems.push('context is required (producer must set explicitly)')
  problems.push(...checkNoEmpty(input.tags?.map(normalizeString), 'tags'))
  if ((input.build_args ?? []).some((a) => a.key === '')) problems.push('build_args.key is required')
  if ((input.labels ?? []).some((l) => l.key === '')) problems.push('labels.key is required')
  return problems
}
