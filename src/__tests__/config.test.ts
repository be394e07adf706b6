import { describe, it, expect, beforeEach } from 'vitest'
import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { CONFIG_FILE, loadConfig, parsePositiveInt } from '../utils/config'

describe('loadConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fleetplan-config-'))
  })

  it('treats a missing default file as an empty config', async () => {
    expect(await loadConfig(dir, undefined, {})).toEqual({})
  })

  it('fails when an explicit file is missing', async () => {
    await expect(loadConfig(dir, 'custom.json', {})).rejects.toThrow(`Config not found: ${join(dir, 'custom.json')}`)
  })

  it('reads the file and lets the environment override it', async () => {
    await writeFile(join(dir, CONFIG_FILE), JSON.stringify({ outputDir: 'out', maxParallel: 2, environment: 'staging' }))
    expect(await loadConfig(dir, undefined, {})).toEqual({ outputDir: 'out', maxParallel: 2, environment: 'staging' })
    expect(await loadConfig(dir, undefined, { FLEETPLAN_MAX_PARALLEL: '4', FLEETPLAN_ENVIRONMENT: 'prod' }))
      .toEqual({ outputDir: 'out', maxParallel: 4, environment: 'prod' })
  })

  it('rejects unknown fields and bad values', async () => {
    await writeFile(join(dir, CONFIG_FILE), JSON.stringify({ maxParallel: 0, extra: true }))
    await expect(loadConfig(dir, undefined, {})).rejects.toThrow(/unknown field "extra"/)
    await expect(loadConfig(dir, undefined, {})).rejects.toThrow(/\/maxParallel must be >= 1/)
  })

  it('rejects a file that is not JSON', async () => {
    await writeFile(join(dir, CONFIG_FILE), '{ nope')
    await expect(loadConfig(dir, undefined, {})).rejects.toThrow(`Config ${join(dir, CONFIG_FILE)} is not valid JSON`)
  })

  it('rejects a non-numeric parallelism override', async () => {
    await expect(loadConfig(dir, undefined, { FLEETPLAN_MAX_PARALLEL: 'many' }))
      .rejects.toThrow('FLEETPLAN_MAX_PARALLEL must be a positive integer (got "many")')
  })
})

describe('parsePositiveInt', () => {
  it('accepts positive integers only', () => {
    expect(parsePositiveInt(' 3 ', '--max-parallel')).toBe(3)
    expect(() => parsePositiveInt('0', '--max-parallel')).toThrow('--max-parallel must be a positive integer (got "0")')
    expect(() => parsePositiveInt('1.5', '--max-parallel')).toThrow('--max-parallel must be a positive integer (got "1.5")')
  })
})
