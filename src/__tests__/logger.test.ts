import { describe, it, expect, vi, afterEach } from 'vitest'
import { mkdtemp, readFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { logger } from '../utils/logger'

afterEach(() => {
  logger.setLevel('info')
  logger.setNoEmoji(false)
  logger.setNdjson(false)
  logger.setJsonOnly(false)
  logger.setSummaryOnly(false)
  logger.setNdjsonFile('')
})

describe('logger', () => {
  it('uses ASCII prefixes without emoji', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setNoEmoji(true)
    logger.info('hello')
    expect(log).toHaveBeenCalledWith('[info] hello')
  })

  it('prints only errors at error level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const err = vi.spyOn(console, 'error').mockImplementation(() => {})
    logger.setNoEmoji(true)
    logger.setLevel('error')
    logger.info('hidden')
    logger.warn('hidden')
    logger.error('boom')
    expect(log).not.toHaveBeenCalled()
    expect(err).toHaveBeenCalledWith('[error] boom')
  })

  it('suppresses human logs in JSON mode but still prints JSON', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setJsonOnly(true)
    logger.info('hidden')
    logger.json({ ok: true })
    expect(log.mock.calls).toEqual([['{\n  "ok": true\n}']])
  })

  it('prints one line per object in NDJSON mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setNdjson(true)
    logger.json({ event: 'step', ok: true })
    expect(log).toHaveBeenCalledWith('{"event":"step","ok":true}')
  })

  it('keeps only final summaries in summary-only mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setNdjson(true)
    logger.setSummaryOnly(true)
    logger.json({ event: 'step' })
    logger.json({ ok: true, final: true })
    expect(log.mock.calls).toEqual([['{"ok":true,"final":true}']])
  })

  it('appends JSON lines to the NDJSON file sink', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const file = join(await mkdtemp(join(tmpdir(), 'fleetplan-log-')), 'nested', 'run.ndjson')
    logger.setNdjsonFile(file)
    logger.json({ a: 1 })
    logger.json({ b: 2 })
    expect(await readFile(file, 'utf8')).toBe('{"a":1}\n{"b":2}\n')
  })
})
