import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { colorize } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly debug: (msg: string) => void
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  readonly json: (val: unknown) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setNdjson: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setSummaryOnly: (on: boolean) => void
  readonly setNdjsonFile: (path: string) => void
}

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let ndjson = false
let timestampsOn = false
let summaryOnly = false
let ndjsonFilePath: string | undefined
let sinkFailed = false

function enabled(kind: LogLevel): boolean {
  return RANK[kind] <= RANK[level]
}

function appendToSink(line: string): void {
  if (!ndjsonFilePath || sinkFailed) return
  try {
    mkdirSync(dirname(ndjsonFilePath), { recursive: true })
    appendFileSync(ndjsonFilePath, line + '\n', 'utf8')
  } catch (err) {
    // Report once, then stop trying; stdout output is unaffected.
    sinkFailed = true
    const msg: string = err instanceof Error ? err.message : String(err)
    // eslint-disable-next-line no-console
    console.error(`[warn] NDJSON file sink disabled: ${msg}`)
  }
}

function prefixFor(kind: LogLevel): string {
  if (noEmoji) return `[${kind}]`
  return kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•'
}

function write(kind: LogLevel, msg: string): void {
  if (jsonOnly || !enabled(kind)) return
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  // Leave pre-colored messages alone
  const colored: string = msg.includes('\u001b[')
    ? msg
    : kind === 'error' ? colorize('red', msg) : kind === 'warn' ? colorize('yellow', msg) : kind === 'info' ? colorize('cyan', msg) : colorize('dim', msg)
  // eslint-disable-next-line no-console
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefixFor(kind)} ${colored}`)
}

function withTimestamp(val: unknown): unknown {
  if (!timestampsOn || val === null || typeof val !== 'object' || Array.isArray(val)) return val
  return 'ts' in val ? val : { ...val, ts: new Date().toISOString() }
}

function isFinalSummary(val: unknown): boolean {
  return val !== null && typeof val === 'object' && 'final' in val && val.final === true
}

export const logger: Logger = {
  debug: (msg: string): void => { write('debug', msg) },
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  success: (msg: string): void => {
    if (jsonOnly || !enabled('info')) return
    write('info', colorize('green', `${noEmoji ? '[ok]' : '✓'} ${msg}`))
  },
  note: (msg: string): void => {
    if (jsonOnly || !enabled('info')) return
    write('info', colorize('blue', `${noEmoji ? '[note]' : '✱'} ${msg}`))
  },
  section: (title: string): void => {
    if (jsonOnly || !enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    // eslint-disable-next-line no-console
    console.log(`${colorize('cyan', bar)}\n${colorize('bold', title)}\n${colorize('cyan', bar)}`)
  },
  json: (val: unknown): void => {
    const v = withTimestamp(val)
    if (summaryOnly && !isFinalSummary(v)) return
    const line: string = ndjson ? JSON.stringify(v) : JSON.stringify(v, null, 2)
    // eslint-disable-next-line no-console
    console.log(line)
    appendToSink(JSON.stringify(v))
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setNdjson: (on: boolean): void => { ndjson = on; if (on) jsonOnly = true },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setSummaryOnly: (on: boolean): void => { summaryOnly = on },
  setNdjsonFile: (path: string): void => { ndjsonFilePath = path === '' ? undefined : path; sinkFailed = false }
}

/** JSON mode is on when the command asked for it or a global flag turned it on. */
export function isJsonMode(flag?: boolean): boolean {
  return flag === true || jsonOnly || process.env.FLEETPLAN_JSON === '1'
}
