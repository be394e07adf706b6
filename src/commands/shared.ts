import { fsx } from '../utils/fs'
import { logger } from '../utils/logger'
import { describeError } from '../utils/errors'
import { decodePlanStrict } from '../core/engine/codec'
import { EngineError } from '../core/engine/errors'
import type { EngineEvent, EventSink } from '../core/engine/events'
import type { Plan } from '../types/plan'

/** Reads and strict-decodes a plan file; decode failures are thrown as DecodeError. */
export async function readPlanFile(path: string): Promise<Plan> {
  const decoded = decodePlanStrict(await fsx.readText(path))
  if (!decoded.ok) throw decoded.error
  return decoded.value
}

function describeEvent(e: EngineEvent): string {
  const parts: string[] = [`[${e.event}]`]
  if (e.host) parts.push(e.host)
  if (e.stepId) parts.push(e.stepId)
  if (e.status) parts.push(e.status)
  if (e.message) parts.push(`- ${e.message}`)
  return parts.join(' ')
}

/** Engine progress: JSON lines in JSON mode, debug lines otherwise. */
export function eventSink(json: boolean): EventSink {
  return (e: EngineEvent): void => {
    if (json) logger.json(e)
    else logger.debug(describeEvent(e))
  }
}

/** Prints a failure the way every command does and sets a non-zero exit code. */
export function reportFailure(action: string, err: unknown, json: boolean): void {
  const info = describeError(err)
  if (json) logger.json({ ok: false, action, code: info.code, message: info.message, ...(info.remedy ? { remedy: info.remedy } : {}), final: true })
  logger.error(`${info.code}: ${info.message}`)
  if (info.remedy) logger.note(info.remedy)
  process.exitCode = 1
}

/** Host ids become file names; anything outside [A-Za-z0-9._-] turns into '_'. */
export function hostFileName(hostId: string): string {
  return `hostplan-${hostId.replace(/[^A-Za-z0-9._-]/g, '_')}.json`
}

/**
 * File name per host id, in the order given. Two ids that land on the same name,
 * compared case-insensitively, fail with HOST_FILE_COLLISION before anything is written.
 */
export function hostFileNames(hostIds: readonly string[]): Map<string, string> {
  const names = new Map<string, string>()
  const claimed = new Map<string, string>()
  for (const hostId of hostIds) {
    const name = hostFileName(hostId)
    const other = claimed.get(name.toLowerCase())
    if (other !== undefined) {
      throw new EngineError('HOST_FILE_COLLISION', `host ids "${other}" and "${hostId}" both map to ${name}`)
    }
    claimed.set(name.toLowerCase(), hostId)
    names.set(hostId, name)
  }
  return names
}

/** Splits a comma-separated flag value, dropping empty entries. */
export function splitList(raw: string | undefined): string[] {
  if (raw === undefined) return []
  return raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0)
}
