import { mkdir, readFile, stat, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly readText: (path: string) => Promise<string>
  readonly writeText: (path: string, text: string) => Promise<void>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

/** Reads a UTF-8 file; the error names the path when it cannot be read. */
async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8')
  } catch (err) {
    const msg: string = err instanceof Error ? err.message : String(err)
    throw new Error(`reading ${path}: ${msg}`)
  }
}

/** Writes text plus a trailing newline, creating parent directories. */
async function writeText(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, text.endsWith('\n') ? text : text + '\n', 'utf8')
}

export const fsx: FSX = { exists, readText, writeText }
