/** Terminal styling for human output. JSON and NDJSON output never pass through here. */

export type ColorMode = 'auto' | 'always' | 'never'

/** SGR open/close pairs; bright cyan stands in for light blue. */
const STYLES = {
  green: [32, 39],
  yellow: [33, 39],
  cyan: [96, 39],
  blue: [34, 39],
  red: [31, 39],
  dim: [2, 22],
  bold: [1, 22]
} as const satisfies Record<string, readonly [number, number]>

export type ColorName = keyof typeof STYLES

const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never']

let mode: ColorMode = 'auto'

/** Unknown values fall back to `auto`. */
export function parseColorMode(raw: string | undefined): ColorMode {
  return COLOR_MODES.find((m) => m === raw) ?? 'auto'
}

export function setColorMode(m: ColorMode): void {
  mode = m
}

/**
 * Whether styling applies under the given mode. In `auto`, NO_COLOR (any value)
 * or FORCE_COLOR=0 turns it off; otherwise it follows the TTY.
 */
export function colorEnabled(m: ColorMode, env: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  switch (m) {
    case 'always': return true
    case 'never': return false
    case 'auto': return env.NO_COLOR === undefined && env.FORCE_COLOR !== '0' && isTTY
  }
}

export function colorize(name: ColorName, text: string): string {
  if (!colorEnabled(mode, process.env, process.stdout.isTTY === true)) return text
  const [open, close] = STYLES[name]
  return `\u001b[${open}m${text}\u001b[${close}m`
}
