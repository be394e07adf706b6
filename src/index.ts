#!/usr/bin/env node
import { Command } from 'commander'
import { registerPlanCommand } from './commands/plan'
import { registerAgentCommand } from './commands/agent'
import { registerApplyCommand } from './commands/apply'
import { logger } from './utils/logger'
import { parseColorMode, setColorMode } from './utils/colors'

const VERSION: string = '0.1.0'

function flagValue(argv: readonly string[], flag: string): string | undefined {
  const ix = argv.findIndex((a) => a === flag)
  if (ix === -1) return undefined
  const val = argv[ix + 1]
  return val !== undefined && !val.startsWith('-') ? val : undefined
}

/** Applies output flags before Commander parses, so early logs already honor them. */
export function applyGlobalFlags(argv: readonly string[]): void {
  if (argv.includes('--verbose')) logger.setLevel('debug')
  if (argv.includes('--quiet')) logger.setLevel('error')
  if (argv.includes('--json')) {
    logger.setJsonOnly(true)
    process.env.FLEETPLAN_JSON = '1'
  }
  if (argv.includes('--no-emoji')) logger.setNoEmoji(true)
  if (argv.includes('--ndjson')) {
    logger.setNdjson(true)
    process.env.FLEETPLAN_JSON = '1'
  }
  if (argv.includes('--timestamps')) logger.setTimestamps(true)
  if (argv.includes('--summary-only')) logger.setSummaryOnly(true)
  const ndjsonFile = flagValue(argv, '--ndjson-file')
  if (argv.includes('--ndjson-file')) {
    const ts = new Date().toISOString().replace(/[:.]/g, '-')
    logger.setNdjsonFile(ndjsonFile ?? `./.artifacts/fleetplan-${ts}.ndjson`)
  }
  const color = flagValue(argv, '--color')
  setColorMode(parseColorMode(color))
}

export function buildProgram(): Command {
  const program: Command = new Command()
  program.name('fleetplan')
  program.description('fleetplan: slice deployment plans into per-host work and run them')
  program.version(VERSION)
  program.option('--verbose', 'Verbose output')
  program.option('--json', 'JSON-only output (suppresses non-JSON logs)')
  program.option('--quiet', 'Error-only output (suppresses info/warn/success)')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--ndjson', 'Newline-delimited JSON streaming (implies --json)')
  program.option('--timestamps', 'Prefix human logs and JSON with ISO timestamps')
  program.option('--summary-only', 'Only print final JSON summary objects (objects with { final: true })')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  program.option('--ndjson-file [path]', 'Also write NDJSON output lines to file (appends)')
  registerPlanCommand(program)
  registerAgentCommand(program)
  registerApplyCommand(program)
  return program
}

function main(): void {
  applyGlobalFlags(process.argv)
  buildProgram().parseAsync(process.argv)
    .catch((err: unknown) => {
      const message: string = err instanceof Error ? err.message : String(err)
      // eslint-disable-next-line no-console
      console.error(`Error: ${message}`)
      process.exitCode = 1
    })
}

if (require.main === module) main()
