import { Command } from 'commander'
import { resolve } from 'node:path'
import { isJsonMode } from '../utils/logger'
import { loadConfig, parsePositiveInt } from '../utils/config'
import { LocalEngine } from '../core/engine/engine'
import { validatingExecutors } from '../core/agent/validating-executor'
import { emitReport } from './agent'
import { eventSink, readPlanFile, reportFailure, splitList } from './shared'

interface ApplyOptions {
  readonly plan: string
  readonly dryRun?: boolean
  readonly maxParallel?: string
  readonly steps?: string
  readonly output?: string
  readonly config?: string
  readonly json?: boolean
}

export function registerApplyCommand(program: Command): void {
  program
    .command('apply')
    .description('Execute a plan locally: global steps first, then one worker per host')
    .requiredOption('--plan <file>', 'Path to the plan JSON')
    .option('--dry-run', 'Slice and report without running any step')
    .option('--max-parallel <n>', 'Host plans to run at once')
    .option('--steps <ids>', 'Comma-separated step ids to run; others are skipped')
    .option('--output <file>', 'Write the execution report here')
    .option('--config <file>', 'Config file (default: fleetplan.config.json)')
    .option('--json', 'Output JSON summary')
    .action(async (opts: ApplyOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      try {
        const cwd: string = process.cwd()
        const config = await loadConfig(cwd, opts.config)
        const plan = await readPlanFile(resolve(cwd, opts.plan))
        const maxParallel: number = opts.maxParallel !== undefined ? parsePositiveInt(opts.maxParallel, '--max-parallel') : (config.maxParallel ?? 1)
        const stepFilter: string[] = splitList(opts.steps)
        const engine = new LocalEngine({ executors: validatingExecutors(), onEvent: eventSink(jsonMode) })
        const { report } = await engine.executePlan({
          plan,
          options: { dryRun: opts.dryRun === true, maxParallel, ...(stepFilter.length > 0 ? { stepFilter } : {}) }
        })
        await emitReport('apply', report, opts.output, jsonMode)
      } catch (err) {
        reportFailure('apply', err, jsonMode)
      }
    })
}
