import { Command } from 'commander'
import { join, resolve } from 'node:path'
import { logger, isJsonMode } from '../utils/logger'
import { fsx } from '../utils/fs'
import { loadConfig } from '../utils/config'
import { slicePlan } from '../core/engine/slice'
import { encodeGlobalSteps, encodeHostPlan, encodeSliceResult } from '../core/engine/codec'
import { computePlanId } from '../core/engine/plan-id'
import { hostFileNames, readPlanFile, reportFailure } from './shared'

interface SliceOptions {
  readonly plan: string
  readonly outputDir?: string
  readonly config?: string
  readonly json?: boolean
}

interface ValidateOptions {
  readonly plan: string
  readonly json?: boolean
}

interface IdOptions {
  readonly plan: string
  readonly env?: string
  readonly config?: string
  readonly json?: boolean
}

export function registerPlanCommand(program: Command): void {
  const plan = program
    .command('plan')
    .description('Inspect, validate and slice deployment plans')

  plan
    .command('slice')
    .description('Split a plan into per-host plans plus global steps')
    .requiredOption('--plan <file>', 'Path to the plan JSON')
    .option('--output-dir <dir>', 'Write hostplan-<host>.json and global-steps.json here instead of printing')
    .option('--config <file>', 'Config file (default: fleetplan.config.json)')
    .option('--json', 'Output JSON summary')
    .action(async (opts: SliceOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      try {
        const cwd: string = process.cwd()
        const config = await loadConfig(cwd, opts.config)
        const decoded = await readPlanFile(resolve(cwd, opts.plan))
        const sliced = slicePlan(decoded)
        if (!sliced.ok) throw sliced.error
        const result = sliced.result
        const hostIds: string[] = Object.keys(result.hostPlans)
        const outDir: string | undefined = opts.outputDir ?? config.outputDir
        if (outDir === undefined) {
          // eslint-disable-next-line no-console
          console.log(encodeSliceResult(result))
          return
        }
        const dir: string = resolve(cwd, outDir)
        const names = hostFileNames(hostIds)
        const files: string[] = []
        for (const [hostId, name] of names) {
          const file = join(dir, name)
          await fsx.writeText(file, encodeHostPlan(result.hostPlans[hostId]))
          files.push(file)
        }
        if (result.globalSteps.length > 0) {
          const file = join(dir, 'global-steps.json')
          await fsx.writeText(file, encodeGlobalSteps(decoded.id, result))
          files.push(file)
        }
        if (jsonMode) {
          logger.json({ ok: true, action: 'plan-slice', planId: decoded.id, hosts: hostIds, globalStepIds: result.globalStepIds, files, final: true })
          return
        }
        logger.success(`Sliced plan ${decoded.id} into ${hostIds.length} host plan(s)`)
        for (const f of files) logger.info(`wrote ${f}`)
      } catch (err) {
        reportFailure('plan-slice', err, jsonMode)
      }
    })

  plan
    .command('validate')
    .description('Strict-decode a plan and check its step graph')
    .requiredOption('--plan <file>', 'Path to the plan JSON')
    .option('--json', 'Output JSON summary')
    .action(async (opts: ValidateOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      try {
        const decoded = await readPlanFile(resolve(process.cwd(), opts.plan))
        const sliced = slicePlan(decoded)
        if (!sliced.ok) throw sliced.error
        const hosts: Record<string, number> = Object.fromEntries(
          Object.entries(sliced.result.hostPlans).map(([hostId, hp]): [string, number] => [hostId, hp.steps.length])
        )
        if (jsonMode) {
          logger.json({ ok: true, action: 'plan-validate', planId: decoded.id, hostCount: Object.keys(hosts).length, hosts, globalStepIds: sliced.result.globalStepIds, final: true })
          return
        }
        logger.success(`Plan ${decoded.id} is valid (${decoded.steps.length} step(s))`)
        for (const [hostId, count] of Object.entries(hosts)) logger.info(`${hostId}: ${count} step(s)`)
        if (sliced.result.globalStepIds.length > 0) logger.info(`global: ${sliced.result.globalStepIds.join(', ')}`)
      } catch (err) {
        reportFailure('plan-validate', err, jsonMode)
      }
    })

  plan
    .command('id')
    .description('Compute the content-derived id of a plan')
    .requiredOption('--plan <file>', 'Path to the plan JSON')
    .option('--env <name>', 'Environment name mixed into the id')
    .option('--config <file>', 'Config file (default: fleetplan.config.json)')
    .option('--json', 'Output JSON summary')
    .action(async (opts: IdOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      try {
        const cwd: string = process.cwd()
        const config = await loadConfig(cwd, opts.config)
        const decoded = await readPlanFile(resolve(cwd, opts.plan))
        const environment: string = opts.env ?? config.environment ?? ''
        const planId: string = computePlanId({ environment, steps: decoded.steps })
        const matches: boolean = planId === decoded.id
        if (jsonMode) {
          logger.json({ ok: true, action: 'plan-id', planId, declaredId: decoded.id, environment, matches, final: true })
          return
        }
        // eslint-disable-next-line no-console
        console.log(planId)
        if (matches) logger.success('matches the plan id')
        else logger.warn(`differs from the plan id "${decoded.id}"`)
      } catch (err) {
        reportFailure('plan-id', err, jsonMode)
      }
    })
}
