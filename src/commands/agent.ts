import { Command } from 'commander'
import { resolve } from 'node:path'
import { logger, isJsonMode } from '../utils/logger'
import { fsx } from '../utils/fs'
import { decodeHostPlanStrict, encodeExecutionReport, peekPlanId } from '../core/engine/codec'
import { HostPlanExecutor } from '../core/agent/executor'
import { validatingExecutors } from '../core/agent/validating-executor'
import type { ExecutionReport } from '../types/execution-report'
import { eventSink, reportFailure } from './shared'

interface AgentRunOptions {
  readonly hostplan: string
  readonly output?: string
  readonly json?: boolean
}

/** Summary lines shared by `agent run` and `apply`. */
export async function emitReport(action: string, report: ExecutionReport, output: string | undefined, jsonMode: boolean): Promise<void> {
  const encoded: string = encodeExecutionReport(report)
  let written: string | undefined
  if (output !== undefined) {
    written = resolve(process.cwd(), output)
    await fsx.writeText(written, encoded)
  }
  if (report.status !== 'succeeded') process.exitCode = 1
  if (jsonMode) {
    logger.json({ ok: report.status === 'succeeded', action, planId: report.planId, status: report.status, ...(written ? { output: written } : { report }), final: true })
    return
  }
  logger.section(`Plan ${report.planId}: ${report.status}`)
  for (const s of report.steps) {
    const where: string = s.host.logicalId === '' ? 'global' : s.host.logicalId
    const line = `${where} ${s.stepId} ${s.status}${s.error ? ` (${s.error.code ?? 'ERROR'}: ${s.error.message})` : ''}`
    if (s.status === 'failed') logger.error(line)
    else if (s.status === 'skipped') logger.warn(line)
    else logger.info(line)
  }
  if (written) logger.note(`report written to ${written}`)
  else {
    // eslint-disable-next-line no-console
    console.log(encoded)
  }
}

export function registerAgentCommand(program: Command): void {
  const agent = program
    .command('agent')
    .description('Host agent: run host plans handed out by a controller')

  agent
    .command('run')
    .description('Run one host plan on this machine and report each step')
    .requiredOption('--hostplan <file>', 'Path to the host plan JSON')
    .option('--output <file>', 'Write the execution report here')
    .option('--json', 'Output JSON summary')
    .action(async (opts: AgentRunOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      try {
        const payload: string = await fsx.readText(resolve(process.cwd(), opts.hostplan))
        const decoded = decodeHostPlanStrict(payload, peekPlanId(payload))
        if (!decoded.ok) throw decoded.error
        const executor = new HostPlanExecutor({ executors: validatingExecutors(), onEvent: eventSink(jsonMode), action: 'agent-run' })
        const report = await executor.executeHostPlan(decoded.value)
        await emitReport('agent-run', report, opts.output, jsonMode)
      } catch (err) {
        reportFailure('agent-run', err, jsonMode)
      }
    })
}
