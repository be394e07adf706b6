import { STEP_ACTIONS } from '../../types/plan'
import type { HostPlanStep, StepAction } from '../../types/plan'
import { decodeStepInputs, hasTypedInputs } from '../inputs'
import type { StepContext, StepExecutor, StepExecutorTable } from './executor'

/**
 * Strict-decodes and validates a step's typed inputs without touching any
 * infrastructure. Lets the controller → agent pipeline run end to end.
 */
export class ValidatingStepExecutor implements StepExecutor {
  async execute(step: HostPlanStep, ctx: StepContext): Promise<void> {
    const decoded = decodeStepInputs(step.action, step.inputs)
    if (!decoded.ok) throw decoded.error
    ctx.log('system', `validated ${step.action} inputs for ${step.target.kind}/${step.target.name}`)
  }
}

/** Executor table mapping every action with typed inputs to a ValidatingStepExecutor. */
export function validatingExecutors(): StepExecutorTable {
  const executor = new ValidatingStepExecutor()
  return new Map(STEP_ACTIONS.filter(hasTypedInputs).map((action): [StepAction, StepExecutor] => [action, executor]))
}
