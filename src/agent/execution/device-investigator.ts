/**
 * Device Investigator - runs one device's plan.
 *
 * Steps execute strictly in order because later instructions may build on
 * what earlier ones found. For each step the Reasoning Oracle picks the tool
 * calls, the Tool Executor performs them, and the outcome is appended to the
 * device's history. A failing step is recorded and the run moves on.
 */

import type { ReasoningOracle, ToolExecutor } from '../core/contracts.js';
import { errorMessage, isAbortError, toToolError } from '../core/errors.js';
import type {
  DeviceInvestigationState,
  DeviceTask,
  StepOutcome,
  ToolCall,
  ToolInvocation,
} from '../core/types.js';
import { Logger } from '../../utils/logger.js';

export class DeviceInvestigator {
  private readonly oracle: ReasoningOracle;
  private readonly executor: ToolExecutor;
  private readonly logger: Logger;

  constructor(oracle: ReasoningOracle, executor: ToolExecutor, logger?: Logger) {
    this.oracle = oracle;
    this.executor = executor;
    this.logger = logger ?? new Logger('Investigator');
  }

  /**
   * Executes every plan step for one device.
   *
   * The returned state carries `task.history` followed by this pass's
   * outcomes. When `signal` aborts, the run stops before the next step or
   * invocation and returns what it has with `cancelled` set.
   */
  async run(task: DeviceTask, signal?: AbortSignal): Promise<DeviceInvestigationState> {
    const { deviceName, planSteps } = task;
    const outcomes: StepOutcome[] = [];
    let cancelled = false;

    this.logger.step(`${deviceName}: pass ${task.attempt}, ${planSteps.length} step(s)`);

    for (let stepIndex = 0; stepIndex < planSteps.length; stepIndex++) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      const instruction = planSteps[stepIndex];
      const priorOutcomes = [...task.history, ...outcomes];

      let calls: ToolCall[];
      try {
        calls = await this.oracle.selectInvocations(
          {
            deviceName,
            instruction,
            objective: task.objective,
            priorOutcomes,
            retryFeedback: task.retryFeedback,
          },
          signal
        );
      } catch (error) {
        if (isAbortError(error, signal)) {
          cancelled = true;
          break;
        }
        const message = errorMessage(error);
        this.logger.warn(`${deviceName}: step ${stepIndex + 1} reasoning failed: ${message}`);
        outcomes.push({
          stepIndex,
          attempt: task.attempt,
          instruction,
          invocations: [],
          reasoningError: message,
        });
        continue;
      }

      const invocations: ToolInvocation[] = [];
      for (const call of calls) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }
        const invocation = await this.invoke(deviceName, call, signal);
        if (!invocation) {
          cancelled = true;
          break;
        }
        invocations.push(invocation);
      }

      // a step interrupted before any call finished leaves no outcome
      if (!cancelled || invocations.length > 0) {
        outcomes.push({ stepIndex, attempt: task.attempt, instruction, invocations });
      }
      if (cancelled) break;
    }

    const limitationsNotes = summarizeLimitations(outcomes);
    if (limitationsNotes) {
      this.logger.warn(`${deviceName}: pass ${task.attempt} finished with limitations`);
    } else if (!cancelled) {
      this.logger.result(`${deviceName}: pass ${task.attempt} completed without errors`);
    }

    return {
      deviceName,
      objective: task.objective,
      planSteps,
      stepOutcomes: [...task.history, ...outcomes],
      limitationsNotes,
      retryFeedback: task.retryFeedback,
      attempts: task.attempt,
      ...(cancelled ? { cancelled: true } : {}),
    };
  }

  /** Undefined when the call was cut short by the abort signal. */
  private async invoke(
    deviceName: string,
    call: ToolCall,
    signal?: AbortSignal
  ): Promise<ToolInvocation | undefined> {
    const base = { functionName: call.functionName, parameters: { ...call.parameters } };
    try {
      const execution = await this.executor.execute(call, deviceName, signal);
      if (!execution.ok && signal?.aborted) return undefined;
      return execution.ok ? { ...base, result: execution.result } : { ...base, error: execution.error };
    } catch (error) {
      if (signal?.aborted) return undefined;
      return { ...base, error: toToolError(error) };
    }
  }
}

/**
 * Describes every step of a pass that produced no usable data.
 * Returns undefined when the pass was clean.
 */
export function summarizeLimitations(outcomes: readonly StepOutcome[]): string | undefined {
  const lines: string[] = [];

  for (const outcome of outcomes) {
    const label = `Step ${outcome.stepIndex + 1} ("${outcome.instruction}")`;

    if (outcome.reasoningError) {
      lines.push(`${label}: tool selection failed: ${outcome.reasoningError}`);
      continue;
    }
    if (outcome.invocations.length === 0) {
      lines.push(`${label}: no applicable tool was found`);
      continue;
    }

    for (const invocation of outcome.invocations) {
      if (invocation.error) {
        lines.push(
          `${label}: ${invocation.functionName} failed (${invocation.error.kind}): ${invocation.error.message}`
        );
      }
    }
    if (outcome.invocations.every((invocation) => invocation.error !== undefined)) {
      lines.push(`${label}: no successful tool call`);
    }
  }

  return lines.length > 0 ? lines.join('\n') : undefined;
}
