/**
 * Rule-based ObjectiveJudge.
 *
 * Judges a device by its latest pass only: the objective counts as met when
 * every plan step produced at least one successful tool call and no call
 * failed. Fallback for the model-backed judge when its call fails or its
 * reply cannot be parsed.
 */

import type { ObjectiveJudge } from '../core/contracts.js';
import type {
  DeviceInvestigationState,
  DeviceJudgment,
  InvestigationSession,
  StepOutcome,
  ToolErrorKind,
} from '../core/types.js';

/** Error kinds another pass with the same tools cannot fix. */
const TERMINAL_ERROR_KINDS: ReadonlySet<ToolErrorKind> = new Set(['authentication']);

export class HeuristicObjectiveJudge implements ObjectiveJudge {
  async judge(session: InvestigationSession, deviceNames: readonly string[]): Promise<DeviceJudgment[]> {
    return deviceNames.map((deviceName) => {
      const device = session.devices.find((d) => d.deviceName === deviceName);
      if (!device) {
        return {
          deviceName,
          objectiveMet: false,
          retryCanHelp: false,
          reason: 'device is not part of this session',
        };
      }
      return judgeDevice(device);
    });
  }
}

/**
 * Judges one device from the outcomes of its latest pass.
 */
export function judgeDevice(device: DeviceInvestigationState): DeviceJudgment {
  const { deviceName } = device;

  if (device.failure) {
    return {
      deviceName,
      objectiveMet: false,
      retryCanHelp: true,
      reason: `investigation failed: ${device.failure}`,
      feedback: 'The previous pass aborted unexpectedly. Re-run the plan from the first step.',
    };
  }

  const latest = device.stepOutcomes.filter((outcome) => outcome.attempt === device.attempts);
  const missingSteps = device.planSteps.length - new Set(latest.map((o) => o.stepIndex)).size;
  if (missingSteps > 0) {
    return {
      deviceName,
      objectiveMet: false,
      retryCanHelp: true,
      reason: `${missingSteps} of ${device.planSteps.length} step(s) were not executed`,
      feedback: 'Complete every step of the plan.',
    };
  }

  const gaps = latest.filter((outcome) => !stepSucceeded(outcome));
  if (gaps.length === 0) {
    return {
      deviceName,
      objectiveMet: true,
      retryCanHelp: false,
      reason: `all ${latest.length} step(s) returned data`,
    };
  }

  const gapLabels = gaps.map((outcome) => `step ${outcome.stepIndex + 1}`).join(', ');
  if (gaps.every(isTerminalGap)) {
    return {
      deviceName,
      objectiveMet: false,
      retryCanHelp: false,
      reason: `tool or device limitation on ${gapLabels}`,
    };
  }

  return {
    deviceName,
    objectiveMet: false,
    retryCanHelp: true,
    reason: `no usable data from ${gapLabels}`,
    feedback: gaps.map(describeGap).join('\n') + '\nRetry these steps with alternate parameters or a narrower focus.',
  };
}

function stepSucceeded(outcome: StepOutcome): boolean {
  return (
    outcome.invocations.length > 0 &&
    outcome.invocations.every((invocation) => invocation.error === undefined)
  );
}

/** A gap no retry can close: no tool exists for the step, or access is denied. */
function isTerminalGap(outcome: StepOutcome): boolean {
  if (outcome.reasoningError) return false;
  if (outcome.invocations.length === 0) return true;
  const errors = outcome.invocations.flatMap((invocation) => (invocation.error ? [invocation.error] : []));
  return errors.length > 0 && errors.every((error) => TERMINAL_ERROR_KINDS.has(error.kind));
}

function describeGap(outcome: StepOutcome): string {
  const label = `Step ${outcome.stepIndex + 1} ("${outcome.instruction}")`;
  if (outcome.reasoningError) return `${label}: tool selection failed`;
  const errors = outcome.invocations
    .filter((invocation) => invocation.error)
    .map((invocation) => `${invocation.functionName}: ${invocation.error?.kind}`);
  return `${label}: ${errors.join(', ')}`;
}
