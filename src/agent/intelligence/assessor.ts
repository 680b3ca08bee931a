/**
 * Objective Assessor - decides accept / retry / forced acceptance.
 *
 * The semantic comparison of results against objectives is delegated to an
 * ObjectiveJudge. The decision policy applied to those judgments lives here
 * and is a pure function of the session snapshot, so the same snapshot and
 * judgments always produce the same decision.
 */

import type { Assessor, ObjectiveJudge } from '../core/contracts.js';
import { errorMessage } from '../core/errors.js';
import type {
  AssessmentResult,
  DeviceJudgment,
  DeviceResolution,
  InvestigationSession,
} from '../core/types.js';
import { Logger } from '../../utils/logger.js';

/** Guidance used when a judge asks for a retry without saying how. */
export const DEFAULT_RETRY_GUIDANCE =
  'The assessment gave no specific guidance. Review what was gathered against the objective, ' +
  'then try a different approach that focuses on the missing information.';

/** Guidance used when the judge itself failed. */
export const ASSESSMENT_ERROR_GUIDANCE =
  'An unexpected error occurred during assessment. Please try a different approach.';

/** Notes recorded when every device met its objective. */
export const OBJECTIVE_MET_NOTE = 'objective met';

/**
 * Devices the assessor has not settled yet, in session order.
 */
export function pendingDeviceNames(session: InvestigationSession): string[] {
  return session.devices
    .map((device) => device.deviceName)
    .filter((name) => !Object.prototype.hasOwnProperty.call(session.resolutions, name));
}

/**
 * Applies the decision policy to the judge's verdicts for the pending devices.
 *
 * - met: resolved as `met`
 * - unmet, retry cannot help: resolved as `limited`
 * - unmet, retries left: feedback entry, session not achieved
 * - unmet, retry bound reached: resolved as `forced`
 */
export function decideAssessment(
  session: InvestigationSession,
  judgments: readonly DeviceJudgment[]
): AssessmentResult {
  const atLimit = session.currentRetryCount >= session.maxRetries;
  const byDevice = new Map(judgments.map((judgment) => [judgment.deviceName, judgment]));

  const resolutions: Record<string, DeviceResolution> = {};
  const feedbackPerDevice: Record<string, string> = {};
  const forced: string[] = [];

  for (const deviceName of pendingDeviceNames(session)) {
    const judgment = byDevice.get(deviceName) ?? {
      deviceName,
      objectiveMet: false,
      retryCanHelp: true,
      reason: 'no judgment was returned for this device',
    };

    if (judgment.objectiveMet) {
      resolutions[deviceName] = { status: 'met', reason: judgment.reason };
    } else if (!judgment.retryCanHelp) {
      resolutions[deviceName] = { status: 'limited', reason: judgment.reason };
    } else if (!atLimit) {
      feedbackPerDevice[deviceName] = judgment.feedback?.trim() || DEFAULT_RETRY_GUIDANCE;
    } else {
      resolutions[deviceName] = { status: 'forced', reason: judgment.reason };
      forced.push(deviceName);
    }
  }

  const retrying = Object.keys(feedbackPerDevice);
  const combined: Record<string, DeviceResolution> = { ...session.resolutions, ...resolutions };

  return {
    objectiveAchieved: retrying.length === 0,
    feedbackPerDevice,
    resolutions,
    notes: composeNotes(session, combined, retrying, forced),
    maxRetriesReached: forced.length > 0,
  };
}

function composeNotes(
  session: InvestigationSession,
  combined: Record<string, DeviceResolution>,
  retrying: string[],
  forced: string[]
): string {
  const entries = Object.entries(combined);
  if (retrying.length === 0 && entries.every(([, resolution]) => resolution.status === 'met')) {
    return OBJECTIVE_MET_NOTE;
  }

  const lines: string[] = [];
  const met = entries.filter(([, r]) => r.status === 'met').map(([name]) => name);
  if (met.length > 0) {
    lines.push(`objective met for ${met.join(', ')}`);
  }
  for (const [name, resolution] of entries) {
    if (resolution.status === 'limited') {
      lines.push(`${name}: accepted with limitations: ${resolution.reason}`);
    }
  }
  if (forced.length > 0) {
    lines.push(
      `max retries reached (${session.maxRetries}); objective not met for ${forced.join(', ')}`
    );
  }
  if (retrying.length > 0) {
    lines.push(
      `objective not yet met for ${retrying.join(', ')}; retry ${session.currentRetryCount + 1} of ${session.maxRetries}`
    );
  }
  return lines.join('\n');
}

/**
 * Default Assessor: asks the judge about pending devices, then applies
 * the decision policy.
 */
export class ObjectiveAssessor implements Assessor {
  private readonly judge: ObjectiveJudge;
  private readonly logger: Logger;

  constructor(judge: ObjectiveJudge, logger?: Logger) {
    this.judge = judge;
    this.logger = logger ?? new Logger('Assessor');
  }

  async assess(session: InvestigationSession, signal?: AbortSignal): Promise<AssessmentResult> {
    const pending = pendingDeviceNames(session);
    let judgments: DeviceJudgment[] = [];

    if (pending.length > 0) {
      try {
        judgments = await this.judge.judge(session, pending, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        const message = errorMessage(error);
        this.logger.warn(`Judge failed, treating ${pending.join(', ')} as unmet: ${message}`);
        judgments = pending.map((deviceName) => ({
          deviceName,
          objectiveMet: false,
          retryCanHelp: true,
          reason: `assessment error: ${message}`,
          feedback: ASSESSMENT_ERROR_GUIDANCE,
        }));
      }
    }

    const result = decideAssessment(session, judgments);
    if (result.objectiveAchieved) {
      this.logger.result(`Accepted: ${result.notes.split('\n')[0]}`);
    } else {
      this.logger.warn(`Not achieved; retrying ${Object.keys(result.feedbackPerDevice).join(', ')}`);
    }
    return result;
  }
}
