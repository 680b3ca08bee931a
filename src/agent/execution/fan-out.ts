/**
 * Fan-Out Coordinator - runs one Device Investigator per device.
 *
 * Concurrency is bounded with p-limit so the shared transport to the devices
 * is never flooded. Each device task owns its own state; the coordinator only
 * collects the finished states into a device-keyed map.
 */

import pLimit from 'p-limit';
import { errorMessage } from '../core/errors.js';
import type { DeviceInvestigationState, DeviceTask } from '../core/types.js';
import { Logger } from '../../utils/logger.js';
import type { DeviceInvestigator } from './device-investigator.js';

/** Default number of devices investigated at the same time. */
export const DEFAULT_FANOUT_CONCURRENCY = 4;

/** Narrow view of DeviceInvestigator the coordinator depends on. */
export type DeviceRunner = Pick<DeviceInvestigator, 'run'>;

export class FanOutCoordinator {
  private readonly investigator: DeviceRunner;
  private readonly maxConcurrency: number;
  private readonly logger: Logger;

  constructor(investigator: DeviceRunner, maxConcurrency: number = DEFAULT_FANOUT_CONCURRENCY, logger?: Logger) {
    this.investigator = investigator;
    this.maxConcurrency = Math.max(1, Math.floor(maxConcurrency));
    this.logger = logger ?? new Logger('FanOut');
  }

  /**
   * Runs every task and waits for all of them.
   *
   * A task whose investigator rejects is recorded as failed in its own state
   * (keeping its earlier history); its siblings are unaffected. Tasks that
   * have not started when `signal` aborts are returned unchanged with
   * `cancelled` set.
   */
  async runAll(
    tasks: readonly DeviceTask[],
    signal?: AbortSignal
  ): Promise<Map<string, DeviceInvestigationState>> {
    const limit = pLimit(this.maxConcurrency);
    this.logger.info(
      `Investigating ${tasks.length} device(s) with concurrency ${Math.min(this.maxConcurrency, tasks.length)}`
    );

    const settled = await Promise.allSettled(
      tasks.map((task) =>
        limit(async () => {
          if (signal?.aborted) return notStarted(task);
          return this.investigator.run(task, signal);
        })
      )
    );

    const states = new Map<string, DeviceInvestigationState>();
    settled.forEach((outcome, index) => {
      const task = tasks[index];
      if (outcome.status === 'fulfilled') {
        states.set(task.deviceName, outcome.value);
        return;
      }
      const reason = errorMessage(outcome.reason);
      this.logger.error(`${task.deviceName}: investigation failed: ${reason}`);
      states.set(task.deviceName, failed(task, reason));
    });

    return states;
  }
}

function notStarted(task: DeviceTask): DeviceInvestigationState {
  return {
    deviceName: task.deviceName,
    objective: task.objective,
    planSteps: task.planSteps,
    stepOutcomes: [...task.history],
    retryFeedback: task.retryFeedback,
    attempts: task.attempt - 1,
    cancelled: true,
  };
}

function failed(task: DeviceTask, reason: string): DeviceInvestigationState {
  return {
    deviceName: task.deviceName,
    objective: task.objective,
    planSteps: task.planSteps,
    stepOutcomes: [...task.history],
    limitationsNotes: `Investigation aborted by an unrecoverable error: ${reason}`,
    retryFeedback: task.retryFeedback,
    attempts: task.attempt,
    failure: reason,
  };
}
