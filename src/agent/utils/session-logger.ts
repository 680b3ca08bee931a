/**
 * Session Logger - records the orchestration loop's phase transitions.
 *
 * Writes newline-delimited JSON (.jsonl), one line per session snapshot, so a
 * run can be replayed or audited offline.
 *
 * @module agent/utils/session-logger
 */

import type { InvestigationSession, ObjectiveVerdict, SessionPhase } from '../core/types.js';

/**
 * One phase transition of a session.
 */
export interface PhaseTransition {
  /** ISO timestamp */
  timestamp: string;
  /** Snapshot version that entered the phase */
  version: number;
  phase: SessionPhase;
  objectiveAchieved: ObjectiveVerdict;
  currentRetryCount: number;
  executionPasses: number;
  /** Devices still awaiting resolution */
  pendingDevices: string[];
  assessorNotes?: string;
}

export class SessionLogger {
  private steps: PhaseTransition[] = [];
  private sessionId: string;

  constructor(sessionId: string) {
    this.sessionId = sessionId;
  }

  /**
   * Records a snapshot if it entered a new phase or changed the retry state.
   */
  record(session: InvestigationSession): void {
    const last = this.steps[this.steps.length - 1];
    if (
      last &&
      last.phase === session.phase &&
      last.objectiveAchieved === session.objectiveAchieved &&
      last.currentRetryCount === session.currentRetryCount &&
      last.executionPasses === session.executionPasses
    ) {
      return;
    }

    this.steps.push({
      timestamp: new Date().toISOString(),
      version: session.version,
      phase: session.phase,
      objectiveAchieved: session.objectiveAchieved,
      currentRetryCount: session.currentRetryCount,
      executionPasses: session.executionPasses,
      pendingDevices: session.devices
        .map((device) => device.deviceName)
        .filter((name) => !(name in session.resolutions)),
      ...(session.assessorNotes ? { assessorNotes: session.assessorNotes } : {}),
    });
  }

  /**
   * Writes all recorded transitions to `filepath`, one JSON object per line.
   */
  async writeSession(filepath: string): Promise<void> {
    const fs = await import('fs/promises');
    const path = await import('path');
    await fs.mkdir(path.dirname(filepath), { recursive: true });
    const content = this.steps.map((step) => JSON.stringify(step)).join('\n');
    await fs.writeFile(filepath, content + '\n');
  }

  getSessionId(): string {
    return this.sessionId;
  }

  /** Recorded transitions (copy) */
  getSteps(): PhaseTransition[] {
    return [...this.steps];
  }
}
