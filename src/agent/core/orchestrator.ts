// Orchestration Loop - drives one investigation session through its phases

import * as path from 'path';
import { startActiveObservation } from '@langfuse/tracing';
import type {
  Assessor,
  InputValidator,
  InsightExtractor,
  LearningStore,
  Planner,
  ReportSynthesizer,
} from './contracts.js';
import { errorMessage, InvalidTargetError, InvestigationError, PlanNotFoundError } from './errors.js';
import type {
  AssessmentResult,
  DeviceInvestigationState,
  DeviceResolution,
  DeviceTask,
  InvestigationSession,
  LearningContext,
} from './types.js';
import type { FanOutCoordinator } from '../execution/fan-out.js';
import {
  ASSESSMENT_ERROR_GUIDANCE,
  DEFAULT_RETRY_GUIDANCE,
  pendingDeviceNames,
} from '../intelligence/assessor.js';
import { summarizeSessionInsights } from '../intelligence/insights.js';
import { uniqueTargets } from '../knowledge/inventory.js';
import { createSessionSignal } from '../utils/cancellation.js';
import { deepFreeze } from '../utils/freeze.js';
import { SessionLogger } from '../utils/session-logger.js';
import { renderSessionReport } from '../../phases/report.js';
import { Logger } from '../../utils/logger.js';

/** Retries allowed after the first execution pass unless configured otherwise. */
export const DEFAULT_MAX_RETRIES = 3;

/** Resolution reason recorded when the loop itself forces acceptance. */
export const FORCED_ACCEPTANCE_REASON = 'max retries reached';

/**
 * Collaborators the loop coordinates. Only the learning pieces are optional.
 */
export interface OrchestratorDeps {
  validator: InputValidator;
  planner: Planner;
  coordinator: Pick<FanOutCoordinator, 'runAll'>;
  assessor: Assessor;
  reporter: ReportSynthesizer;
  learningStore?: LearningStore;
  insightExtractor?: InsightExtractor;
}

export interface OrchestratorOptions {
  maxRetries?: number;
  /** Session timeout in milliseconds; 0 or undefined disables it */
  sessionTimeoutMs?: number;
  /** Directory for `<sessionId>.jsonl` phase-transition logs */
  sessionLogsPath?: string;
  logger?: Logger;
  /** Invoked with every new session snapshot */
  onSnapshot?: (session: InvestigationSession) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
  sessionId?: string;
  /** Overrides the orchestrator's session timeout for this run */
  timeoutMs?: number;
}

export function createSessionId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * State machine for one user request:
 *
 *   Validating → Planning → Executing → Assessing → {Executing | Reporting} → Done
 *
 * plus the Cancelled terminal state reached on abort or timeout. Each phase
 * boundary produces a new session snapshot; the terminal one is deep-frozen.
 *
 * Only structural errors (InvestigationError subclasses) reject `run`. Tool,
 * step and device failures end up in the session and its report.
 */
export class InvestigationOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly maxRetries: number;
  private readonly sessionTimeoutMs?: number;
  private readonly sessionLogsPath?: string;
  private readonly logger: Logger;
  private readonly onSnapshot?: (session: InvestigationSession) => void;

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions = {}) {
    this.deps = deps;
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES));
    this.sessionTimeoutMs = options.sessionTimeoutMs;
    this.sessionLogsPath = options.sessionLogsPath;
    this.logger = options.logger ?? new Logger('Orchestrator');
    this.onSnapshot = options.onSnapshot;
  }

  /**
   * Runs a session and returns its summary.
   */
  async submit(userQuery: string, options: RunOptions = {}): Promise<string> {
    const session = await this.run(userQuery, options);
    return session.summary ?? renderSessionReport(session);
  }

  /**
   * Runs a session to its terminal state (`done` or `cancelled`).
   */
  async run(userQuery: string, options: RunOptions = {}): Promise<InvestigationSession> {
    const sessionId = options.sessionId ?? createSessionId();
    return startActiveObservation('investigation', async (span) => {
      span.update({
        input: { userQuery, sessionId },
        metadata: { maxRetries: this.maxRetries },
      });
      const session = await this.runSession(
        userQuery,
        sessionId,
        options.signal,
        options.timeoutMs ?? this.sessionTimeoutMs
      );
      span.update({
        output: {
          phase: session.phase,
          objectiveAchieved: session.objectiveAchieved,
          executionPasses: session.executionPasses,
          currentRetryCount: session.currentRetryCount,
        },
      });
      return session;
    });
  }

  private async runSession(
    userQuery: string,
    sessionId: string,
    externalSignal?: AbortSignal,
    timeoutMs?: number
  ): Promise<InvestigationSession> {
    const sessionSignal = createSessionSignal(externalSignal, timeoutMs);
    const { signal } = sessionSignal;
    const sessionLog = new SessionLogger(sessionId);

    let session: InvestigationSession = {
      sessionId,
      version: 1,
      phase: 'validating',
      userQuery,
      devices: [],
      resolutions: {},
      currentRetryCount: 0,
      maxRetries: this.maxRetries,
      executionPasses: 0,
      objectiveAchieved: 'unknown',
    };
    const advance = (changes: Partial<InvestigationSession>): InvestigationSession => {
      session = { ...session, ...changes, version: session.version + 1 };
      sessionLog.record(session);
      this.onSnapshot?.(session);
      return session;
    };
    sessionLog.record(session);
    this.onSnapshot?.(session);

    this.logger.info(`Session ${sessionId}: "${userQuery}"`);

    try {
      // ── Validating ──
      const targets = uniqueTargets(await this.deps.validator.resolveTargets(userQuery, signal));
      if (targets.length === 0) {
        throw new InvalidTargetError(userQuery, []);
      }
      this.logger.result(`Targets: ${targets.map((t) => t.name).join(', ')}`);

      // ── Planning ──
      advance({ phase: 'planning' });
      const learnings = await this.recallLearnings();
      const plans = await this.deps.planner.planSession(userQuery, targets, learnings, signal);
      const planByDevice = new Map(plans.map((plan) => [plan.deviceName, plan]));
      const devices: DeviceInvestigationState[] = [];
      const intents = new Set<string>();
      for (const target of targets) {
        const plan = planByDevice.get(target.name);
        if (!plan) {
          const planned = plans[0]?.intent ?? 'unknown';
          throw new PlanNotFoundError(planned, [planned], `The planner returned no plan for ${target.name}`);
        }
        intents.add(plan.intent);
        devices.push({
          deviceName: target.name,
          objective: plan.objectiveDescription,
          planSteps: plan.steps,
          stepOutcomes: [],
          attempts: 0,
        });
      }
      const intent = [...intents].join(', ');
      this.logger.result(`Plan: ${intent} (${devices.length} device(s))`);
      advance({ devices, intent, learnings });

      // ── Executing / Assessing ──
      while (true) {
        if (signal.aborted) {
          return this.cancel(advance, sessionSignal.reason(), sessionLog);
        }
        advance({ phase: 'executing', objectiveAchieved: 'unknown' });
        const pass = session.executionPasses + 1;
        const pending = new Set(pendingDeviceNames(session));

        const results = await startActiveObservation(`pass-${pass}`, async (span) => {
          const tasks: DeviceTask[] = session.devices
            .filter((device) => pending.has(device.deviceName))
            .map((device) => ({
              deviceName: device.deviceName,
              objective: device.objective,
              planSteps: device.planSteps,
              retryFeedback: device.retryFeedback,
              history: device.stepOutcomes,
              attempt: device.attempts + 1,
            }));
          span.update({ input: { pass, devices: tasks.map((t) => t.deviceName) } });
          this.logger.step(`=== Pass ${pass}: ${tasks.map((t) => t.deviceName).join(', ')} ===`);
          return this.deps.coordinator.runAll(tasks, signal);
        });

        advance({
          devices: session.devices.map((device) => results.get(device.deviceName) ?? device),
          executionPasses: pass,
        });
        if (signal.aborted) {
          return this.cancel(advance, sessionSignal.reason(), sessionLog);
        }

        advance({ phase: 'assessing' });
        let assessment = await this.assess(session, signal);
        if (signal.aborted) {
          return this.cancel(advance, sessionSignal.reason(), sessionLog);
        }

        if (!assessment.objectiveAchieved && session.currentRetryCount >= session.maxRetries) {
          assessment = forceAcceptance(session, assessment);
          this.logger.warn(`Max retries (${session.maxRetries}) reached; accepting partial results`);
        }

        if (assessment.objectiveAchieved) {
          advance({
            objectiveAchieved: 'achieved',
            resolutions: settleRemaining(session, assessment),
            assessorNotes: assessment.notes,
          });
          break;
        }

        const retrying = pendingDeviceNames({
          ...session,
          resolutions: { ...session.resolutions, ...assessment.resolutions },
        });
        advance({
          objectiveAchieved: 'not_achieved',
          currentRetryCount: session.currentRetryCount + 1,
          resolutions: { ...session.resolutions, ...assessment.resolutions },
          assessorNotes: assessment.notes,
          devices: session.devices.map((device) =>
            retrying.includes(device.deviceName)
              ? {
                  ...device,
                  retryFeedback: assessment.feedbackPerDevice[device.deviceName] ?? DEFAULT_RETRY_GUIDANCE,
                }
              : device
          ),
        });
        this.logger.info(
          `Retry ${session.currentRetryCount} of ${session.maxRetries} for ${retrying.join(', ')}`
        );
      }

      // ── Reporting ──
      advance({ phase: 'reporting' });
      const summary = await this.synthesize(session, signal);
      if (signal.aborted) {
        return this.cancel(advance, sessionSignal.reason(), sessionLog);
      }
      advance({ summary });
      await this.recordLearnings(session);

      const done = deepFreeze(advance({ phase: 'done' }));
      this.logger.result(
        `Session ${sessionId} done after ${done.executionPasses} pass(es), ${done.currentRetryCount} retr${done.currentRetryCount === 1 ? 'y' : 'ies'}`
      );
      await this.writeSessionLog(sessionLog);
      return done;
    } catch (error) {
      if (error instanceof InvestigationError) {
        this.logger.error(`Session ${sessionId} failed: ${error.message}`);
        await this.writeSessionLog(sessionLog);
        throw error;
      }
      if (signal.aborted) {
        return this.cancel(advance, sessionSignal.reason(), sessionLog);
      }
      throw error;
    } finally {
      sessionSignal.dispose();
    }
  }

  /**
   * Moves the session to the Cancelled terminal state, keeping every
   * recorded outcome, and attaches a deterministic summary.
   */
  private async cancel(
    advance: (changes: Partial<InvestigationSession>) => InvestigationSession,
    reason: string | undefined,
    sessionLog: SessionLogger
  ): Promise<InvestigationSession> {
    const cancellationReason = reason ?? 'session aborted';
    this.logger.warn(`Session cancelled: ${cancellationReason}`);
    const cancelled = advance({ phase: 'cancelled', objectiveAchieved: 'cancelled', cancellationReason });
    const terminal = deepFreeze(advance({ summary: renderSessionReport(cancelled) }));
    await this.writeSessionLog(sessionLog);
    return terminal;
  }

  private async assess(session: InvestigationSession, signal: AbortSignal): Promise<AssessmentResult> {
    try {
      return await this.deps.assessor.assess(session, signal);
    } catch (error) {
      if (signal.aborted) throw error;
      const message = errorMessage(error);
      this.logger.error(`Assessment failed: ${message}`);
      const feedbackPerDevice: Record<string, string> = {};
      for (const name of pendingDeviceNames(session)) {
        feedbackPerDevice[name] = ASSESSMENT_ERROR_GUIDANCE;
      }
      return {
        objectiveAchieved: false,
        feedbackPerDevice,
        resolutions: {},
        notes: `assessment error: ${message}`,
        maxRetriesReached: false,
      };
    }
  }

  private async synthesize(session: InvestigationSession, signal: AbortSignal): Promise<string> {
    try {
      return await this.deps.reporter.synthesize(session, signal);
    } catch (error) {
      if (signal.aborted) throw error;
      this.logger.warn(`Report synthesis failed, using the session record: ${errorMessage(error)}`);
      return renderSessionReport(session);
    }
  }

  private async recallLearnings(): Promise<LearningContext | undefined> {
    if (!this.deps.learningStore) return undefined;
    try {
      return await this.deps.learningStore.recall();
    } catch (error) {
      this.logger.warn(`Could not load learnings: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async recordLearnings(session: InvestigationSession): Promise<void> {
    const store = this.deps.learningStore;
    if (!store) return;
    try {
      const insights = this.deps.insightExtractor
        ? await this.deps.insightExtractor.extract(session)
        : summarizeSessionInsights(session);
      await store.remember({
        sessionId: session.sessionId,
        recordedAt: new Date().toISOString(),
        userQuery: session.userQuery,
        devices: session.devices.map((device) => device.deviceName),
        report: session.summary ?? '',
        ...insights,
      });
      this.logger.info('Learnings recorded');
    } catch (error) {
      this.logger.warn(`Could not record learnings: ${errorMessage(error)}`);
    }
  }

  private async writeSessionLog(sessionLog: SessionLogger): Promise<void> {
    if (!this.sessionLogsPath) return;
    const file = path.join(this.sessionLogsPath, `${sessionLog.getSessionId()}.jsonl`);
    try {
      await sessionLog.writeSession(file);
    } catch (error) {
      this.logger.warn(`Could not write session log ${file}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Turns a "not achieved" verdict at the retry bound into forced acceptance
 * of every device still awaiting a retry.
 */
export function forceAcceptance(
  session: InvestigationSession,
  assessment: AssessmentResult
): AssessmentResult {
  const settled = { ...session.resolutions, ...assessment.resolutions };
  const forced = session.devices
    .map((device) => device.deviceName)
    .filter((name) => !Object.prototype.hasOwnProperty.call(settled, name));

  const resolutions: Record<string, DeviceResolution> = { ...assessment.resolutions };
  for (const name of forced) {
    resolutions[name] = { status: 'forced', reason: FORCED_ACCEPTANCE_REASON };
  }
  const note = `max retries reached (${session.maxRetries}); objective not met for ${forced.join(', ')}`;

  return {
    objectiveAchieved: true,
    feedbackPerDevice: {},
    resolutions,
    notes: assessment.notes ? `${assessment.notes}\n${note}` : note,
    maxRetriesReached: true,
  };
}

/**
 * Resolutions after an accepting assessment. Devices the assessor accepted
 * without an explicit resolution count as met.
 */
function settleRemaining(
  session: InvestigationSession,
  assessment: AssessmentResult
): Record<string, DeviceResolution> {
  const resolutions: Record<string, DeviceResolution> = { ...session.resolutions, ...assessment.resolutions };
  for (const device of session.devices) {
    if (!Object.prototype.hasOwnProperty.call(resolutions, device.deviceName)) {
      resolutions[device.deviceName] = { status: 'met', reason: assessment.notes || 'accepted by the assessor' };
    }
  }
  return resolutions;
}
