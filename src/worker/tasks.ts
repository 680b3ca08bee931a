/**
 * Task handling for the Redis worker.
 *
 * A producer pushes `{"task_id": "...", "key": "task:<id>"}` onto the
 * `netinvest:tasks` list and stores the task itself as a hash at `key`:
 *
 *   task_id     task identifier
 *   query       the investigation request
 *   timeout_ms  optional per-task session timeout
 *
 * While the task runs, log lines are published on `logs:<taskId>`. The final
 * result (or error) is published on `complete:<taskId>` and stored in the
 * hash together with `state`: running → completed | cancelled | failed.
 */

import { z } from 'zod';
import type { RunOptions } from '../agent/core/orchestrator.js';
import { errorMessage } from '../agent/core/errors.js';
import type { InvestigationSession } from '../agent/core/types.js';
import { deviceStatusLabel } from '../phases/report.js';
import { Logger } from '../utils/logger.js';

export const TASK_QUEUE = 'netinvest:tasks';

export type TaskState = 'running' | 'completed' | 'cancelled' | 'failed';

/** The subset of the ioredis client the worker uses. */
export interface WorkerRedis {
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, values: Record<string, string>): Promise<unknown>;
  publish(channel: string, message: string): Promise<unknown>;
}

export type Investigate = (userQuery: string, options: RunOptions) => Promise<InvestigationSession>;

const taskMessageSchema = z.object({
  task_id: z.string().min(1),
  key: z.string().min(1),
});

export type TaskMessage = z.infer<typeof taskMessageSchema>;

const taskHashSchema = z.object({
  task_id: z.string().min(1),
  query: z.string().trim().min(1),
  timeout_ms: z.coerce.number().int().positive().optional(),
});

export function logChannel(taskId: string): string {
  return `logs:${taskId}`;
}

export function completeChannel(taskId: string): string {
  return `complete:${taskId}`;
}

/** Parses a queue payload; undefined when it is not a task message. */
export function parseTaskMessage(payload: string): TaskMessage | undefined {
  let data: unknown;
  try {
    data = JSON.parse(payload);
  } catch {
    return undefined;
  }
  const parsed = taskMessageSchema.safeParse(data);
  return parsed.success ? parsed.data : undefined;
}

export interface DeviceResultSummary {
  name: string;
  status: string;
  attempts: number;
  steps_recorded: number;
  limitations: string | null;
}

/** Payload published on `complete:<taskId>` for a finished session. */
export interface TaskResult {
  session_id: string;
  query: string;
  state: 'completed' | 'cancelled';
  objective_achieved: InvestigationSession['objectiveAchieved'];
  intent: string | null;
  execution_passes: number;
  retries: number;
  devices: DeviceResultSummary[];
  notes: string | null;
  cancellation_reason: string | null;
  summary: string;
  completed_at: string;
}

export function buildTaskResult(session: InvestigationSession, completedAt: Date = new Date()): TaskResult {
  return {
    session_id: session.sessionId,
    query: session.userQuery,
    state: session.phase === 'cancelled' ? 'cancelled' : 'completed',
    objective_achieved: session.objectiveAchieved,
    intent: session.intent ?? null,
    execution_passes: session.executionPasses,
    retries: session.currentRetryCount,
    devices: session.devices.map((device) => ({
      name: device.deviceName,
      status: deviceStatusLabel(session.resolutions[device.deviceName]),
      attempts: device.attempts,
      steps_recorded: device.stepOutcomes.length,
      limitations: device.limitationsNotes ?? null,
    })),
    notes: session.assessorNotes ?? null,
    cancellation_reason: session.cancellationReason ?? null,
    summary: session.summary ?? '',
    completed_at: completedAt.toISOString(),
  };
}

export interface ProcessTaskOptions {
  /** Aborts the running session (worker shutdown) */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Runs one queued task and records its outcome in Redis.
 * Returns the final state, or undefined when the task hash is unusable.
 */
export async function processTask(
  redis: WorkerRedis,
  message: TaskMessage,
  investigate: Investigate,
  options: ProcessTaskOptions = {}
): Promise<TaskState | undefined> {
  const logger = options.logger ?? new Logger('Worker');
  const { task_id: taskId, key } = message;

  const hash = taskHashSchema.safeParse(await redis.hgetall(key));
  if (!hash.success) {
    logger.error(`Task hash at ${key} is missing or invalid, skipping`);
    return undefined;
  }
  const task = hash.data;

  logger.info(`Task ${taskId}: "${task.query}"`);
  await redis.hset(key, { state: 'running' });

  try {
    const session = await investigate(task.query, {
      signal: options.signal,
      sessionId: `task_${taskId}`,
      timeoutMs: task.timeout_ms,
    });
    const result = buildTaskResult(session);

    await redis.hset(key, {
      state: result.state,
      session_id: session.sessionId,
      result: JSON.stringify(result),
    });
    await redis.publish(completeChannel(taskId), JSON.stringify(result));
    logger.result(`Task ${taskId} state -> ${result.state}`);
    return result.state;
  } catch (error) {
    const reason = errorMessage(error);
    const errorType = error instanceof Error ? error.name : 'Error';
    logger.error(`Task ${taskId} failed: ${reason}`);

    await redis.hset(key, { state: 'failed', error: reason, error_type: errorType });
    await redis.publish(
      completeChannel(taskId),
      JSON.stringify({ error: reason, error_type: errorType, completed_at: new Date().toISOString() })
    );
    return 'failed';
  }
}
