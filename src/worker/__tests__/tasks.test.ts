import { describe, expect, it, vi } from 'vitest';
import { deviceState, makeSession, silentLogger } from '../../agent/__tests__/fakes.js';
import { InvalidTargetError } from '../../agent/core/errors.js';
import {
  buildTaskResult,
  parseTaskMessage,
  processTask,
  type Investigate,
  type WorkerRedis,
} from '../tasks.js';

class FakeRedis implements WorkerRedis {
  readonly hashes = new Map<string, Record<string, string>>();
  readonly published: Array<{ channel: string; message: string }> = [];

  async hgetall(key: string): Promise<Record<string, string>> {
    return { ...(this.hashes.get(key) ?? {}) };
  }

  async hset(key: string, values: Record<string, string>): Promise<number> {
    this.hashes.set(key, { ...(this.hashes.get(key) ?? {}), ...values });
    return Object.keys(values).length;
  }

  async publish(channel: string, message: string): Promise<number> {
    this.published.push({ channel, message });
    return 1;
  }
}

const message = { task_id: 't1', key: 'task:t1' };

const finished = makeSession({
  sessionId: 'task_t1',
  phase: 'done',
  objectiveAchieved: 'achieved',
  resolutions: { pe1: { status: 'met', reason: 'all 2 step(s) returned data' } },
  assessorNotes: 'objective met',
  summary: '# Report',
});

describe('parseTaskMessage', () => {
  it('accepts a task message', () => {
    expect(parseTaskMessage('{"task_id": "t1", "key": "task:t1"}')).toEqual(message);
  });

  it('rejects anything else', () => {
    expect(parseTaskMessage('not json')).toBeUndefined();
    expect(parseTaskMessage('{"task_id": "t1"}')).toBeUndefined();
  });
});

describe('buildTaskResult', () => {
  it('summarises the session per device', () => {
    const result = buildTaskResult(finished, new Date('2026-01-01T00:00:00.000Z'));
    expect(result).toEqual({
      session_id: 'task_t1',
      query: 'check bgp on pe1',
      state: 'completed',
      objective_achieved: 'achieved',
      intent: 'bgp_health',
      execution_passes: 1,
      retries: 0,
      devices: [{ name: 'pe1', status: 'objective met', attempts: 1, steps_recorded: 2, limitations: null }],
      notes: 'objective met',
      cancellation_reason: null,
      summary: '# Report',
      completed_at: '2026-01-01T00:00:00.000Z',
    });
  });
});

describe('processTask', () => {
  it('runs the task and publishes its result', async () => {
    const redis = new FakeRedis();
    redis.hashes.set('task:t1', { task_id: 't1', query: 'check bgp on pe1', timeout_ms: '5000' });
    const investigate = vi.fn<Investigate>(async () => finished);

    const state = await processTask(redis, message, investigate, { logger: silentLogger() });

    expect(state).toBe('completed');
    expect(investigate).toHaveBeenCalledWith('check bgp on pe1', {
      signal: undefined,
      sessionId: 'task_t1',
      timeoutMs: 5000,
    });
    expect(redis.hashes.get('task:t1')).toMatchObject({ state: 'completed', session_id: 'task_t1' });
    expect(redis.published).toHaveLength(1);
    expect(redis.published[0].channel).toBe('complete:t1');
    expect(JSON.parse(redis.published[0].message)).toMatchObject({ state: 'completed', summary: '# Report' });
  });

  it('reports a cancelled session as cancelled', async () => {
    const redis = new FakeRedis();
    redis.hashes.set('task:t1', { task_id: 't1', query: 'check bgp on pe1' });
    const cancelled = makeSession({
      phase: 'cancelled',
      objectiveAchieved: 'cancelled',
      cancellationReason: 'session aborted by caller',
      devices: [deviceState('pe1', { cancelled: true })],
    });

    const state = await processTask(redis, message, async () => cancelled, { logger: silentLogger() });

    expect(state).toBe('cancelled');
    expect(redis.hashes.get('task:t1')?.state).toBe('cancelled');
  });

  it('records structural failures', async () => {
    const redis = new FakeRedis();
    redis.hashes.set('task:t1', { task_id: 't1', query: 'check bgp on r9' });
    const investigate: Investigate = async (query) => {
      throw new InvalidTargetError(query, ['pe1']);
    };

    const state = await processTask(redis, message, investigate, { logger: silentLogger() });

    expect(state).toBe('failed');
    expect(redis.hashes.get('task:t1')).toMatchObject({
      state: 'failed',
      error: 'No device in the inventory matches "check bgp on r9". Known devices: pe1',
      error_type: 'InvalidTargetError',
    });
    expect(JSON.parse(redis.published[0].message)).toMatchObject({ error_type: 'InvalidTargetError' });
  });

  it('skips a task whose hash is missing', async () => {
    const redis = new FakeRedis();
    const investigate = vi.fn<Investigate>(async () => finished);

    await expect(processTask(redis, message, investigate, { logger: silentLogger() })).resolves.toBeUndefined();
    expect(investigate).not.toHaveBeenCalled();
    expect(redis.hashes.size).toBe(0);
  });
});
