import { describe, expect, it } from 'vitest';
import { ToolExecutionError } from '../core/errors.js';
import type { DeviceTask } from '../core/types.js';
import { DeviceInvestigator, summarizeLimitations } from '../execution/device-investigator.js';
import { ScriptedExecutor, ScriptedOracle, echoOracle, outcome, silentLogger } from './fakes.js';

function task(overrides: Partial<DeviceTask> = {}): DeviceTask {
  return {
    deviceName: 'pe1',
    objective: 'Confirm every BGP session is established',
    planSteps: ['a', 'b', 'c'],
    history: [],
    attempt: 1,
    ...overrides,
  };
}

function abortError(message: string): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

describe('DeviceInvestigator', () => {
  it('runs every step in order and feeds earlier outcomes to the oracle', async () => {
    const oracle = echoOracle();
    const executor = new ScriptedExecutor((call) => ({ ok: true, result: `out:${String(call.parameters.step)}` }));
    const investigator = new DeviceInvestigator(oracle, executor, silentLogger());

    const state = await investigator.run(task());

    expect(state.stepOutcomes.map((o) => o.instruction)).toEqual(['a', 'b', 'c']);
    expect(state.stepOutcomes.map((o) => o.stepIndex)).toEqual([0, 1, 2]);
    expect(oracle.requests.map((r) => r.priorOutcomes.length)).toEqual([0, 1, 2]);
    expect(state.stepOutcomes[1].invocations).toEqual([
      { functionName: 'show', parameters: { step: 'b' }, result: 'out:b' },
    ]);
    expect(executor.calls.map((c) => c.device)).toEqual(['pe1', 'pe1', 'pe1']);
    expect(state.attempts).toBe(1);
    expect(state.limitationsNotes).toBeUndefined();
    expect(state.cancelled).toBeUndefined();
  });

  it('records failing steps and keeps going', async () => {
    const oracle = new ScriptedOracle((request) => {
      if (request.instruction === 'b') throw new Error('model overloaded');
      if (request.instruction === 'c') return [];
      return [{ functionName: 'get_bgp', parameters: {} }];
    });
    const executor = new ScriptedExecutor(() => ({
      ok: false,
      error: { kind: 'communication', message: 'timeout' },
    }));
    const investigator = new DeviceInvestigator(oracle, executor, silentLogger());

    const state = await investigator.run(task());

    expect(state.stepOutcomes).toHaveLength(3);
    expect(state.stepOutcomes[1].reasoningError).toBe('model overloaded');
    expect(state.stepOutcomes[2].invocations).toEqual([]);
    expect(state.limitationsNotes).toBe(
      [
        'Step 1 ("a"): get_bgp failed (communication): timeout',
        'Step 1 ("a"): no successful tool call',
        'Step 2 ("b"): tool selection failed: model overloaded',
        'Step 3 ("c"): no applicable tool was found',
      ].join('\n')
    );
  });

  it('classifies errors thrown by the executor', async () => {
    const executor = new ScriptedExecutor((call) => {
      if (call.parameters.step === 'a') throw new Error('Permission denied for user netops');
      throw new ToolExecutionError('validation', 'unknown interface');
    });
    const investigator = new DeviceInvestigator(echoOracle(), executor, silentLogger());

    const state = await investigator.run(task({ planSteps: ['a', 'b'] }));

    expect(state.stepOutcomes[0].invocations[0].error).toEqual({
      kind: 'authentication',
      message: 'Permission denied for user netops',
    });
    expect(state.stepOutcomes[1].invocations[0].error).toEqual({
      kind: 'validation',
      message: 'unknown interface',
    });
  });

  it('appends to the history of earlier passes', async () => {
    const earlier = outcome(0, 'a', 1);
    const oracle = echoOracle();
    const investigator = new DeviceInvestigator(oracle, new ScriptedExecutor(), silentLogger());

    const state = await investigator.run(
      task({ planSteps: ['a'], history: [earlier], attempt: 2, retryFeedback: 'narrow the focus' })
    );

    expect(state.stepOutcomes[0]).toBe(earlier);
    expect(state.stepOutcomes.map((o) => o.attempt)).toEqual([1, 2]);
    expect(state.attempts).toBe(2);
    expect(state.retryFeedback).toBe('narrow the focus');
    expect(oracle.requests[0].priorOutcomes).toEqual([earlier]);
    expect(oracle.requests[0].retryFeedback).toBe('narrow the focus');
  });

  it('stops at the next step once the signal aborts', async () => {
    const controller = new AbortController();
    const oracle = echoOracle();
    const executor = new ScriptedExecutor(() => {
      controller.abort();
      return { ok: true, result: 'partial' };
    });
    const investigator = new DeviceInvestigator(oracle, executor, silentLogger());

    const state = await investigator.run(task(), controller.signal);

    expect(state.cancelled).toBe(true);
    expect(state.stepOutcomes).toHaveLength(1);
    expect(state.stepOutcomes[0].invocations[0].result).toBe('partial');
    expect(oracle.requests).toHaveLength(1);
  });

  it('drops a tool call cut short by the abort instead of recording a failure', async () => {
    const controller = new AbortController();
    const executor = new ScriptedExecutor((call) => {
      if (call.parameters.step === 'a') return { ok: true, result: 'first' };
      controller.abort();
      throw abortError('This operation was aborted');
    });
    const investigator = new DeviceInvestigator(echoOracle(), executor, silentLogger());

    const state = await investigator.run(task(), controller.signal);

    expect(state.cancelled).toBe(true);
    expect(state.stepOutcomes).toEqual([
      {
        stepIndex: 0,
        attempt: 1,
        instruction: 'a',
        invocations: [{ functionName: 'show', parameters: { step: 'a' }, result: 'first' }],
      },
    ]);
    expect(state.limitationsNotes).toBeUndefined();
  });

  it('keeps a thrown AbortError as a tool failure while the session is live', async () => {
    const executor = new ScriptedExecutor(() => {
      throw abortError('The operation timed out');
    });
    const investigator = new DeviceInvestigator(echoOracle(), executor, silentLogger());

    const state = await investigator.run(task({ planSteps: ['a'] }), new AbortController().signal);

    expect(state.cancelled).toBeUndefined();
    expect(state.stepOutcomes[0].invocations[0].error).toEqual({
      kind: 'communication',
      message: 'The operation timed out',
    });
  });

  it('treats an oracle rejected by the abort as cancellation, not a failed step', async () => {
    const controller = new AbortController();
    const oracle = new ScriptedOracle(() => {
      controller.abort();
      throw new Error('request aborted');
    });
    const investigator = new DeviceInvestigator(oracle, new ScriptedExecutor(), silentLogger());

    const state = await investigator.run(task(), controller.signal);

    expect(state.cancelled).toBe(true);
    expect(state.stepOutcomes).toEqual([]);
    expect(state.limitationsNotes).toBeUndefined();
  });
});

describe('summarizeLimitations', () => {
  it('returns undefined for a clean pass', () => {
    expect(summarizeLimitations([outcome(0, 'a'), outcome(1, 'b')])).toBeUndefined();
  });

  it('reports a failed call without flagging a step that still had data', () => {
    const mixed = outcome(0, 'a', 1, {
      invocations: [
        { functionName: 'show', parameters: {}, result: 'data' },
        { functionName: 'ping', parameters: {}, error: { kind: 'communication', message: 'unreachable' } },
      ],
    });
    expect(summarizeLimitations([mixed])).toBe('Step 1 ("a"): ping failed (communication): unreachable');
  });
});
