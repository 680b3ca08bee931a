import { describe, expect, it } from 'vitest';
import { HeuristicObjectiveJudge, judgeDevice } from '../intelligence/heuristic-judge.js';
import { deviceState, makeSession, outcome } from './fakes.js';

describe('judgeDevice', () => {
  it('is met when every step returned data', () => {
    expect(judgeDevice(deviceState('pe1'))).toEqual({
      deviceName: 'pe1',
      objectiveMet: true,
      retryCanHelp: false,
      reason: 'all 2 step(s) returned data',
    });
  });

  it('asks for the remaining steps when a pass stopped early', () => {
    const judgment = judgeDevice(deviceState('pe1', { stepOutcomes: [outcome(0, 'a')] }));
    expect(judgment.objectiveMet).toBe(false);
    expect(judgment.retryCanHelp).toBe(true);
    expect(judgment.reason).toBe('1 of 2 step(s) were not executed');
  });

  it('accepts a step with no applicable tool as a limitation', () => {
    const judgment = judgeDevice(
      deviceState('pe1', { stepOutcomes: [outcome(0, 'a'), outcome(1, 'b', 1, { invocations: [] })] })
    );
    expect(judgment).toEqual({
      deviceName: 'pe1',
      objectiveMet: false,
      retryCanHelp: false,
      reason: 'tool or device limitation on step 2',
    });
  });

  it('does not retry authentication failures', () => {
    const denied = outcome(1, 'b', 1, {
      invocations: [{ functionName: 'show', parameters: {}, error: { kind: 'authentication', message: '403' } }],
    });
    const judgment = judgeDevice(deviceState('pe1', { stepOutcomes: [outcome(0, 'a'), denied] }));
    expect(judgment.retryCanHelp).toBe(false);
  });

  it('retries communication failures with step-specific feedback', () => {
    const dropped = outcome(1, 'b', 1, {
      invocations: [{ functionName: 'get_bgp', parameters: {}, error: { kind: 'communication', message: 'timeout' } }],
    });
    const judgment = judgeDevice(deviceState('pe1', { stepOutcomes: [outcome(0, 'a'), dropped] }));
    expect(judgment).toEqual({
      deviceName: 'pe1',
      objectiveMet: false,
      retryCanHelp: true,
      reason: 'no usable data from step 2',
      feedback:
        'Step 2 ("b"): get_bgp: communication\nRetry these steps with alternate parameters or a narrower focus.',
    });
  });

  it('judges the latest pass only', () => {
    const failedFirst = outcome(1, 'b', 1, {
      invocations: [{ functionName: 'show', parameters: {}, error: { kind: 'protocol', message: 'garbled' } }],
    });
    const device = deviceState('pe1', {
      attempts: 2,
      stepOutcomes: [outcome(0, 'a', 1), failedFirst, outcome(0, 'a', 2), outcome(1, 'b', 2)],
    });
    expect(judgeDevice(device).objectiveMet).toBe(true);
  });

  it('retries a device whose investigation failed', () => {
    const judgment = judgeDevice(deviceState('pe1', { failure: 'boom' }));
    expect(judgment.reason).toBe('investigation failed: boom');
    expect(judgment.retryCanHelp).toBe(true);
  });
});

describe('HeuristicObjectiveJudge', () => {
  it('judges the requested devices in order', async () => {
    const session = makeSession({ devices: [deviceState('pe1'), deviceState('pe2')] });
    const judgments = await new HeuristicObjectiveJudge().judge(session, ['pe2', 'ghost']);
    expect(judgments.map((j) => j.deviceName)).toEqual(['pe2', 'ghost']);
    expect(judgments[1]).toEqual({
      deviceName: 'ghost',
      objectiveMet: false,
      retryCanHelp: false,
      reason: 'device is not part of this session',
    });
  });
});
