import { describe, expect, it, vi } from 'vitest';
import type { IntentSelector, PlanCustomizer } from '../core/contracts.js';
import { PlanNotFoundError } from '../core/errors.js';
import type { InvestigationPlan, LearningContext } from '../core/types.js';
import {
  AnthropicIntentSelector,
  AnthropicPlanCustomizer,
  KeywordIntentSelector,
  RepositoryPlanner,
  customizationPrompt,
  intentPrompt,
  keywords,
  parseCustomizedPlan,
} from '../intelligence/planner.js';
import { silentLogger } from './fakes.js';

const bgp: InvestigationPlan = {
  intent: 'bgp_health',
  objectiveDescription: 'Determine whether every BGP session is established',
  steps: ['Retrieve the BGP summary'],
};
const interfaces: InvestigationPlan = {
  intent: 'interface_errors',
  objectiveDescription: 'Identify interfaces with errors or drops',
  steps: ['List interface counters'],
};
const plans = [bgp, interfaces];

describe('keywords', () => {
  it('drops short words and filler', () => {
    expect([...keywords('Check the BGP state on xrd-pe1')]).toEqual(['bgp', 'state', 'xrd', 'pe1']);
  });
});

describe('KeywordIntentSelector', () => {
  it('picks the plan sharing the most words with the query', async () => {
    const selector = new KeywordIntentSelector();
    await expect(selector.selectIntent('check bgp on pe1', plans)).resolves.toBe('bgp_health');
    await expect(selector.selectIntent('any interface errors on xrd-p1?', plans)).resolves.toBe(
      'interface_errors'
    );
  });

  it('uses the default intent when nothing matches', async () => {
    const selector = new KeywordIntentSelector('bgp_health');
    await expect(selector.selectIntent('how is pe1 doing', plans)).resolves.toBe('bgp_health');
  });

  it('fails when nothing matches and there is no usable default', async () => {
    const selector = new KeywordIntentSelector('device_health');
    await expect(selector.selectIntent('how is pe1 doing', plans)).rejects.toThrow(
      new PlanNotFoundError('device_health', ['bgp_health', 'interface_errors'])
    );
  });

  it('falls back to the only plan there is', async () => {
    await expect(new KeywordIntentSelector().selectIntent('how is pe1 doing', [interfaces])).resolves.toBe(
      'interface_errors'
    );
  });
});

describe('AnthropicIntentSelector', () => {
  it('does not consult the model when there is a single plan', async () => {
    const fallback: IntentSelector = { selectIntent: vi.fn(async () => 'unused') };
    const selector = new AnthropicIntentSelector('test-key', fallback, undefined, silentLogger());
    await expect(selector.selectIntent('anything', [bgp])).resolves.toBe('bgp_health');
    expect(fallback.selectIntent).not.toHaveBeenCalled();
  });
});

describe('RepositoryPlanner', () => {
  function repository() {
    const load = vi.fn((intent: string) => (intent === 'bgp_health' ? bgp : interfaces));
    return { load, loadAll: () => plans };
  }

  it('selects the intent once per session and gives every device the template', async () => {
    const selectIntent = vi.fn<IntentSelector['selectIntent']>(async () => 'bgp_health');
    const repo = repository();
    const planner = new RepositoryPlanner(repo, { selectIntent }, silentLogger());

    const planned = await planner.planSession('check bgp', [{ name: 'pe1' }, { name: 'pe2' }]);

    expect(planned).toEqual([
      { deviceName: 'pe1', ...bgp },
      { deviceName: 'pe2', ...bgp },
    ]);
    expect(selectIntent).toHaveBeenCalledTimes(1);
    expect(repo.load).toHaveBeenCalledWith('bgp_health');
  });

  it('selects afresh for a repeated query, with that session\'s learnings', async () => {
    const selectIntent = vi
      .fn<IntentSelector['selectIntent']>()
      .mockResolvedValueOnce('bgp_health')
      .mockResolvedValueOnce('interface_errors');
    const planner = new RepositoryPlanner(repository(), { selectIntent }, silentLogger());
    const later: LearningContext = { previousReports: [], learnedPatterns: ['pe1 drops packets'], deviceRelationships: [] };

    const first = await planner.planSession('check pe1', [{ name: 'pe1' }]);
    const second = await planner.planSession('check pe1', [{ name: 'pe1' }], later);

    expect(first[0].intent).toBe('bgp_health');
    expect(second[0].intent).toBe('interface_errors');
    expect(selectIntent).toHaveBeenCalledTimes(2);
    expect(selectIntent.mock.calls[1][2]).toBe(later);
  });

  it('propagates a failed selection and selects again next time', async () => {
    const selectIntent = vi
      .fn<IntentSelector['selectIntent']>()
      .mockRejectedValueOnce(new Error('model unavailable'))
      .mockResolvedValueOnce('interface_errors');
    const planner = new RepositoryPlanner(repository(), { selectIntent }, silentLogger());

    await expect(planner.planSession('errors?', [{ name: 'pe1' }])).rejects.toThrow('model unavailable');
    await expect(planner.planSession('errors?', [{ name: 'pe1' }])).resolves.toEqual([
      { deviceName: 'pe1', ...interfaces },
    ]);
  });

  it('tailors the template to each device and keeps it where tailoring fails', async () => {
    const customize = vi.fn<PlanCustomizer['customize']>(async (template, device) => {
      if (device.role === 'P') throw new Error('model unavailable');
      return { ...template, objectiveDescription: `${template.objectiveDescription} on ${device.name}`, steps: ['Retrieve the VRF BGP summary'] };
    });
    const planner = new RepositoryPlanner(
      repository(),
      { selectIntent: async () => 'bgp_health' },
      silentLogger(),
      { customize }
    );
    const learnings: LearningContext = { previousReports: ['r1'], learnedPatterns: [], deviceRelationships: [] };

    const planned = await planner.planSession(
      'check bgp',
      [
        { name: 'pe1', role: 'PE', profile: 'IOS-XR' },
        { name: 'p1', role: 'P' },
      ],
      learnings
    );

    expect(planned).toEqual([
      {
        deviceName: 'pe1',
        intent: 'bgp_health',
        objectiveDescription: 'Determine whether every BGP session is established on pe1',
        steps: ['Retrieve the VRF BGP summary'],
      },
      { deviceName: 'p1', ...bgp },
    ]);
    expect(customize.mock.calls[0][2]).toEqual({ userQuery: 'check bgp', learnings });
  });
});

describe('plan tailoring replies', () => {
  it('keeps the template intent', () => {
    const plan = parseCustomizedPlan('```json\n{"objective": "Check PE sessions", "steps": ["Show BGP VRF summary"]}\n```', bgp);
    expect(plan).toEqual({
      intent: 'bgp_health',
      objectiveDescription: 'Check PE sessions',
      steps: ['Show BGP VRF summary'],
    });
  });

  it('rejects a plan without steps', () => {
    expect(() => parseCustomizedPlan('{"objective": "x", "steps": []}', bgp)).toThrow(
      'Model reply does not match the expected shape'
    );
  });

  it('describes the device and its template', () => {
    expect(customizationPrompt(bgp, { name: 'pe1', role: 'PE' }, { userQuery: 'check bgp' })).toBe(
      [
        'Request: check bgp',
        '',
        'Device: pe1',
        'Role: PE',
        'Platform: unknown',
        '',
        'Template "bgp_health"',
        'Objective: Determine whether every BGP session is established',
        'Steps:',
        '1. Retrieve the BGP summary',
        '',
      ].join('\n')
    );
  });

  it('skips the model for a device with neither role nor platform', async () => {
    const customizer = new AnthropicPlanCustomizer('test-key');
    await expect(customizer.customize(bgp, { name: 'pe1' }, { userQuery: 'check bgp' })).resolves.toBe(bgp);
  });
});

describe('intentPrompt', () => {
  it('lists the plans and appends earlier sessions', () => {
    const learnings: LearningContext = { previousReports: [], learnedPatterns: ['pe2 flaps'], deviceRelationships: [] };
    expect(intentPrompt('check bgp', plans, learnings)).toBe(
      [
        'Request: check bgp',
        '',
        'Available plans:',
        '- bgp_health: Determine whether every BGP session is established',
        '- interface_errors: Identify interfaces with errors or drops',
        '',
        '## Previous Investigations',
        '',
        'Context from earlier sessions, most recent last. It may be out of date.',
        '',
        '### Learned Patterns',
        '',
        'pe2 flaps',
        '',
      ].join('\n')
    );
  });

  it('has no history section without learnings', () => {
    expect(intentPrompt('check bgp', [bgp])).toBe(
      'Request: check bgp\n\nAvailable plans:\n- bgp_health: Determine whether every BGP session is established\n'
    );
  });
});
