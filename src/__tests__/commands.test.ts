import { describe, expect, it } from 'vitest';
import { formatDevices, formatLearnings, formatPlans, parseCommand } from '../commands.js';

describe('parseCommand', () => {
  it('recognises commands case-insensitively', () => {
    expect(parseCommand('  ')).toEqual({ kind: 'empty' });
    expect(parseCommand('QUIT')).toEqual({ kind: 'exit' });
    expect(parseCommand('plans')).toEqual({ kind: 'plans' });
    expect(parseCommand('Devices')).toEqual({ kind: 'devices' });
    expect(parseCommand('learnings')).toEqual({ kind: 'learnings' });
  });

  it('treats other input as an investigation request', () => {
    expect(parseCommand('investigate  check bgp on xrd-pe1')).toEqual({
      kind: 'investigate',
      query: 'check bgp on xrd-pe1',
    });
    expect(parseCommand('check isis on all routers')).toEqual({
      kind: 'investigate',
      query: 'check isis on all routers',
    });
    expect(parseCommand('investigate')).toEqual({ kind: 'usage', message: 'Usage: investigate <request>' });
  });
});

describe('formatters', () => {
  it('lists plans', () => {
    expect(
      formatPlans([{ intent: 'bgp_health', objectiveDescription: 'Check BGP', steps: ['a', 'b'] }])
    ).toBe('  bgp_health (2 steps)\n    Check BGP');
    expect(formatPlans([])).toBe('  No plans found.');
  });

  it('lists devices with their details', () => {
    expect(formatDevices([{ name: 'xrd-pe1', role: 'PE', profile: 'Cisco IOS XR' }, { name: 'lab-1' }])).toBe(
      '  xrd-pe1 (PE, Cisco IOS XR)\n  lab-1'
    );
    expect(formatDevices([])).toBe('  The inventory is empty.');
  });

  it('summarises learnings', () => {
    expect(formatLearnings({ previousReports: [], learnedPatterns: [], deviceRelationships: [] })).toBe(
      '  Nothing learned yet.'
    );
    expect(formatLearnings({ previousReports: ['r1', 'r2'], learnedPatterns: [], deviceRelationships: [] })).toBe(
      '  2 earlier report(s), no patterns recorded yet.'
    );
    expect(
      formatLearnings({ previousReports: ['r1'], learnedPatterns: ['- pe2 flaps'], deviceRelationships: ['pe1 ↔ rr1'] })
    ).toBe('  Learned patterns:\n- pe2 flaps\n\n  Device relationships:\npe1 ↔ rr1');
  });
});
