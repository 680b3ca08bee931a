/**
 * CLI command parsing and output formatting.
 */

import type { DeviceTarget, InvestigationPlan, LearningContext } from './agent/core/types.js';

export type Command =
  | { kind: 'empty' }
  | { kind: 'exit' }
  | { kind: 'help' }
  | { kind: 'plans' }
  | { kind: 'devices' }
  | { kind: 'learnings' }
  | { kind: 'investigate'; query: string }
  | { kind: 'usage'; message: string };

/**
 * Parses one REPL line. Anything that is not a known command is treated as
 * an investigation request.
 */
export function parseCommand(input: string): Command {
  const trimmed = input.trim();
  if (!trimmed) return { kind: 'empty' };

  const [head, ...rest] = trimmed.split(/\s+/);
  const args = rest.join(' ');

  switch (head.toLowerCase()) {
    case 'exit':
    case 'quit':
      return { kind: 'exit' };
    case 'help':
      return { kind: 'help' };
    case 'plans':
      return { kind: 'plans' };
    case 'devices':
      return { kind: 'devices' };
    case 'learnings':
      return { kind: 'learnings' };
    case 'investigate':
      return args
        ? { kind: 'investigate', query: args }
        : { kind: 'usage', message: 'Usage: investigate <request>' };
    default:
      return { kind: 'investigate', query: trimmed };
  }
}

export const HELP_TEXT = `
  Available Commands:

  Investigation:
    investigate <request>   - Run an investigation
                              Example: investigate check BGP health on xrd-pe1 and xrd-pe2
    <request>               - Same as investigate

  Knowledge:
    plans                   - List investigation plans
    devices                 - List devices in the inventory
    learnings               - Show what earlier sessions taught the agent

  Other:
    help                    - Show this help message
    exit / quit             - Quit the application

  Press Ctrl+C during an investigation to cancel it.
`;

export function formatPlans(plans: readonly InvestigationPlan[]): string {
  if (plans.length === 0) return '  No plans found.';
  return plans
    .map((plan) => `  ${plan.intent} (${plan.steps.length} steps)\n    ${plan.objectiveDescription}`)
    .join('\n');
}

export function formatDevices(devices: readonly DeviceTarget[]): string {
  if (devices.length === 0) return '  The inventory is empty.';
  return devices
    .map((device) => {
      const details = [device.role, device.profile].filter(Boolean).join(', ');
      return details ? `  ${device.name} (${details})` : `  ${device.name}`;
    })
    .join('\n');
}

export function formatLearnings(context: LearningContext): string {
  const sections: string[] = [];
  if (context.learnedPatterns.length > 0) {
    sections.push(`  Learned patterns:\n${context.learnedPatterns.join('\n\n')}`);
  }
  if (context.deviceRelationships.length > 0) {
    sections.push(`  Device relationships:\n${context.deviceRelationships.join('\n\n')}`);
  }
  if (sections.length === 0) {
    return context.previousReports.length > 0
      ? `  ${context.previousReports.length} earlier report(s), no patterns recorded yet.`
      : '  Nothing learned yet.';
  }
  return sections.join('\n\n');
}
