/**
 * Objective Judge backed by Claude.
 *
 * Compares each pending device's latest results with its objective and says
 * whether the objective is met and, if not, whether another pass could help.
 * Devices the model leaves out, or a reply that cannot be parsed, fall back
 * to the rule-based judge.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { ObjectiveJudge } from '../core/contracts.js';
import { errorMessage } from '../core/errors.js';
import type { DeviceInvestigationState, DeviceJudgment, InvestigationSession } from '../core/types.js';
import { Logger } from '../../utils/logger.js';
import { parseModelJson } from '../../utils/parser.js';
import { HeuristicObjectiveJudge, judgeDevice } from './heuristic-judge.js';
import { renderHistoricalContext } from './insights.js';
import { describePriorOutcomes } from './reasoner.js';

/** Model used for assessment - Haiku for speed and cost efficiency */
export const EVALUATOR_MODEL = 'claude-haiku-4-5-20251001';

export const EVALUATOR_MAX_TOKENS = 2000;

export const EVALUATOR_SYSTEM_PROMPT = `You are an impartial assessor of network investigations.

For each device you receive the investigation objective, the plan steps and the tool results of the latest pass. Decide whether the results satisfy the objective.

**Decision per device:**
- objective_met: true when the results answer the objective, even if some data is unremarkable.
- retry_can_help: false when the gap is a tool or device limitation (the command is unsupported, access is denied, the feature is not configured). Another pass with the same tools would not change the outcome.
- feedback: when a retry can help, concrete guidance for the next pass (alternate parameters, narrower focus, steps to repeat).

**Output JSON:**
{
  "devices": [
    {
      "device": "pe1",
      "objective_met": false,
      "retry_can_help": true,
      "reason": "BGP summary was returned but the neighbor detail call failed with a timeout",
      "feedback": "Repeat step 2 for neighbor 10.0.0.2 only."
    }
  ]
}

Judge only from the results shown. A timeout or error is not data.`;

const judgmentReplySchema = z.object({
  devices: z.array(
    z.object({
      device: z.string(),
      objective_met: z.boolean(),
      retry_can_help: z.boolean().default(true),
      reason: z.string().default(''),
      feedback: z.string().optional(),
    })
  ),
});

export type JudgmentReply = z.infer<typeof judgmentReplySchema>;

/**
 * Parses the model's reply into one judgment per entry of `devices`.
 * A device the reply does not mention is judged by `fallback`.
 */
export function parseJudgmentReply(
  text: string,
  devices: readonly DeviceInvestigationState[],
  fallback: (device: DeviceInvestigationState) => DeviceJudgment = judgeDevice
): DeviceJudgment[] {
  const reply = parseModelJson(text, judgmentReplySchema);
  const byName = new Map(reply.devices.map((entry) => [entry.device, entry]));
  return devices.map((device) => {
    const entry = byName.get(device.deviceName);
    if (!entry) return fallback(device);
    return {
      deviceName: device.deviceName,
      objectiveMet: entry.objective_met,
      retryCanHelp: entry.retry_can_help,
      reason: entry.reason || (entry.objective_met ? 'objective met' : 'objective not met'),
      ...(entry.feedback ? { feedback: entry.feedback } : {}),
    };
  });
}

function describeDevice(device: DeviceInvestigationState): string {
  const latest = device.stepOutcomes.filter((outcome) => outcome.attempt === device.attempts);
  const steps = device.planSteps.map((step, index) => `${index + 1}. ${step}`).join('\n');
  let text = `### ${device.deviceName}
Objective: ${device.objective}
Plan:
${steps}

Results of pass ${device.attempts}:
${describePriorOutcomes(latest)}
`;
  if (device.failure) text += `\nThe pass aborted: ${device.failure}\n`;
  if (device.limitationsNotes) text += `\nLimitations:\n${device.limitationsNotes}\n`;
  return text;
}

export function judgmentPrompt(
  session: InvestigationSession,
  devices: readonly DeviceInvestigationState[]
): string {
  const prompt = `Request: ${session.userQuery}\n\n${devices.map(describeDevice).join('\n')}`;
  const history = renderHistoricalContext(session.learnings);
  return history ? `${prompt}\n${history}` : prompt;
}

export class AnthropicObjectiveJudge implements ObjectiveJudge {
  private client: Anthropic;
  private model: string;
  private heuristic = new HeuristicObjectiveJudge();
  private logger: Logger;

  constructor(apiKey: string, model: string = EVALUATOR_MODEL, logger?: Logger) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
    this.logger = logger ?? new Logger('Assessor');
  }

  async judge(
    session: InvestigationSession,
    deviceNames: readonly string[],
    signal?: AbortSignal
  ): Promise<DeviceJudgment[]> {
    const devices = session.devices.filter((device) => deviceNames.includes(device.deviceName));
    if (devices.length < deviceNames.length) {
      // Names outside the session are reported by the heuristic judge.
      return this.heuristic.judge(session, deviceNames);
    }

    const prompt = judgmentPrompt(session, devices);

    let text: string;
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: EVALUATOR_MAX_TOKENS,
          system: [{ type: 'text', text: EVALUATOR_SYSTEM_PROMPT, cache_control: { type: 'ephemeral' } }],
          messages: [{ role: 'user', content: prompt }],
        },
        { signal }
      );
      text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(`Model assessment failed, using rule-based judgment: ${errorMessage(error)}`);
      return this.heuristic.judge(session, deviceNames);
    }

    try {
      return parseJudgmentReply(text, devices);
    } catch (error) {
      this.logger.warn(`Unusable assessment reply, using rule-based judgment: ${errorMessage(error)}`);
      return this.heuristic.judge(session, deviceNames);
    }
  }
}
