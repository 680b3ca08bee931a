/**
 * Planning - chooses the plan that answers a request and tailors it per
 * device.
 *
 * Intent selection is delegated to Claude, which falls back to keyword
 * matching when its answer is unusable. A device whose tailoring fails
 * follows the template.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { IntentSelector, PlanCustomizer, Planner, PlanningContext } from '../core/contracts.js';
import { PlanNotFoundError, errorMessage } from '../core/errors.js';
import type { DevicePlan, DeviceTarget, InvestigationPlan, LearningContext } from '../core/types.js';
import type { PlanRepository } from '../knowledge/plan-repository.js';
import { Logger } from '../../utils/logger.js';
import { parseModelJson } from '../../utils/parser.js';
import { renderHistoricalContext } from './insights.js';

/** Model used for intent selection - Haiku for speed */
export const PLANNER_MODEL = 'claude-haiku-4-5-20251001';

export const PLANNER_MAX_TOKENS = 500;

export const CUSTOMIZER_MAX_TOKENS = 1500;

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'all', 'any', 'are', 'check', 'show', 'what', 'with', 'from', 'that', 'this',
  'device', 'devices', 'router', 'routers', 'please', 'investigate', 'verify', 'whether', 'status',
]);

/** Lower-cased words of three or more letters, minus common filler. */
export function keywords(text: string): Set<string> {
  const words = text.toLowerCase().match(/[a-z0-9]{3,}/g) ?? [];
  return new Set(words.filter((word) => !STOP_WORDS.has(word)));
}

/**
 * Scores each plan by keyword overlap with the query: a word of the intent
 * key counts three, a word of the description one. The highest score wins;
 * ties go to the first plan in listing order.
 */
export class KeywordIntentSelector implements IntentSelector {
  private readonly defaultIntent?: string;

  constructor(defaultIntent?: string) {
    this.defaultIntent = defaultIntent;
  }

  async selectIntent(userQuery: string, plans: readonly InvestigationPlan[]): Promise<string> {
    const queryWords = keywords(userQuery);
    let best: { intent: string; score: number } | undefined;

    for (const plan of plans) {
      let score = 0;
      for (const word of keywords(plan.intent.replace(/[_-]/g, ' '))) {
        if (queryWords.has(word)) score += 3;
      }
      for (const word of keywords(plan.objectiveDescription)) {
        if (queryWords.has(word)) score += 1;
      }
      if (score > 0 && (!best || score > best.score)) {
        best = { intent: plan.intent, score };
      }
    }

    if (best) return best.intent;
    const available = plans.map((plan) => plan.intent);
    if (this.defaultIntent && available.includes(this.defaultIntent)) return this.defaultIntent;
    if (plans.length === 1) return plans[0].intent;
    throw new PlanNotFoundError(this.defaultIntent ?? userQuery, available);
  }
}

const INTENT_SYSTEM_PROMPT = `You route network investigation requests to investigation plans.

Given a request and the available plans (intent key and description), pick the single plan that best answers the request.

Respond with JSON only:
{"intent": "<one of the listed intent keys>", "reason": "<one sentence>"}`;

const intentReplySchema = z.object({
  intent: z.string(),
  reason: z.string().optional(),
});

export function intentPrompt(
  userQuery: string,
  plans: readonly InvestigationPlan[],
  learnings?: LearningContext
): string {
  const catalog = plans.map((plan) => `- ${plan.intent}: ${plan.objectiveDescription}`).join('\n');
  const prompt = `Request: ${userQuery}\n\nAvailable plans:\n${catalog}\n`;
  const history = renderHistoricalContext(learnings);
  return history ? `${prompt}\n${history}` : prompt;
}

export class AnthropicIntentSelector implements IntentSelector {
  private client: Anthropic;
  private model: string;
  private fallback: IntentSelector;
  private logger: Logger;

  constructor(apiKey: string, fallback: IntentSelector, model: string = PLANNER_MODEL, logger?: Logger) {
    this.client = new Anthropic({ apiKey });
    this.fallback = fallback;
    this.model = model;
    this.logger = logger ?? new Logger('Planner');
  }

  async selectIntent(
    userQuery: string,
    plans: readonly InvestigationPlan[],
    learnings?: LearningContext,
    signal?: AbortSignal
  ): Promise<string> {
    if (plans.length === 1) return plans[0].intent;

    const prompt = intentPrompt(userQuery, plans, learnings);

    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: PLANNER_MAX_TOKENS,
          system: [{ type: 'text', text: INTENT_SYSTEM_PROMPT, cache_control: { type: 'ephemeral' } }],
          messages: [{ role: 'user', content: prompt }],
        },
        { signal }
      );
      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');
      const { intent, reason } = parseModelJson(text, intentReplySchema);
      if (plans.some((plan) => plan.intent === intent)) {
        this.logger.result(`Selected plan ${intent}${reason ? `: ${reason}` : ''}`);
        return intent;
      }
      this.logger.warn(`Model chose unknown plan "${intent}", falling back to keyword matching`);
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(`Intent selection failed, falling back to keyword matching: ${errorMessage(error)}`);
    }
    return this.fallback.selectIntent(userQuery, plans, learnings, signal);
  }
}

const CUSTOMIZE_SYSTEM_PROMPT = `You adapt a network investigation plan to one device.

You receive the request, a plan template (objective and ordered steps) and the device's name, role and platform. Rewrite the objective and the steps for this device:
- drop steps that cannot apply to its role (e.g. customer-facing BGP checks on a P router);
- make instructions specific to its platform where that changes the command or the data to look at;
- keep the order of the steps you keep;
- never add work beyond the template's objective.

Respond with JSON only:
{"objective": "<objective for this device>", "steps": ["<step>", "..."]}`;

const customizedPlanSchema = z.object({
  objective: z.string().trim().min(1),
  steps: z.array(z.string().trim().min(1)).min(1),
});

export function customizationPrompt(
  template: InvestigationPlan,
  device: DeviceTarget,
  context: PlanningContext
): string {
  const steps = template.steps.map((step, index) => `${index + 1}. ${step}`).join('\n');
  const prompt = `Request: ${context.userQuery}

Device: ${device.name}
Role: ${device.role ?? 'unknown'}
Platform: ${device.profile ?? 'unknown'}

Template "${template.intent}"
Objective: ${template.objectiveDescription}
Steps:
${steps}
`;
  const history = renderHistoricalContext(context.learnings);
  return history ? `${prompt}\n${history}` : prompt;
}

/**
 * Parses a tailored plan. The intent always stays the template's.
 */
export function parseCustomizedPlan(text: string, template: InvestigationPlan): InvestigationPlan {
  const { objective, steps } = parseModelJson(text, customizedPlanSchema);
  return { intent: template.intent, objectiveDescription: objective, steps };
}

/**
 * Plan customizer backed by Claude. Devices with neither a role nor a
 * platform get the template unchanged, without a model call.
 */
export class AnthropicPlanCustomizer implements PlanCustomizer {
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string, model: string = PLANNER_MODEL) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
  }

  async customize(
    template: InvestigationPlan,
    device: DeviceTarget,
    context: PlanningContext,
    signal?: AbortSignal
  ): Promise<InvestigationPlan> {
    if (!device.role && !device.profile) return template;

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: CUSTOMIZER_MAX_TOKENS,
        system: [{ type: 'text', text: CUSTOMIZE_SYSTEM_PROMPT, cache_control: { type: 'ephemeral' } }],
        messages: [{ role: 'user', content: customizationPrompt(template, device, context) }],
      },
      { signal }
    );
    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
    return parseCustomizedPlan(text, template);
  }
}

/**
 * Planner over a PlanRepository. Each session selects its intent once, loads
 * that template and, when a customizer is set, tailors it per device.
 */
export class RepositoryPlanner implements Planner {
  private readonly repository: Pick<PlanRepository, 'load' | 'loadAll'>;
  private readonly selector: IntentSelector;
  private readonly logger: Logger;
  private readonly customizer?: PlanCustomizer;

  constructor(
    repository: Pick<PlanRepository, 'load' | 'loadAll'>,
    selector: IntentSelector,
    logger?: Logger,
    customizer?: PlanCustomizer
  ) {
    this.repository = repository;
    this.selector = selector;
    this.logger = logger ?? new Logger('Planner');
    this.customizer = customizer;
  }

  async planSession(
    userQuery: string,
    targets: readonly DeviceTarget[],
    learnings?: LearningContext,
    signal?: AbortSignal
  ): Promise<DevicePlan[]> {
    const intent = await this.selector.selectIntent(userQuery, this.repository.loadAll(), learnings, signal);
    const template = this.repository.load(intent);
    this.logger.info(`Plan ${template.intent} (${template.steps.length} steps) for ${targets.length} device(s)`);

    return Promise.all(
      targets.map(async (device) => {
        const plan = await this.tailor(template, device, { userQuery, learnings }, signal);
        return {
          deviceName: device.name,
          intent: template.intent,
          objectiveDescription: plan.objectiveDescription,
          steps: plan.steps,
        };
      })
    );
  }

  private async tailor(
    template: InvestigationPlan,
    device: DeviceTarget,
    context: PlanningContext,
    signal?: AbortSignal
  ): Promise<InvestigationPlan> {
    if (!this.customizer) return template;
    try {
      const plan = await this.customizer.customize(template, device, context, signal);
      if (plan !== template) {
        this.logger.result(`${device.name}: plan tailored (${plan.steps.length} steps)`);
      }
      return plan;
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(`${device.name}: plan tailoring failed, using the template: ${errorMessage(error)}`);
      return template;
    }
  }
}
