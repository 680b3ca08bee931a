/**
 * Insight extraction - distils what a finished session taught us.
 *
 * The model may answer with Markdown strings or with keyed objects; objects
 * are rendered as Markdown sections so the Learning Store only ever holds
 * text.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { InsightExtractor } from '../core/contracts.js';
import { errorMessage } from '../core/errors.js';
import type { InvestigationSession, LearningContext, LearningInsights } from '../core/types.js';
import { Logger } from '../../utils/logger.js';
import { MarkdownBuilder, truncate } from '../../utils/markdown.js';
import { formatRecordAsMarkdown, parseModelJson } from '../../utils/parser.js';

export const INSIGHTS_MODEL = 'claude-haiku-4-5-20251001';

export const INSIGHTS_MAX_TOKENS = 1500;

const MAX_REPORT_CHARS = 8000;

/** Longest excerpt of the latest earlier report placed in a prompt. */
export const HISTORY_REPORT_CHARS = 1500;

const INSIGHTS_SYSTEM_PROMPT = `You maintain the long-term memory of a network investigation assistant.

From the final report of one investigation, extract:
- learned_patterns: reusable lessons (which checks revealed the problem, which tools fail on which platforms, typical root causes).
- device_relationships: topology facts discovered (peerings, adjacencies, uplinks, route reflector clients).

Respond with JSON only. Each field is either a Markdown string or an object whose keys are short topic names and whose values are Markdown text:
{"learned_patterns": "...", "device_relationships": {"bgp_peerings": "..."}}

Use empty strings when there is nothing worth remembering.`;

const insightFieldSchema = z.union([z.string(), z.record(z.unknown())]).default('');

const insightsReplySchema = z.object({
  learned_patterns: insightFieldSchema,
  device_relationships: insightFieldSchema,
});

export function parseInsightsReply(text: string): LearningInsights {
  const reply = parseModelJson(text, insightsReplySchema);
  return {
    learnedPatterns:
      typeof reply.learned_patterns === 'string'
        ? reply.learned_patterns.trim()
        : formatRecordAsMarkdown(reply.learned_patterns, 'Learned Patterns'),
    deviceRelationships:
      typeof reply.device_relationships === 'string'
        ? reply.device_relationships.trim()
        : formatRecordAsMarkdown(reply.device_relationships, 'Device Relationships'),
  };
}

/**
 * Markdown section handing earlier sessions to a prompt: an excerpt of the
 * latest report, then every learned pattern and device relationship.
 * Undefined when there is nothing to hand over.
 */
export function renderHistoricalContext(learnings?: LearningContext): string | undefined {
  if (!learnings) return undefined;
  const { previousReports, learnedPatterns, deviceRelationships } = learnings;
  if (previousReports.length + learnedPatterns.length + deviceRelationships.length === 0) return undefined;

  const builder = new MarkdownBuilder();
  builder.section('Previous Investigations');
  builder.text('Context from earlier sessions, most recent last. It may be out of date.');
  const latest = previousReports[previousReports.length - 1];
  if (latest) {
    builder.subsection('Latest Report');
    builder.code(truncate(latest, HISTORY_REPORT_CHARS));
  }
  if (learnedPatterns.length > 0) {
    builder.subsection('Learned Patterns');
    learnedPatterns.forEach((pattern) => builder.text(pattern));
  }
  if (deviceRelationships.length > 0) {
    builder.subsection('Device Relationships');
    deviceRelationships.forEach((relationship) => builder.text(relationship));
  }
  return builder.build();
}

/**
 * Deterministic insights: one line per device that was not fully met.
 */
export function summarizeSessionInsights(session: InvestigationSession): LearningInsights {
  const lines: string[] = [];
  for (const device of session.devices) {
    const resolution = session.resolutions[device.deviceName];
    if (!resolution || resolution.status === 'met') continue;
    lines.push(`- ${session.intent ?? 'plan'} on ${device.deviceName}: ${resolution.status} (${resolution.reason})`);
  }
  return { learnedPatterns: lines.join('\n'), deviceRelationships: '' };
}

export class AnthropicInsightExtractor implements InsightExtractor {
  private client: Anthropic;
  private model: string;
  private logger: Logger;

  constructor(apiKey: string, model: string = INSIGHTS_MODEL, logger?: Logger) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
    this.logger = logger ?? new Logger('Learning');
  }

  async extract(session: InvestigationSession): Promise<LearningInsights> {
    if (!session.summary) return summarizeSessionInsights(session);
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: INSIGHTS_MAX_TOKENS,
        system: [{ type: 'text', text: INSIGHTS_SYSTEM_PROMPT, cache_control: { type: 'ephemeral' } }],
        messages: [
          {
            role: 'user',
            content: `Request: ${session.userQuery}\n\nFinal report:\n${truncate(session.summary, MAX_REPORT_CHARS)}`,
          },
        ],
      });
      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');
      return parseInsightsReply(text);
    } catch (error) {
      this.logger.warn(`Insight extraction failed, keeping a plain summary: ${errorMessage(error)}`);
      return summarizeSessionInsights(session);
    }
  }
}
