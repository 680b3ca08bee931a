/**
 * Report Phase - turns a terminal session into a human-readable summary.
 *
 * `renderSessionReport` is a deterministic Markdown rendering of the full
 * session (every pass, every tool call, the assessor's notes). The
 * Anthropic-backed synthesizer hands that rendering to Claude for a narrative
 * report and falls back to it verbatim when the call fails.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ReportSynthesizer } from '../agent/core/contracts.js';
import { errorMessage } from '../agent/core/errors.js';
import type {
  DeviceInvestigationState,
  DeviceResolution,
  InvestigationSession,
  ToolInvocation,
} from '../agent/core/types.js';
import { renderHistoricalContext } from '../agent/intelligence/insights.js';
import { Logger } from '../utils/logger.js';
import { MarkdownBuilder, truncate } from '../utils/markdown.js';

export const REPORT_MODEL = 'claude-sonnet-4-20250514';
export const REPORT_MAX_TOKENS = 4096;

/** Longest rendering of a single tool result kept in a report. */
const RESULT_PREVIEW_CHARS = 400;

// ── Deterministic rendering ───────────────────────────────────────────────────

export function sessionOutcomeLabel(session: InvestigationSession): string {
  if (session.objectiveAchieved === 'cancelled') return 'Cancelled';
  const resolutions = Object.values(session.resolutions);
  if (session.objectiveAchieved === 'achieved' && resolutions.every((r) => r.status === 'met')) {
    return 'Objective met';
  }
  if (session.objectiveAchieved === 'achieved') return 'Partially met';
  return 'Not met';
}

export function deviceStatusLabel(resolution: DeviceResolution | undefined): string {
  switch (resolution?.status) {
    case 'met':
      return 'objective met';
    case 'limited':
      return 'partially met (tool or device limitation)';
    case 'forced':
      return 'partially met (max retries reached)';
    default:
      return 'not assessed';
  }
}

function describeInvocation(invocation: ToolInvocation): string {
  const params = JSON.stringify(invocation.parameters);
  if (invocation.error) {
    return `${invocation.functionName}(${params}) → ${invocation.error.kind} error: ${invocation.error.message}`;
  }
  const result =
    typeof invocation.result === 'string' ? invocation.result : JSON.stringify(invocation.result ?? null);
  return `${invocation.functionName}(${params}) → ${truncate(result, RESULT_PREVIEW_CHARS)}`;
}

function renderDevice(builder: MarkdownBuilder, device: DeviceInvestigationState, resolution?: DeviceResolution): void {
  builder.subsection(`${device.deviceName}: ${deviceStatusLabel(resolution)}`);
  builder.field('Objective:', device.objective);
  if (resolution) builder.field('Assessment:', resolution.reason);
  builder.field('Passes:', String(device.attempts));

  if (device.failure) builder.field('Failure:', device.failure);
  if (device.limitationsNotes) {
    builder.field('Limitations (latest pass):');
    builder.code(device.limitationsNotes);
  }

  if (device.stepOutcomes.length === 0) {
    builder.text('No steps were executed.');
    return;
  }
  for (const outcome of device.stepOutcomes) {
    const heading = `Pass ${outcome.attempt}, step ${outcome.stepIndex + 1}: ${outcome.instruction}`;
    if (outcome.reasoningError) {
      builder.bullet(`${heading} (tool selection failed: ${outcome.reasoningError})`);
    } else if (outcome.invocations.length === 0) {
      builder.bullet(`${heading} (no applicable tool)`);
    } else {
      builder.bullet(heading);
      for (const invocation of outcome.invocations) {
        builder.bullet(describeInvocation(invocation), 1);
      }
    }
  }
  builder.endList();
}

/**
 * Renders the complete session, including every pass's history.
 */
export function renderSessionReport(session: InvestigationSession): string {
  const builder = new MarkdownBuilder();
  builder.header('Network Investigation Report');
  builder.field('Request:', session.userQuery);
  if (session.intent) builder.field('Plan:', session.intent);
  builder.field(
    'Outcome:',
    session.cancellationReason
      ? `${sessionOutcomeLabel(session)} (${session.cancellationReason})`
      : sessionOutcomeLabel(session)
  );
  builder.field(
    'Execution passes:',
    `${session.executionPasses} (retries used: ${session.currentRetryCount} of ${session.maxRetries})`
  );

  builder.section('Assessment');
  builder.text(session.assessorNotes ?? 'No assessment was completed.');

  builder.section('Devices');
  if (session.devices.length === 0) {
    builder.text('No devices were investigated.');
  }
  for (const device of session.devices) {
    renderDevice(builder, device, session.resolutions[device.deviceName]);
  }
  return builder.build();
}

/**
 * Synthesizer that returns the deterministic rendering.
 */
export class MarkdownReportSynthesizer implements ReportSynthesizer {
  async synthesize(session: InvestigationSession): Promise<string> {
    return renderSessionReport(session);
  }
}

// ── LLM synthesis ─────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You are a senior network engineer writing the final report of an automated network investigation.

You receive a complete record of the investigation: the user's request, the plan, every device investigated, every tool call with its result or error, and the assessor's notes. Context from earlier investigations may follow the record; use it to point out what changed, never as evidence for the current state.

Write a concise Markdown report with these sections:

## Summary
Two to four sentences answering the user's request directly.

## Findings per Device
For each device: what was found, citing the tool results. State clearly when a device's objective was only partially met and why.

## Limitations
Tool errors, missing data and anything the investigation could not establish.

## Recommended Next Steps
Concrete follow-up actions for an operator.

RULES:
- Only state facts supported by the tool results.
- Never invent device names, interfaces, addresses or counters.
- Output Markdown only. No preamble.`;

/**
 * The record to report on, followed by earlier sessions when there are any.
 */
export function reportPrompt(session: InvestigationSession, record: string = renderSessionReport(session)): string {
  const prompt = `Write the final report for this investigation record:\n\n${record}`;
  const history = renderHistoricalContext(session.learnings);
  return history ? `${prompt}\n${history}` : prompt;
}

export class AnthropicReportSynthesizer implements ReportSynthesizer {
  private client: Anthropic;
  private model: string;
  private logger: Logger;

  constructor(apiKey: string, model: string = REPORT_MODEL, logger?: Logger) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
    this.logger = logger ?? new Logger('Reporter');
  }

  async synthesize(session: InvestigationSession, signal?: AbortSignal): Promise<string> {
    const record = renderSessionReport(session);
    this.logger.step('Generating investigation report...');

    try {
      const message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: REPORT_MAX_TOKENS,
          system: [{ type: 'text', text: SYSTEM_PROMPT, cache_control: { type: 'ephemeral' } }],
          messages: [
            {
              role: 'user',
              content: reportPrompt(session, record),
            },
          ],
        },
        { signal }
      );

      const text = message.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('')
        .trim();

      if (!text) {
        this.logger.warn('Empty report from model, using the investigation record');
        return record;
      }
      this.logger.result(`Report generated (${text.length} chars)`);
      return text;
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(`Report generation failed, using the investigation record: ${errorMessage(error)}`);
      return record;
    }
  }
}
