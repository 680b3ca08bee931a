/**
 * Reasoning Oracle backed by Claude tool use.
 *
 * Each plan instruction becomes one Messages API call in which the device
 * tools advertised by the ToolCatalog are offered as Anthropic tools. The
 * `tool_use` blocks of the reply are the calls to execute, in order; a reply
 * without any means no tool applies to the instruction.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { OracleRequest, ReasoningOracle, ToolCatalog } from '../core/contracts.js';
import type { StepOutcome, ToolCall, ToolDescriptor } from '../core/types.js';
import { isRecord } from '../../utils/parser.js';
import { truncate } from '../../utils/markdown.js';

/** Model used for tool selection - Sonnet for multi-step reasoning */
export const REASONER_MODEL = 'claude-sonnet-4-20250514';

export const REASONER_MAX_TOKENS = 2048;

/** Parameter the tool executor fills in with the target device. */
export const DEVICE_PARAMETER = 'device_name';

/** Most recent prior outcomes included in the prompt. */
const MAX_PRIOR_OUTCOMES = 20;
const MAX_RESULT_CHARS = 600;

export const REASONER_SYSTEM_PROMPT = `You are a network operations engineer investigating one device.

You receive one investigation step as a natural-language instruction, the objective of the whole investigation, and what earlier steps found. Call the tools that carry out the instruction on the device.

RULES:
- Call only the tools needed for this instruction. Several calls are allowed when the instruction needs them.
- The target device is implicit: never pass a device name.
- Use earlier results to pick parameters (interface names, neighbor addresses, VRFs).
- When retry guidance is given, follow it: change parameters or narrow the focus instead of repeating failed calls.
- If no tool can carry out the instruction, reply with a one-line explanation and no tool call.`;

/**
 * Converts an advertised tool into an Anthropic tool definition, hiding the
 * device parameter the executor injects.
 */
export function toAnthropicTool(descriptor: ToolDescriptor): Anthropic.Tool {
  const properties: Record<string, unknown> = { ...(descriptor.inputSchema.properties ?? {}) };
  delete properties[DEVICE_PARAMETER];
  const required = (descriptor.inputSchema.required ?? []).filter((name) => name !== DEVICE_PARAMETER);
  return {
    name: descriptor.name,
    description: descriptor.description,
    input_schema: { type: 'object', properties, required },
  };
}

/** Fields of a reply content block needed to find tool calls. */
export interface ContentBlockLike {
  type: string;
  name?: string;
  input?: unknown;
}

/**
 * Tool calls requested by a reply, in the order the model issued them.
 */
export function toolCallsFromContent(content: readonly ContentBlockLike[]): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const block of content) {
    if (block.type !== 'tool_use' || typeof block.name !== 'string') continue;
    calls.push({
      functionName: block.name,
      parameters: isRecord(block.input) ? { ...block.input } : {},
    });
  }
  return calls;
}

export function describePriorOutcomes(outcomes: readonly StepOutcome[]): string {
  if (outcomes.length === 0) return 'No earlier steps.';
  const recent = outcomes.slice(-MAX_PRIOR_OUTCOMES);
  const lines: string[] = [];
  for (const outcome of recent) {
    const label = `[pass ${outcome.attempt}, step ${outcome.stepIndex + 1}] ${outcome.instruction}`;
    if (outcome.reasoningError) {
      lines.push(`${label}: tool selection failed (${outcome.reasoningError})`);
      continue;
    }
    if (outcome.invocations.length === 0) {
      lines.push(`${label}: no applicable tool`);
      continue;
    }
    lines.push(label);
    for (const invocation of outcome.invocations) {
      const call = `${invocation.functionName}(${JSON.stringify(invocation.parameters)})`;
      if (invocation.error) {
        lines.push(`  ${call} failed (${invocation.error.kind}): ${invocation.error.message}`);
      } else {
        const result =
          typeof invocation.result === 'string' ? invocation.result : JSON.stringify(invocation.result ?? null);
        lines.push(`  ${call} → ${truncate(result, MAX_RESULT_CHARS)}`);
      }
    }
  }
  return lines.join('\n');
}

export class AnthropicReasoningOracle implements ReasoningOracle {
  private client: Anthropic;
  private catalog: ToolCatalog;
  private model: string;
  private tools?: Promise<Anthropic.Tool[]>;

  constructor(apiKey: string, catalog: ToolCatalog, model: string = REASONER_MODEL) {
    this.client = new Anthropic({ apiKey });
    this.catalog = catalog;
    this.model = model;
  }

  async selectInvocations(request: OracleRequest, signal?: AbortSignal): Promise<ToolCall[]> {
    const tools = await this.toolDefinitions();
    if (tools.length === 0) return [];

    let prompt = `Device: ${request.deviceName}
Objective: ${request.objective}

Earlier steps:
${describePriorOutcomes(request.priorOutcomes)}
`;
    if (request.retryFeedback) {
      prompt += `\nRetry guidance from the previous assessment:\n${request.retryFeedback}\n`;
    }
    prompt += `\nInstruction: ${request.instruction}`;

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: REASONER_MAX_TOKENS,
        system: [{ type: 'text', text: REASONER_SYSTEM_PROMPT, cache_control: { type: 'ephemeral' } }],
        tools,
        tool_choice: { type: 'auto' },
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );

    return toolCallsFromContent(response.content);
  }

  /** Tool definitions, fetched once from the catalog. */
  private toolDefinitions(): Promise<Anthropic.Tool[]> {
    if (!this.tools) {
      this.tools = this.catalog.listTools().then((descriptors) => descriptors.map(toAnthropicTool));
      // A failed listing is retried on the next step instead of being cached.
      this.tools.catch(() => {
        this.tools = undefined;
      });
    }
    return this.tools;
  }
}
