/**
 * McpToolExecutor - runs device tools on an MCP server.
 *
 * Connects to one MCP server over Streamable HTTP. The server exposes the
 * device tools (routing, interfaces, logs, ...) plus an inventory tool that
 * lists the devices it can reach, so the same connection serves as Tool
 * Executor, Tool Catalog and Device Inventory.
 *
 * Every call carries the target device as `device_name` unless the caller
 * already set it.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { DeviceInventory, ToolCatalog, ToolExecutor } from '../core/contracts.js';
import { classifyErrorMessage, toToolError } from '../core/errors.js';
import type { DeviceTarget, ToolCall, ToolDescriptor, ToolError, ToolExecution } from '../core/types.js';
import { DEVICE_PARAMETER } from '../intelligence/reasoner.js';
import { Logger } from '../../utils/logger.js';
import { isRecord } from '../../utils/parser.js';

/** Tool that returns the server's device inventory. */
export const INVENTORY_TOOL = 'get_devices';

export const MCP_CLIENT_INFO = { name: 'netinvest-agent', version: '1.0.0' };

export function withDeviceParameter(
  parameters: Record<string, unknown>,
  targetDevice: string
): Record<string, unknown> {
  if (DEVICE_PARAMETER in parameters) return { ...parameters };
  return { ...parameters, [DEVICE_PARAMETER]: targetDevice };
}

/** Text parts of an MCP tool result, joined by newlines. */
function textContent(result: Record<string, unknown>): string {
  if (!Array.isArray(result.content)) return '';
  return result.content
    .filter((part): part is { type: 'text'; text: string } =>
      isRecord(part) && part.type === 'text' && typeof part.text === 'string'
    )
    .map((part) => part.text)
    .join('\n');
}

function parseMaybeJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return text;
  try {
    return JSON.parse(trimmed);
  } catch {
    return text;
  }
}

/**
 * Converts a raw `tools/call` result into a ToolExecution.
 *
 * Structured content wins over text; text that holds JSON is parsed. An
 * `isError` result becomes a typed error classified from its text.
 */
export function interpretCallResult(result: unknown): ToolExecution {
  if (!isRecord(result)) return { ok: true, result };
  if ('toolResult' in result) return { ok: true, result: result.toolResult };

  const text = textContent(result);
  if (result.isError === true) {
    const message = text.trim() || 'tool reported an error without details';
    return { ok: false, error: { kind: classifyErrorMessage(message), message } };
  }
  if (result.structuredContent !== undefined) {
    return { ok: true, result: result.structuredContent };
  }
  return { ok: true, result: parseMaybeJson(text) };
}

/**
 * Maps a thrown MCP client error to a ToolError. JSON-RPC codes decide where
 * they are specific; anything else is classified from the message.
 */
export function mcpErrorToToolError(error: unknown): ToolError {
  if (error instanceof McpError) {
    switch (error.code) {
      case ErrorCode.InvalidParams:
      case ErrorCode.MethodNotFound:
        return { kind: 'validation', message: error.message };
      case ErrorCode.ConnectionClosed:
      case ErrorCode.RequestTimeout:
        return { kind: 'communication', message: error.message };
      default:
        return { kind: 'protocol', message: error.message };
    }
  }
  return toToolError(error);
}

const inventoryEntrySchema = z.union([
  z.string().min(1).transform((name): DeviceTarget => ({ name })),
  z
    .object({
      name: z.string().min(1),
      role: z.string().optional(),
      profile: z.string().optional(),
      nos: z.string().optional(),
    })
    .transform(
      (entry): DeviceTarget => ({
        name: entry.name,
        ...(entry.role ? { role: entry.role } : {}),
        ...((entry.profile ?? entry.nos) ? { profile: entry.profile ?? entry.nos } : {}),
      })
    ),
]);

const inventoryPayloadSchema = z.union([
  z.array(inventoryEntrySchema),
  z.object({ devices: z.array(inventoryEntrySchema) }).transform((payload) => payload.devices),
]);

/**
 * Reads the inventory tool's payload: a list of names, a list of device
 * objects, or either wrapped as `{ devices: [...] }`.
 */
export function parseDeviceList(payload: unknown): DeviceTarget[] {
  const parsed = inventoryPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected ${INVENTORY_TOOL} payload: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

export class McpToolExecutor implements ToolExecutor, ToolCatalog, DeviceInventory {
  private readonly serverUrl: string;
  private readonly logger: Logger;
  private client: Client | null = null;
  private transport: StreamableHTTPClientTransport | null = null;
  private tools: ToolDescriptor[] = [];

  constructor(serverUrl: string, logger?: Logger) {
    this.serverUrl = serverUrl;
    this.logger = logger ?? new Logger('MCP');
  }

  /**
   * Connects to `<serverUrl>/mcp` and discovers the server's tools.
   */
  async connect(): Promise<void> {
    const client = new Client(MCP_CLIENT_INFO);
    const transport = new StreamableHTTPClientTransport(new URL('/mcp', this.serverUrl));
    await client.connect(transport);
    this.client = client;
    this.transport = transport;

    const { tools } = await client.listTools();
    this.tools = tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? '',
      inputSchema: {
        properties: isRecord(tool.inputSchema.properties) ? tool.inputSchema.properties : {},
        required: tool.inputSchema.required ?? [],
      },
    }));
    this.logger.info(`Connected to ${this.serverUrl} (${this.tools.length} tools: ${this.tools.map((t) => t.name).join(', ')})`);
  }

  /** Device tools offered to the reasoning model (the inventory tool excluded). */
  async listTools(): Promise<ToolDescriptor[]> {
    this.requireClient();
    return this.tools.filter((tool) => tool.name !== INVENTORY_TOOL);
  }

  async execute(call: ToolCall, targetDevice: string, signal?: AbortSignal): Promise<ToolExecution> {
    const client = this.requireClient();
    try {
      const result = await client.callTool(
        { name: call.functionName, arguments: withDeviceParameter(call.parameters, targetDevice) },
        undefined,
        { signal }
      );
      return interpretCallResult(result);
    } catch (error) {
      if (signal?.aborted) throw error;
      return { ok: false, error: mcpErrorToToolError(error) };
    }
  }

  async listDevices(signal?: AbortSignal): Promise<DeviceTarget[]> {
    const client = this.requireClient();
    const result = await client.callTool({ name: INVENTORY_TOOL, arguments: {} }, undefined, { signal });
    const execution = interpretCallResult(result);
    if (!execution.ok) {
      throw new Error(`${INVENTORY_TOOL} failed: ${execution.error.message}`);
    }
    return parseDeviceList(execution.result);
  }

  async shutdown(): Promise<void> {
    if (this.transport) {
      await this.transport.close();
      this.logger.info('Disconnected');
    }
    this.client = null;
    this.transport = null;
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error('MCP client not connected');
    }
    return this.client;
  }
}
