// Typed errors raised by the investigation engine

import type { ToolError, ToolErrorKind } from './types.js';

/**
 * Base class for structural errors that abort a session before any
 * report is produced.
 */
export class InvestigationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The user query resolved to no known device. */
export class InvalidTargetError extends InvestigationError {
  readonly knownDevices: string[];

  constructor(userQuery: string, knownDevices: string[]) {
    super(
      knownDevices.length > 0
        ? `No device in the inventory matches "${userQuery}". Known devices: ${knownDevices.join(', ')}`
        : `No device in the inventory matches "${userQuery}". The inventory is empty.`
    );
    this.knownDevices = knownDevices;
  }
}

/** No plan document exists for the requested intent. */
export class PlanNotFoundError extends InvestigationError {
  readonly intent: string;

  constructor(intent: string, available: string[], message?: string) {
    super(message ?? `No investigation plan for intent "${intent}" (available: ${available.join(', ') || 'none'})`);
    this.intent = intent;
  }
}

/** A plan document exists but cannot be used. */
export class PlanFormatError extends InvestigationError {
  readonly file: string;

  constructor(file: string, reason: string) {
    super(`Malformed plan document ${file}: ${reason}`);
    this.file = file;
  }
}

/** Environment configuration failed validation. */
export class ConfigError extends InvestigationError {}

/**
 * Error a ToolExecutor may throw when it already knows the failure category.
 */
export class ToolExecutionError extends Error {
  readonly kind: ToolErrorKind;

  constructor(kind: ToolErrorKind, message: string) {
    super(message);
    this.name = 'ToolExecutionError';
    this.kind = kind;
  }
}

const AUTH_RE = /\b(auth\w*|unauthori[sz]ed|forbidden|permission denied|access denied|credential\w*|login failed|401|403)\b/i;
const COMMUNICATION_RE =
  /\b(timed? ?out|timeout|unreachable|connection (refused|reset|closed)|econnrefused|econnreset|etimedout|ehostunreach|enotfound|socket hang up|fetch failed|network)\b/i;
const VALIDATION_RE = /\b(invalid|missing|required|unknown (parameter|argument|field)|not supported|unsupported|must be)\b/i;

/**
 * Classifies a free-text failure message into a ToolErrorKind.
 * Anything unrecognised is treated as a protocol-level error.
 */
export function classifyErrorMessage(message: string): ToolErrorKind {
  if (AUTH_RE.test(message)) return 'authentication';
  if (COMMUNICATION_RE.test(message)) return 'communication';
  if (VALIDATION_RE.test(message)) return 'validation';
  return 'protocol';
}

/**
 * Converts anything thrown by a tool executor into a ToolError.
 */
export function toToolError(error: unknown): ToolError {
  if (error instanceof ToolExecutionError) {
    return { kind: error.kind, message: error.message };
  }
  const message = errorMessage(error);
  return { kind: classifyErrorMessage(message), message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True when `error` is the rejection produced by an aborted signal.
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return error instanceof Error && error.name === 'AbortError';
}
