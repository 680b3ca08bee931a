import { describe, expect, it } from 'vitest';
import {
  InvalidTargetError,
  InvestigationError,
  PlanNotFoundError,
  ToolExecutionError,
  classifyErrorMessage,
  isAbortError,
  toToolError,
} from '../core/errors.js';

describe('classifyErrorMessage', () => {
  it.each([
    ['Connection refused by 10.0.0.1', 'communication'],
    ['Request timed out after 30s', 'communication'],
    ['getaddrinfo ENOTFOUND xrd-pe9', 'communication'],
    ['Authentication failed for netops', 'authentication'],
    ['HTTP 403 Forbidden', 'authentication'],
    ['invalid interface name Gi0/0/0/99', 'validation'],
    ['unexpected response framing', 'protocol'],
  ])('classifies "%s" as %s', (message, kind) => {
    expect(classifyErrorMessage(message)).toBe(kind);
  });
});

describe('toToolError', () => {
  it('keeps the kind of a typed executor error', () => {
    expect(toToolError(new ToolExecutionError('validation', 'bad vrf'))).toEqual({
      kind: 'validation',
      message: 'bad vrf',
    });
  });

  it('classifies anything else by its message', () => {
    expect(toToolError('socket hang up')).toEqual({ kind: 'communication', message: 'socket hang up' });
  });
});

describe('structural errors', () => {
  it('names the known devices', () => {
    const error = new InvalidTargetError('check r9', ['pe1', 'pe2']);
    expect(error).toBeInstanceOf(InvestigationError);
    expect(error.name).toBe('InvalidTargetError');
    expect(error.message).toBe('No device in the inventory matches "check r9". Known devices: pe1, pe2');
    expect(new InvalidTargetError('check r9', []).message).toBe(
      'No device in the inventory matches "check r9". The inventory is empty.'
    );
  });

  it('lists the available plans', () => {
    expect(new PlanNotFoundError('ospf', []).message).toBe('No investigation plan for intent "ospf" (available: none)');
  });
});

describe('isAbortError', () => {
  it('recognises aborts', () => {
    const controller = new AbortController();
    controller.abort();
    const abortError = new Error('aborted');
    abortError.name = 'AbortError';

    expect(isAbortError(new Error('x'), controller.signal)).toBe(true);
    expect(isAbortError(abortError)).toBe(true);
    expect(isAbortError(new Error('x'), new AbortController().signal)).toBe(false);
  });
});
