import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { extractJson, formatRecordAsMarkdown, isRecord, parseModelJson } from '../parser.js';
import { MarkdownBuilder, truncate } from '../markdown.js';

describe('extractJson', () => {
  it('unwraps fenced JSON', () => {
    expect(extractJson('Sure:\n```json\n{"a": 1}\n```\nDone.')).toBe('{"a": 1}');
  });

  it('finds JSON inside prose', () => {
    expect(extractJson('The answer is [1, 2] as requested')).toBe('[1, 2]');
  });
});

describe('parseModelJson', () => {
  const schema = z.object({ intent: z.string() });

  it('returns the validated payload', () => {
    expect(parseModelJson('{"intent": "bgp_health", "extra": true}', schema)).toEqual({ intent: 'bgp_health' });
  });

  it('reports invalid JSON', () => {
    expect(() => parseModelJson('no json here', schema)).toThrow(/^Model reply is not valid JSON: /);
  });

  it('reports shape mismatches with their path', () => {
    expect(() => parseModelJson('{"intent": 3}', schema)).toThrow(
      'Model reply does not match the expected shape: intent: Expected string, received number'
    );
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});

describe('formatRecordAsMarkdown', () => {
  it('renders one subsection per key', () => {
    expect(formatRecordAsMarkdown({ bgp_peerings: 'pe1 peers with rr1', isis: { level: 2 } }, 'Topology')).toBe(
      '## Topology\n\n### Bgp Peerings\npe1 peers with rr1\n\n### Isis\n{"level":2}'
    );
  });

  it('renders nothing for an empty record', () => {
    expect(formatRecordAsMarkdown({}, 'Topology')).toBe('');
  });
});

describe('MarkdownBuilder', () => {
  it('separates blocks with blank lines and nests bullets', () => {
    const text = new MarkdownBuilder()
      .header('Title')
      .field('Status:', 'ok')
      .bullet('one')
      .bullet('detail', 1)
      .endList()
      .build();
    expect(text).toBe('# Title\n\n**Status:** ok\n\n- one\n  - detail\n');
  });
});

describe('truncate', () => {
  it('marks the cut', () => {
    expect(truncate('abcdef', 3)).toBe('abc... [truncated 3 chars]');
    expect(truncate('abc', 3)).toBe('abc');
  });
});
