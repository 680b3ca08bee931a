import type { z } from 'zod';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls the JSON payload out of a model reply, tolerating Markdown fences
 * and prose around it.
 */
export function extractJson(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : text;
  const match = body.match(/[[{][\s\S]*[\]}]/);
  return (match ? match[0] : body).trim();
}

/**
 * Parses a model reply against `schema`. Throws with the zod issues when the
 * payload does not fit.
 */
export function parseModelJson<S extends z.ZodTypeAny>(text: string, schema: S): z.infer<S> {
  let data: unknown;
  try {
    data = JSON.parse(extractJson(text));
  } catch (error) {
    throw new Error(`Model reply is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Model reply does not match the expected shape: ${issues}`);
  }
  return parsed.data;
}

/**
 * Renders `{ some_key: "text" }` as `## Title` followed by one `### Some Key`
 * subsection per entry. Empty input renders as an empty string.
 */
export function formatRecordAsMarkdown(data: Record<string, unknown>, title: string): string {
  const entries = Object.entries(data);
  if (entries.length === 0) return '';
  const lines = [`## ${title}`, ''];
  for (const [key, value] of entries) {
    const heading = key
      .split('_')
      .filter(Boolean)
      .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
      .join(' ');
    lines.push(`### ${heading}`, typeof value === 'string' ? value : JSON.stringify(value), '');
  }
  return lines.join('\n').trim();
}
