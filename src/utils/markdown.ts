/**
 * Fluent builder for Markdown documents used in prompts and reports.
 */
export class MarkdownBuilder {
  private lines: string[] = [];

  header(text: string): this {
    this.lines.push(`# ${text}`, '');
    return this;
  }

  section(text: string): this {
    this.lines.push(`## ${text}`, '');
    return this;
  }

  subsection(text: string): this {
    this.lines.push(`### ${text}`, '');
    return this;
  }

  text(text: string): this {
    this.lines.push(text, '');
    return this;
  }

  field(label: string, value?: string): this {
    this.lines.push(value ? `**${label}** ${value}` : `**${label}**`, '');
    return this;
  }

  bullet(text: string, depth: number = 0): this {
    this.lines.push(`${'  '.repeat(depth)}- ${text}`);
    return this;
  }

  /** Ends a run of bullets with a blank line. */
  endList(): this {
    this.lines.push('');
    return this;
  }

  code(content: string, language: string = ''): this {
    this.lines.push('```' + language, content, '```', '');
    return this;
  }

  build(): string {
    return this.lines.join('\n').trim() + '\n';
  }
}

/** Shortens `text` to `max` characters, marking the cut. */
export function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max)}... [truncated ${text.length - max} chars]`;
}
