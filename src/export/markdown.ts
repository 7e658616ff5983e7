/**
 * Markdown export module
 * Renders classified message content and assembles the final document
 */

import type { Content, Message, Role } from '../ingest/chatgpt/index.js';
import { capitalize, truncate } from '../utils/index.js';
import { resolveCitations, ReferenceRegistry, type ReferenceEntry } from './citations.js';

/**
 * Options for markdown generation
 */
export interface MarkdownOptions {
  title?: string;
  snippetMaxChars?: number;
}

const DEFAULT_OPTIONS: Required<MarkdownOptions> = {
  title: 'ChatGPT Conversation',
  snippetMaxChars: 200,
};

/**
 * Rendered message section
 */
export interface Section {
  role: Role;
  body: string;
}

/**
 * Fenced code block; the fence outgrows any backtick run in the body
 */
export function fence(body: string, language = ''): string {
  let longestRun = 0;
  for (const run of body.matchAll(/`+/g)) {
    longestRun = Math.max(longestRun, run[0].length);
  }
  const marker = '`'.repeat(Math.max(3, longestRun + 1));
  return `${marker}${language}\n${body}\n${marker}`;
}

/**
 * Pretty-printed JSON block for content with no dedicated rendering
 */
export function jsonBlock(value: unknown): string {
  return fence(JSON.stringify(value, null, 2) ?? String(value), 'json');
}

function renderPart(part: unknown): string {
  if (part === null || part === undefined) return '';
  if (typeof part === 'string') return part;
  return jsonBlock(part);
}

/**
 * Render one content value to a Markdown fragment (no section header)
 */
export function renderContent(content: Content): string {
  switch (content.kind) {
    case 'text':
      return content.text;

    case 'code':
      return fence(content.text, content.language);

    case 'thoughts':
      return content.thoughts
        .map((thought) => (thought.summary ? `**${thought.summary}**\n${thought.text}` : thought.text))
        .filter((block) => block.trim())
        .join('\n\n');

    case 'parts':
      return content.parts
        .map(renderPart)
        .filter((block) => block.trim())
        .join('\n\n');

    case 'canvas': {
      const body = content.canvasKind === 'code' ? fence(content.text, content.language) : content.text;
      return content.title ? `**${content.title}**\n\n${body}` : body;
    }

    case 'raw':
      return jsonBlock(content.value);
  }
}

/**
 * Render a message and substitute its citation markers
 */
export function renderMessage(message: Message, registry: ReferenceRegistry): Section {
  const rendered = renderContent(message.content);
  return {
    role: message.role,
    body: resolveCitations(rendered, message, registry),
  };
}

/**
 * Format one References entry
 */
export function formatReference(entry: ReferenceEntry, snippetMaxChars: number): string[] {
  const { index, meta } = entry;
  const label = meta.title ?? meta.url ?? 'Untitled';
  const heading = meta.attribution ? `### ${index}. ${label} - ${meta.attribution}` : `### ${index}. ${label}`;

  const lines = [`<a id="ref${index}"></a>`, heading, ''];

  if (meta.url) {
    lines.push(`[${meta.url}](${meta.url})`, '');
  }

  if (meta.snippet) {
    const snippet = truncate(meta.snippet.replace(/\s*\n\s*/g, ' ').trim(), snippetMaxChars);
    lines.push(`_${snippet}_`, '');
  }

  return lines;
}

/**
 * Assemble title, message sections and the References section.
 * Sections whose body is blank are left out entirely.
 */
export function assembleDocument(
  sections: Section[],
  registry: ReferenceRegistry,
  options: MarkdownOptions = {}
): string {
  const opts: Required<MarkdownOptions> = {
    title: options.title ?? DEFAULT_OPTIONS.title,
    snippetMaxChars: options.snippetMaxChars ?? DEFAULT_OPTIONS.snippetMaxChars,
  };
  const lines: string[] = [`# ${opts.title}`, ''];

  for (const section of sections) {
    if (!section.body.trim()) continue;
    lines.push(`## ${capitalize(section.role)}`, '', section.body, '');
  }

  if (registry.size > 0) {
    lines.push('## References', '');
    for (const entry of registry.list()) {
      lines.push(...formatReference(entry, opts.snippetMaxChars));
    }
  }

  return lines.join('\n');
}

/**
 * Render all messages in order and assemble the document
 */
export function toMarkdown(messages: Message[], options: MarkdownOptions = {}): { markdown: string; references: number } {
  const registry = new ReferenceRegistry();
  const sections = messages.map((message) => renderMessage(message, registry));
  return {
    markdown: assembleDocument(sections, registry, options),
    references: registry.size,
  };
}
