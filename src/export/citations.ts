/**
 * Citation resolution
 * Replaces inline citation markers with links to the References section
 * and accumulates the deduplicated reference list for one conversion.
 */

import type { CitationMeta, Message } from '../ingest/chatgpt/index.js';

/**
 * Registered reference
 */
export interface ReferenceEntry {
  index: number;
  meta: CitationMeta;
}

/**
 * Identity used for deduplication: url, else title
 */
export function citationIdentity(meta: CitationMeta): string {
  return meta.url ?? meta.title ?? JSON.stringify(meta);
}

/**
 * Ordered, deduplicating store of references for one conversion.
 * Indexes are 1-based and assigned in first-seen order.
 */
export class ReferenceRegistry {
  private entries = new Map<string, ReferenceEntry>();

  /** Register a citation and return its index */
  register(meta: CitationMeta): number {
    const key = citationIdentity(meta);
    const existing = this.entries.get(key);
    if (existing) return existing.index;

    const index = this.entries.size + 1;
    this.entries.set(key, { index, meta });
    return index;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Entries in index order */
  list(): ReferenceEntry[] {
    return Array.from(this.entries.values());
  }
}

/** `【1】`, `【1†L15-L23】`, `【4:0†source】` */
const BRACKET_MARKER = '【(?<ordinal>\\d+)(?:[†:][^】]*)?】';

/** Private-use glyph markers: `\uE200cite\uE202turn0search1\uE201`, several ids allowed */
const GLYPH_MARKER = '\\uE200cite(?<ids>(?:\\uE202[^\\uE200-\\uE202]+)+)\\uE201';
const GLYPH_SEPARATOR = '\uE202';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function escapeLinkText(text: string): string {
  return text.replace(/[[\]]/g, '\\$&');
}

/**
 * Marker pattern for one message: its literal reference texts (longest
 * first) take priority over the generic bracket and glyph forms.
 */
function markerPattern(message: Message): RegExp {
  const literals = Array.from(message.references.byText.keys())
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  return new RegExp([...literals, BRACKET_MARKER, GLYPH_MARKER].join('|'), 'g');
}

function lookup(marker: string, groups: Record<string, string | undefined>, message: Message): CitationMeta[] {
  const literal = message.references.byText.get(marker);
  if (literal) return literal;

  if (groups.ordinal !== undefined) {
    const ordinal = Number(groups.ordinal);
    const meta = message.citations[ordinal - 1];
    return ordinal >= 1 && meta ? [meta] : [];
  }

  if (groups.ids !== undefined) {
    return groups.ids
      .split(GLYPH_SEPARATOR)
      .filter(Boolean)
      .flatMap((id) => message.references.byId.get(id) ?? []);
  }

  return [];
}

/**
 * Substitute citation markers in rendered text.
 * Single left-to-right pass; unresolvable markers stay as literal text.
 */
export function resolveCitations(text: string, message: Message, registry: ReferenceRegistry): string {
  const pattern = markerPattern(message);
  let output = '';
  let last = 0;

  for (const match of text.matchAll(pattern)) {
    const marker = match[0];
    const start = match.index ?? 0;
    const metas = lookup(marker, match.groups ?? {}, message);
    if (metas.length === 0) continue;

    const indexes = metas.map((meta) => registry.register(meta));
    output += text.slice(last, start) + `[${escapeLinkText(marker)}](#ref${indexes[0]})`;
    last = start + marker.length;
  }

  return output + text.slice(last);
}
