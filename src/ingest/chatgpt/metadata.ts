/**
 * Citation metadata extraction
 * Reads citation records from the places a message may carry them:
 * `citations`, `content_references` and `search_result_groups`.
 */

import { isRecord, stringField } from '../../utils/index.js';
import type { CitationMeta, MessageMetadata, ReferenceLookup } from './types.js';

const SOURCES_FOOTNOTE = 'sources_footnote';

/**
 * Convert one citation-like record into CitationMeta.
 * Accepts flat records and records nesting their fields under `metadata`.
 */
export function toCitationMeta(entry: unknown): CitationMeta | null {
  if (!isRecord(entry)) return null;
  const source = isRecord(entry.metadata) ? { ...entry, ...entry.metadata } : entry;

  const meta: CitationMeta = {};
  const title = stringField(source, 'title');
  const url = stringField(source, 'url');
  const snippet =
    stringField(source, 'snippet') ?? stringField(source, 'text') ?? stringField(source, 'description');
  const attribution = stringField(source, 'attribution');

  if (title) meta.title = title;
  if (url) meta.url = url;
  if (snippet) meta.snippet = snippet;
  if (attribution) meta.attribution = attribution;

  return title || url ? meta : null;
}

function metasOf(entries: unknown[]): CitationMeta[] {
  const metas: CitationMeta[] = [];
  for (const entry of entries) {
    const meta = toCitationMeta(entry);
    if (meta) metas.push(meta);
  }
  return metas;
}

function contentReferences(metadata: MessageMetadata | null | undefined): Record<string, unknown>[] {
  return (metadata?.content_references ?? []).filter(isRecord);
}

function searchEntries(metadata: MessageMetadata | null | undefined): Record<string, unknown>[] {
  const entries: Record<string, unknown>[] = [];
  for (const group of metadata?.search_result_groups ?? []) {
    if (!isRecord(group) || !Array.isArray(group.entries)) continue;
    entries.push(...group.entries.filter(isRecord));
  }
  return entries;
}

/**
 * Ordered citation list for a message. The first populated source wins:
 * direct citations, then content reference items, then search results.
 */
export function collectCitations(
  direct: unknown[] | undefined,
  metadata: MessageMetadata | null | undefined
): CitationMeta[] {
  const fromDirect = metasOf(direct && direct.length > 0 ? direct : metadata?.citations ?? []);
  if (fromDirect.length > 0) return fromDirect;

  const fromReferences = contentReferences(metadata)
    .filter((ref) => ref.type !== SOURCES_FOOTNOTE)
    .flatMap((ref) => (Array.isArray(ref.items) ? metasOf(ref.items) : []));
  if (fromReferences.length > 0) return fromReferences;

  return metasOf(searchEntries(metadata));
}

/**
 * Reference id for a search result, e.g. `turn0search3`
 */
export function referenceId(refId: unknown): string | null {
  if (!isRecord(refId)) return null;
  const { turn_index: turn, ref_type: type, ref_index: index } = refId;
  if (typeof turn !== 'number' || typeof type !== 'string' || typeof index !== 'number') {
    return null;
  }
  return `turn${turn}${type}${index}`;
}

/**
 * Auxiliary lookup for reference-form markers: the literal `matched_text`
 * of each content reference, and the id of each search result.
 */
export function collectReferences(metadata: MessageMetadata | null | undefined): ReferenceLookup {
  const byText = new Map<string, CitationMeta[]>();
  const byId = new Map<string, CitationMeta[]>();

  for (const ref of contentReferences(metadata)) {
    const matched = stringField(ref, 'matched_text');
    if (!matched || !matched.trim() || ref.type === SOURCES_FOOTNOTE) continue;
    const metas = Array.isArray(ref.items) ? metasOf(ref.items) : [];
    if (metas.length > 0 && !byText.has(matched)) {
      byText.set(matched, metas);
    }
  }

  for (const entry of searchEntries(metadata)) {
    const id = referenceId(entry.ref_id);
    const meta = toCitationMeta(entry);
    if (id && meta && !byId.has(id)) {
      byId.set(id, [meta]);
    }
  }

  return { byText, byId };
}
