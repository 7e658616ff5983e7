/**
 * Content classification
 * Maps a raw `content` value onto the closed Content union exactly once,
 * so rendering never has to probe fields again.
 */

import { isRecord, stringField } from '../../utils/index.js';
import type { CanvasContent, Content, Thought } from './types.js';

const CODE_TYPE_PREFIX = 'code/';

/**
 * Parse JSON embedded in a string, or undefined when it is not JSON
 */
function tryParseJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

/**
 * Build a canvas from a textdoc-like record (`name`/`title`, `type`, `content`).
 * `explicit` is set when the surrounding data already marked it as a canvas.
 */
function canvasFromRecord(record: Record<string, unknown>, explicit: boolean): CanvasContent | null {
  const text = record.content;
  if (typeof text !== 'string') return null;

  const type = stringField(record, 'type') ?? stringField(record, 'textdoc_type');
  const title = stringField(record, 'name') ?? stringField(record, 'title');

  if (type?.startsWith(CODE_TYPE_PREFIX)) {
    const language = type.slice(CODE_TYPE_PREFIX.length) || undefined;
    return { kind: 'canvas', canvasKind: 'code', title, language, text };
  }

  if (explicit || type === 'document' || (type === undefined && title !== undefined)) {
    return { kind: 'canvas', canvasKind: 'document', title, text };
  }

  return null;
}

/**
 * Interpret the JSON payload a canvas tool call writes into a code message:
 * either a new document or an update whose first replacement carries the text.
 */
function contentFromCanvasPayload(payload: unknown): Content | null {
  if (!isRecord(payload)) return null;

  const created = canvasFromRecord(payload, false);
  if (created) return created;

  const updates = payload.updates;
  if (!Array.isArray(updates) || !isRecord(updates[0]) || !('replacement' in updates[0])) {
    return null;
  }

  const replacement = updates[0].replacement;
  if (typeof replacement === 'string') {
    return { kind: 'canvas', canvasKind: 'document', text: replacement };
  }
  if (isRecord(replacement)) {
    const code = replacement.code;
    if (typeof code === 'string') {
      return { kind: 'code', language: stringField(replacement, 'language'), text: code };
    }
    return canvasFromRecord(replacement, false);
  }
  return null;
}

function classifyCode(record: Record<string, unknown>): Content {
  const text = record.text;
  if (typeof text !== 'string') return { kind: 'raw', value: record };

  const fromPayload = contentFromCanvasPayload(tryParseJson(text));
  if (fromPayload) return fromPayload;

  const language = stringField(record, 'language');
  return {
    kind: 'code',
    language: language && language !== 'unknown' ? language : undefined,
    text,
  };
}

function classifyThoughts(record: Record<string, unknown>): Content {
  const entries = record.thoughts;
  if (!Array.isArray(entries)) return { kind: 'raw', value: record };

  const thoughts: Thought[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      thoughts.push({ text: entry });
    } else if (isRecord(entry)) {
      thoughts.push({
        summary: stringField(entry, 'summary'),
        text: stringField(entry, 'content') ?? stringField(entry, 'text') ?? '',
      });
    }
  }
  return { kind: 'thoughts', thoughts };
}

/**
 * Classify a raw content value. First matching rule wins:
 * string, bare list of parts, code, thoughts, parts, canvas, plain text
 * record, raw JSON.
 */
export function classifyContent(value: unknown): Content {
  if (value === null || value === undefined) {
    return { kind: 'text', text: '' };
  }

  if (typeof value === 'string') {
    return { kind: 'text', text: value };
  }

  if (Array.isArray(value)) {
    return { kind: 'parts', parts: value };
  }

  if (!isRecord(value)) {
    return { kind: 'raw', value };
  }

  const contentType = stringField(value, 'content_type');

  if (contentType === 'code') return classifyCode(value);
  if (contentType === 'thoughts') return classifyThoughts(value);

  if (Array.isArray(value.parts)) {
    return { kind: 'parts', parts: value.parts };
  }

  if (contentType === 'canvas' || value.type === 'canvas') {
    const source = isRecord(value.canvas) ? value.canvas : value;
    const canvas = canvasFromRecord(source, true);
    if (canvas) return canvas;
  } else if (contentType === undefined) {
    const canvas = canvasFromRecord(value, false);
    if (canvas) return canvas;
  }

  if (contentType === 'text' || contentType === 'reasoning_recap') {
    const text = stringField(value, 'text') ?? stringField(value, 'content');
    if (text !== undefined) return { kind: 'text', text };
  }

  return { kind: 'raw', value };
}

/**
 * Whether a classified content renders to nothing
 */
export function isEmptyContent(content: Content): boolean {
  switch (content.kind) {
    case 'text':
    case 'code':
      return !content.text.trim();
    case 'parts':
      return content.parts.every(
        (part) => part === null || part === undefined || (typeof part === 'string' && !part.trim())
      );
    case 'thoughts':
      return content.thoughts.every((t) => !t.text.trim() && !t.summary?.trim());
    case 'canvas':
      return !content.text.trim() && !content.title;
    case 'raw':
      return content.value === null || content.value === undefined;
  }
}
