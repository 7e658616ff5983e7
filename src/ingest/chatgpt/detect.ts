/**
 * Export format detection
 * Classifies a parsed JSON value as one of the three supported shapes
 */

import { collapseWhitespace, describeShape, isRecord } from '../../utils/index.js';
import { UnsupportedFormatError } from './errors.js';

/**
 * Detected export shape with a handle on the underlying structure
 */
export type DetectedFormat =
  | { kind: 'list'; messages: unknown[] }
  | { kind: 'messages_object'; messages: unknown[]; title: string | null }
  | { kind: 'mapping'; mapping: Record<string, unknown>; title: string | null };

/**
 * Conversation title on one line, or null when blank or not a string
 */
export function conversationTitle(record: Record<string, unknown>): string | null {
  const title = record.title;
  if (typeof title !== 'string') return null;
  return collapseWhitespace(title) || null;
}

/**
 * Detect the export format. Rules apply in priority order:
 * a list, then an object with a `messages` list, then an object with a
 * `mapping` object.
 *
 * @throws UnsupportedFormatError when no rule matches
 */
export function detectFormat(data: unknown): DetectedFormat {
  if (Array.isArray(data)) {
    return { kind: 'list', messages: data };
  }

  if (isRecord(data)) {
    if (Array.isArray(data.messages)) {
      return { kind: 'messages_object', messages: data.messages, title: conversationTitle(data) };
    }
    if (isRecord(data.mapping)) {
      return { kind: 'mapping', mapping: data.mapping, title: conversationTitle(data) };
    }
  }

  throw new UnsupportedFormatError(describeShape(data));
}
