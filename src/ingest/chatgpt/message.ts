/**
 * Message normalization
 * Turns one raw message record into the immutable Message model
 */

import type { Logger } from 'pino';
import { silentLogger } from '../../utils/logger.js';
import { classifyContent } from './content.js';
import { collectCitations, collectReferences } from './metadata.js';
import { AuthorRoleSchema, MessageRecordSchema, type Message, type Role } from './types.js';

/**
 * Normalize an author role string
 */
export function normalizeRole(role: string | undefined): Role {
  const parsed = AuthorRoleSchema.safeParse(role);
  return parsed.success ? parsed.data : 'unknown';
}

/**
 * Normalize a raw message record.
 * A record that does not validate is kept as raw JSON.
 */
export function normalizeMessage(raw: unknown, logger: Logger = silentLogger()): Message {
  const parsed = MessageRecordSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(
      { issues: parsed.error.issues.map((issue) => issue.message) },
      'Malformed message, rendering raw JSON'
    );
    return {
      role: 'unknown',
      content: { kind: 'raw', value: raw },
      citations: [],
      references: { byText: new Map(), byId: new Map() },
    };
  }

  const record = parsed.data;
  const isCanvas = record.type === 'canvas';
  const role = record.author?.role ?? record.role ?? (isCanvas ? 'assistant' : undefined);

  return {
    role: normalizeRole(role),
    content: classifyContent(isCanvas ? record : record.content),
    citations: collectCitations(record.citations, record.metadata),
    references: collectReferences(record.metadata),
  };
}
