/**
 * ChatGPT export type definitions
 * Covers message lists, `{ messages }` objects and `mapping` trees
 */

import { z } from 'zod';

/**
 * Author role in a conversation
 */
export const AuthorRoleSchema = z.enum(['user', 'assistant', 'system', 'tool']);
export type AuthorRole = z.infer<typeof AuthorRoleSchema>;

/**
 * Normalized role; anything unrecognized becomes `unknown`
 */
export type Role = AuthorRole | 'unknown';

/**
 * Author information
 */
export const AuthorSchema = z.object({
  role: z.string().optional(),
  name: z.string().nullable().optional(),
}).passthrough();
export type Author = z.infer<typeof AuthorSchema>;

/**
 * Message metadata; only the fields the converter reads are typed,
 * and a malformed value degrades to absent
 */
export const MessageMetadataSchema = z.object({
  is_visually_hidden_from_conversation: z.boolean().optional().catch(undefined),
  citations: z.array(z.unknown()).optional().catch(undefined),
  content_references: z.array(z.unknown()).optional().catch(undefined),
  search_result_groups: z.array(z.unknown()).optional().catch(undefined),
}).passthrough();
export type MessageMetadata = z.infer<typeof MessageMetadataSchema>;

/**
 * A message record as found in a list, a `{ messages }` object or a mapping node
 */
export const MessageRecordSchema = z.object({
  role: z.string().optional(),
  author: AuthorSchema.optional(),
  content: z.unknown(),
  type: z.string().optional().catch(undefined),
  canvas: z.unknown().optional(),
  citations: z.array(z.unknown()).optional().catch(undefined),
  metadata: MessageMetadataSchema.nullable().optional().catch(undefined),
}).passthrough();
export type MessageRecord = z.infer<typeof MessageRecordSchema>;

/**
 * Mapping entry - contains message and children
 * Broken `children`/`parent` fields degrade instead of failing the node.
 */
export const MappingNodeSchema = z.object({
  id: z.string().optional(),
  message: z.unknown().optional(),
  parent: z.string().nullable().optional().catch(undefined),
  children: z
    .array(z.unknown())
    .catch([])
    .transform((ids) => ids.filter((id): id is string => typeof id === 'string')),
}).passthrough();
export type MappingNode = z.infer<typeof MappingNodeSchema>;

/**
 * Top-level export shapes
 */
export type ExportFormat = 'list' | 'messages_object' | 'mapping';

// ── Normalized model ────────────────────────────────────────────────────────

/**
 * One reasoning step of a "thoughts" message
 */
export interface Thought {
  summary?: string;
  text: string;
}

export interface TextContent {
  kind: 'text';
  text: string;
}

export interface PartsContent {
  kind: 'parts';
  parts: unknown[];
}

export interface CodeContent {
  kind: 'code';
  language?: string;
  text: string;
}

export interface ThoughtsContent {
  kind: 'thoughts';
  thoughts: Thought[];
}

export interface CanvasContent {
  kind: 'canvas';
  canvasKind: 'code' | 'document';
  title?: string;
  language?: string;
  text: string;
}

export interface RawContent {
  kind: 'raw';
  value: unknown;
}

/**
 * Message content, classified once from its raw JSON shape
 */
export type Content =
  | TextContent
  | PartsContent
  | CodeContent
  | ThoughtsContent
  | CanvasContent
  | RawContent;

/**
 * Citation metadata attached to a message
 */
export interface CitationMeta {
  title?: string;
  url?: string;
  snippet?: string;
  attribution?: string;
}

/**
 * Reference-form lookup: literal marker text, and search result ids
 */
export interface ReferenceLookup {
  byText: Map<string, CitationMeta[]>;
  byId: Map<string, CitationMeta[]>;
}

/**
 * Normalized message ready for rendering
 */
export interface Message {
  role: Role;
  content: Content;
  /** Ordered entries that bracket markers index into (1-based) */
  citations: CitationMeta[];
  /** Lookup for reference-form markers */
  references: ReferenceLookup;
}

/**
 * Conversation after detection and normalization
 */
export interface ParsedConversation {
  format: ExportFormat;
  title: string | null;
  messages: Message[];
}
