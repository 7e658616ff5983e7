/**
 * ChatGPT ingestion module
 * Parses ChatGPT JSON exports into ordered, classified messages
 */

export { parseChatGPTExport } from './parser.js';
export { detectFormat, conversationTitle, type DetectedFormat } from './detect.js';
export { flattenMapping, findRoot, buildNodeTable } from './flatten.js';
export { normalizeMessage, normalizeRole } from './message.js';
export { classifyContent, isEmptyContent } from './content.js';
export { collectCitations, collectReferences, toCitationMeta, referenceId } from './metadata.js';
export { ConversionError, ParseError, UnsupportedFormatError } from './errors.js';

export {
  AuthorRoleSchema,
  AuthorSchema,
  MessageRecordSchema,
  MappingNodeSchema,
  type AuthorRole,
  type Role,
  type MessageRecord,
  type MappingNode,
  type ExportFormat,
  type Content,
  type Thought,
  type CitationMeta,
  type ReferenceLookup,
  type Message,
  type ParsedConversation,
} from './types.js';
