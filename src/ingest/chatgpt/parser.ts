/**
 * ChatGPT JSON export parser
 * Detects the export shape and produces messages in conversation order
 */

import type { Logger } from 'pino';
import { isRecord } from '../../utils/index.js';
import { silentLogger } from '../../utils/logger.js';
import { conversationTitle, detectFormat } from './detect.js';
import { ParseError } from './errors.js';
import { flattenMapping } from './flatten.js';
import { normalizeMessage } from './message.js';
import type { Message, ParsedConversation } from './types.js';

/**
 * Normalize the entries of a message list.
 * An entry that is itself a whole conversation (it has a `mapping`) is
 * flattened in place, as in the multi-conversation `conversations.json`.
 */
function normalizeList(entries: unknown[], logger: Logger): Message[] {
  const messages: Message[] = [];
  for (const entry of entries) {
    if (isRecord(entry) && isRecord(entry.mapping)) {
      messages.push(...flattenMapping(entry.mapping, logger));
    } else {
      messages.push(normalizeMessage(entry, logger));
    }
  }
  return messages;
}

/**
 * Title of a list holding exactly one whole conversation
 */
function listTitle(entries: unknown[]): string | null {
  if (entries.length !== 1) return null;
  const [entry] = entries;
  if (!isRecord(entry) || !isRecord(entry.mapping)) return null;
  return conversationTitle(entry);
}

/**
 * Parse ChatGPT export JSON string
 *
 * @throws ParseError when the text is not JSON
 * @throws UnsupportedFormatError when the JSON has none of the known shapes
 */
export function parseChatGPTExport(jsonContent: string, logger: Logger = silentLogger()): ParsedConversation {
  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonContent);
  } catch (err) {
    throw new ParseError(err instanceof Error ? err.message : String(err));
  }

  const detected = detectFormat(rawData);
  logger.debug({ format: detected.kind }, 'Detected export format');

  switch (detected.kind) {
    case 'list':
      return {
        format: detected.kind,
        title: listTitle(detected.messages),
        messages: normalizeList(detected.messages, logger),
      };
    case 'messages_object':
      return {
        format: detected.kind,
        title: detected.title,
        messages: normalizeList(detected.messages, logger),
      };
    case 'mapping':
      return {
        format: detected.kind,
        title: detected.title,
        messages: flattenMapping(detected.mapping, logger),
      };
  }
}
