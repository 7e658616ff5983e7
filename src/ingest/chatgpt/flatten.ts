/**
 * Mapping flattener
 * Turns the node-id tree of a `mapping` export into an ordered message list
 */

import type { Logger } from 'pino';
import { isRecord } from '../../utils/index.js';
import { silentLogger } from '../../utils/logger.js';
import { isEmptyContent } from './content.js';
import { normalizeMessage } from './message.js';
import { MappingNodeSchema, type MappingNode, type Message } from './types.js';

/**
 * Read every node once into an id-indexed table
 */
export function buildNodeTable(mapping: Record<string, unknown>, logger: Logger): Map<string, MappingNode> {
  const nodes = new Map<string, MappingNode>();
  for (const [id, raw] of Object.entries(mapping)) {
    const parsed = MappingNodeSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ nodeId: id }, 'Skipping malformed mapping node');
      continue;
    }
    nodes.set(id, parsed.data);
  }
  return nodes;
}

/**
 * Pick the traversal root.
 * Candidates are nodes without a parent; failing that, nodes no other node
 * lists as a child; failing that (a pure cycle), every node. The candidate
 * with the fewest inbound child links wins, ties going to iteration order.
 */
export function findRoot(nodes: Map<string, MappingNode>): string | null {
  const inbound = new Map<string, number>();
  for (const [id, node] of nodes) {
    for (const childId of node.children) {
      if (childId === id) continue;
      inbound.set(childId, (inbound.get(childId) ?? 0) + 1);
    }
  }

  const ids = Array.from(nodes.keys());
  let candidates = ids.filter((id) => nodes.get(id)?.parent == null);
  if (candidates.length === 0) {
    candidates = ids.filter((id) => !inbound.has(id));
  }
  if (candidates.length === 0) {
    candidates = ids;
  }

  let rootId: string | null = null;
  let fewest = Infinity;
  for (const id of candidates) {
    const count = inbound.get(id) ?? 0;
    if (count < fewest) {
      rootId = id;
      fewest = count;
    }
  }
  return rootId;
}

function isHidden(message: Record<string, unknown>): boolean {
  return isRecord(message.metadata) && message.metadata.is_visually_hidden_from_conversation === true;
}

/**
 * Flatten a mapping into messages in depth-first order.
 * Placeholder, hidden and empty nodes are skipped but their children are
 * still walked; a node reached twice is treated as a leaf.
 */
export function flattenMapping(mapping: Record<string, unknown>, logger: Logger = silentLogger()): Message[] {
  const nodes = buildNodeTable(mapping, logger);
  const rootId = findRoot(nodes);
  if (rootId === null) return [];

  logger.debug({ rootId, nodes: nodes.size }, 'Flattening mapping');

  const messages: Message[] = [];
  const visited = new Set<string>();
  const stack: string[] = [rootId];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    if (visited.has(id)) {
      logger.debug({ nodeId: id }, 'Node reached twice, not descending again');
      continue;
    }
    visited.add(id);

    const node = nodes.get(id);
    if (!node) continue;

    const raw = node.message;
    if (isRecord(raw) && !isHidden(raw)) {
      const message = normalizeMessage(raw, logger);
      if (!isEmptyContent(message.content)) {
        messages.push(message);
      }
    }

    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }

  return messages;
}
