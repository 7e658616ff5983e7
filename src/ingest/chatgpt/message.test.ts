import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '../../utils/logger.js';
import { normalizeMessage, normalizeRole } from './message.js';

describe('normalizeRole', () => {
  it('should keep known roles', () => {
    expect(normalizeRole('tool')).toBe('tool');
  });

  it('should map anything else to unknown', () => {
    expect(normalizeRole('critic')).toBe('unknown');
    expect(normalizeRole(undefined)).toBe('unknown');
  });
});

describe('normalizeMessage', () => {
  it('should prefer the author role over a top-level role', () => {
    expect(normalizeMessage({ role: 'user', author: { role: 'system' }, content: 'x' }).role).toBe('system');
  });

  it('should mark messages without a role as unknown', () => {
    expect(normalizeMessage({ content: 'orphan' }).role).toBe('unknown');
  });

  it('should render invalid records as raw JSON and warn', () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const raw = { role: 5, content: 'x' };

    const message = normalizeMessage(raw, logger);

    expect(message.role).toBe('unknown');
    expect(message.content).toEqual({ kind: 'raw', value: raw });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should ignore a numeric message id', () => {
    const message = normalizeMessage({ id: 1, role: 'user', content: 'Hello' });

    expect(message.role).toBe('user');
    expect(message.content).toEqual({ kind: 'text', text: 'Hello' });
  });

  it('should treat malformed metadata fields as absent', () => {
    const message = normalizeMessage({
      role: 'assistant',
      content: 'Hi',
      metadata: {
        citations: null,
        content_references: 'none',
        search_result_groups: 3,
        model_slug: null,
        is_visually_hidden_from_conversation: 'no',
      },
    });

    expect(message.role).toBe('assistant');
    expect(message.content).toEqual({ kind: 'text', text: 'Hi' });
    expect(message.citations).toEqual([]);
    expect(message.references.byText.size).toBe(0);
    expect(message.references.byId.size).toBe(0);
  });

  it('should treat malformed direct citations and metadata as absent', () => {
    const message = normalizeMessage({ role: 'user', content: 'Hi', citations: {}, metadata: 'n/a' });

    expect(message.role).toBe('user');
    expect(message.citations).toEqual([]);
  });

  it('should collect citations and reference lookups', () => {
    const message = normalizeMessage({
      author: { role: 'assistant' },
      content: { content_type: 'text', parts: ['See citeturn0search0'] },
      metadata: {
        content_references: [
          { matched_text: 'citeturn0search0', items: [{ title: 'Source', url: 'https://example.com/s' }] },
        ],
      },
    });

    expect(message.citations).toEqual([{ title: 'Source', url: 'https://example.com/s' }]);
    expect(message.references.byText.get('citeturn0search0')).toEqual([
      { title: 'Source', url: 'https://example.com/s' },
    ]);
  });

  it('should accept a null metadata field', () => {
    expect(normalizeMessage({ role: 'user', content: 'hi', metadata: null }).citations).toEqual([]);
  });
});
