/**
 * ChatGPT parser tests
 */

import { describe, it, expect } from 'vitest';
import { parseChatGPTExport } from './parser.js';
import { ParseError, UnsupportedFormatError } from './errors.js';

// Sample ChatGPT export data for testing
const sampleConversation = {
  title: 'Test Conversation',
  create_time: 1706745600,
  update_time: 1706749200,
  mapping: {
    'root-id': {
      id: 'root-id',
      message: null,
      parent: null,
      children: ['msg-1'],
    },
    'msg-1': {
      id: 'msg-1',
      message: {
        id: 'msg-1',
        author: { role: 'user' },
        content: {
          content_type: 'text',
          parts: ['Hello, how are you?'],
        },
        status: 'finished',
        metadata: {},
      },
      parent: 'root-id',
      children: ['msg-2'],
    },
    'msg-2': {
      id: 'msg-2',
      message: {
        id: 'msg-2',
        author: { role: 'assistant' },
        content: {
          content_type: 'text',
          parts: ["I'm doing well, thank you! How can I help you today?"],
        },
        status: 'finished',
        metadata: {
          model_slug: 'gpt-4',
        },
      },
      parent: 'msg-1',
      children: [],
    },
  },
  conversation_id: 'conv-123',
};

describe('parseChatGPTExport', () => {
  it('should parse a mapping export', () => {
    const result = parseChatGPTExport(JSON.stringify(sampleConversation));

    expect(result.format).toBe('mapping');
    expect(result.title).toBe('Test Conversation');
    expect(result.messages).toHaveLength(2);
    expect(result.messages[0].role).toBe('user');
    expect(result.messages[0].content).toEqual({ kind: 'parts', parts: ['Hello, how are you?'] });
    expect(result.messages[1].role).toBe('assistant');
  });

  it('should parse a plain message list', () => {
    const result = parseChatGPTExport(
      JSON.stringify([
        { role: 'user', content: 'Hello' },
        { role: 'assistant', content: 'Hi there' },
      ])
    );

    expect(result.format).toBe('list');
    expect(result.title).toBeNull();
    expect(result.messages.map((m) => m.role)).toEqual(['user', 'assistant']);
    expect(result.messages[1].content).toEqual({ kind: 'text', text: 'Hi there' });
  });

  it('should parse an object with a messages list', () => {
    const result = parseChatGPTExport(
      JSON.stringify({
        title: 'Saved chat',
        messages: [{ role: 'user', content: 'Hello' }],
      })
    );

    expect(result.format).toBe('messages_object');
    expect(result.title).toBe('Saved chat');
    expect(result.messages).toHaveLength(1);
  });

  it('should flatten whole conversations found inside a list', () => {
    const result = parseChatGPTExport(JSON.stringify([sampleConversation]));

    expect(result.format).toBe('list');
    expect(result.title).toBe('Test Conversation');
    expect(result.messages.map((m) => m.role)).toEqual(['user', 'assistant']);
  });

  it('should fold the title of a listed conversation onto one line', () => {
    const result = parseChatGPTExport(JSON.stringify([{ ...sampleConversation, title: 'Test\nConversation' }]));

    expect(result.title).toBe('Test Conversation');
  });

  it('should throw ParseError for invalid JSON', () => {
    expect(() => parseChatGPTExport('{ invalid json }')).toThrow(ParseError);
    expect(() => parseChatGPTExport('{ invalid json }')).toThrow(/^Invalid JSON: /);
  });

  it('should throw UnsupportedFormatError naming the observed shape', () => {
    try {
      parseChatGPTExport(JSON.stringify({ conversation: [] }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedFormatError);
      if (err instanceof UnsupportedFormatError) {
        expect(err.shape).toBe('object with keys [conversation]');
      }
    }
  });

  it('should reject top-level scalars', () => {
    expect(() => parseChatGPTExport('42')).toThrow(UnsupportedFormatError);
    expect(() => parseChatGPTExport('null')).toThrow(/got null$/);
  });

  it('should handle empty export', () => {
    const result = parseChatGPTExport('[]');

    expect(result.messages).toHaveLength(0);
  });

  it('should keep malformed list entries as raw JSON', () => {
    const result = parseChatGPTExport(JSON.stringify([42, { role: 'user', content: 'ok' }]));

    expect(result.messages).toHaveLength(2);
    expect(result.messages[0].role).toBe('unknown');
    expect(result.messages[0].content).toEqual({ kind: 'raw', value: 42 });
    expect(result.messages[1].content).toEqual({ kind: 'text', text: 'ok' });
  });

  it('should treat a canvas record in a list as an assistant canvas', () => {
    const result = parseChatGPTExport(
      JSON.stringify([
        {
          type: 'canvas',
          canvas: { name: 'app.py', type: 'code/python', content: 'print(1)' },
        },
      ])
    );

    expect(result.messages[0].role).toBe('assistant');
    expect(result.messages[0].content).toEqual({
      kind: 'canvas',
      canvasKind: 'code',
      title: 'app.py',
      language: 'python',
      text: 'print(1)',
    });
  });

  it('should attach citations from message metadata', () => {
    const result = parseChatGPTExport(
      JSON.stringify([
        {
          role: 'assistant',
          content: 'See 【1】',
          metadata: { citations: [{ title: 'Doc', url: 'https://example.com/doc' }] },
        },
      ])
    );

    expect(result.messages[0].citations).toEqual([{ title: 'Doc', url: 'https://example.com/doc' }]);
  });
});
