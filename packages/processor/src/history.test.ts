import { describe, it, expect } from 'vitest';
import type { Message } from '@keepsake/shared';
import { renderHistory } from './history';

function message(content: string, overrides: Partial<Message> = {}): Message {
  return {
    id: content,
    sender: 'whatsapp:+15550001111',
    direction: 'in',
    role: 'user',
    correlationId: 'SM1',
    content,
    metadata: {},
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('renderHistory', () => {
  it('renders nothing for an empty history', () => {
    expect(renderHistory([], 200)).toBe('');
  });

  it('reverses to chronological order and flattens newlines', () => {
    const history = [
      message('second', { role: 'assistant', direction: 'out' }),
      message('first\nline'),
    ];

    expect(renderHistory(history, 200)).toBe('user(in): first line\nassistant(out): second');
  });

  it('truncates before flattening', () => {
    expect(renderHistory([message('abcdef\nghij')], 8)).toBe('user(in): abcdef g');
  });

  it('leaves the input order untouched', () => {
    const history = [message('b'), message('a')];
    renderHistory(history, 10);
    expect(history.map((m) => m.content)).toEqual(['b', 'a']);
  });
});
