import type { Message } from '@keepsake/shared';

/**
 * Render recent messages (most recent first, as the store returns them) as
 * chronological `role(direction): content` lines, each cut to `maxChars`.
 */
export function renderHistory(history: Message[], maxChars: number): string {
  return [...history]
    .reverse()
    .map((m) => `${m.role}(${m.direction}): ${m.content.slice(0, maxChars).replace(/\n/g, ' ')}`)
    .join('\n');
}
