import { Message } from '../entities/Conversation.js';

const BYTES_PER_TOKEN = 4;

/**
 * Approximate token count: UTF-8 bytes / 4, rounded up.
 * Not a tokenizer; good enough to keep prompts under a budget.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(Buffer.byteLength(text, 'utf8') / BYTES_PER_TOKEN);
}

export function messageTokens(message: Message): number {
  return Math.ceil(
    (Buffer.byteLength(message.role, 'utf8') + Buffer.byteLength(message.content, 'utf8')) /
      BYTES_PER_TOKEN
  );
}

/**
 * Select the longest run of most recent messages whose estimated cost fits
 * in `maxTokens`.
 *
 * Scans newest to oldest and stops at the first message that would overflow,
 * so an old short message is never kept once a newer one was dropped.
 *
 * @param history - Messages in creation order, oldest first
 * @returns The kept messages, oldest first. Empty when nothing fits.
 */
export function windowMessages(history: readonly Message[], maxTokens: number): Message[] {
  const kept: Message[] = [];
  let total = 0;

  for (let i = history.length - 1; i >= 0; i--) {
    const entry = history[i];
    const cost = messageTokens(entry);
    if (total + cost > maxTokens) {
      break;
    }
    kept.push({ role: entry.role, content: entry.content });
    total += cost;
  }

  return kept.reverse();
}

export function totalTokens(messages: readonly Message[]): number {
  return messages.reduce((sum, msg) => sum + messageTokens(msg), 0);
}
