/**
 * Tests for token estimation and prompt windowing
 */

import { Message } from '../src/core/entities/Conversation.js';
import {
  estimateTokens,
  messageTokens,
  totalTokens,
  windowMessages,
} from '../src/core/windowing/PromptWindower.js';

const history: Message[] = [
  { role: 'user', content: 'abcd' }, // 2 tokens
  { role: 'assistant', content: 'hi' }, // 3 tokens
  { role: 'user', content: 'abcd' }, // 2 tokens
];

describe('estimateTokens', () => {
  it('should count UTF-8 bytes divided by four, rounded up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
    expect(estimateTokens('日本')).toBe(2); // 6 bytes
  });

  it('should never decrease as text grows', () => {
    let previous = 0;
    for (let length = 0; length <= 40; length++) {
      const estimate = estimateTokens('é'.repeat(length));
      expect(estimate).toBeGreaterThanOrEqual(previous);
      previous = estimate;
    }
  });

  it('should include the role in a message cost', () => {
    expect(messageTokens({ role: 'user', content: 'abcd' })).toBe(2);
    expect(messageTokens({ role: 'assistant', content: 'hi' })).toBe(3);
  });
});

describe('windowMessages', () => {
  it('should keep the newest messages that fit, oldest first', () => {
    expect(windowMessages(history, 5)).toEqual([
      { role: 'assistant', content: 'hi' },
      { role: 'user', content: 'abcd' },
    ]);
  });

  it('should keep everything when the budget allows', () => {
    expect(windowMessages(history, 7)).toEqual(history);
  });

  it('should stop at the first message that overflows', () => {
    const withLongMiddle: Message[] = [
      { role: 'user', content: 'x' },
      { role: 'assistant', content: 'y'.repeat(40) },
      { role: 'user', content: 'abcd' },
    ];

    expect(windowMessages(withLongMiddle, 10)).toEqual([{ role: 'user', content: 'abcd' }]);
  });

  it('should be empty when the newest message alone is over budget', () => {
    expect(windowMessages([{ role: 'user', content: 'a'.repeat(100) }], 10)).toEqual([]);
  });

  it('should be empty for an empty history', () => {
    expect(windowMessages([], 10)).toEqual([]);
  });

  it('should always return a suffix within budget', () => {
    for (let budget = 0; budget <= 10; budget++) {
      const window = windowMessages(history, budget);
      expect(window).toEqual(history.slice(history.length - window.length));
      expect(totalTokens(window)).toBeLessThanOrEqual(budget);
    }
  });

  it('should be idempotent', () => {
    const once = windowMessages(history, 5);
    expect(windowMessages(once, 5)).toEqual(once);
  });

  it('should return copies rather than the stored messages', () => {
    const window = windowMessages(history, 7);
    expect(window[0]).toEqual(history[0]);
    expect(window[0]).not.toBe(history[0]);
  });
});
