/**
 * Template system for bridging structured history to backend payloads
 */
export type { PromptTemplate, PromptPayload, ChatPayload, GeneratePayload } from './types.js';
export { ChatTemplate } from './ChatTemplate.js';
export { TranscriptTemplate } from './TranscriptTemplate.js';
