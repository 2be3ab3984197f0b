/**
 * Model-related domain entities
 */
export type BackendKind = 'openai' | 'anthropic' | 'ollama';

export const BACKEND_KINDS: readonly BackendKind[] = ['openai', 'anthropic', 'ollama'];

export interface ModelConfig {
  readonly modelName: string;
  readonly backendKind: BackendKind;
  /** Input budget for the prompt window */
  readonly maxTokens: number;
  /** Name the backend knows the model by, when it differs from modelName */
  readonly backendModelId?: string;
}

/**
 * Raw model table entry before the registry checks it
 */
export interface ModelTableEntry {
  backend: string;
  maxTokens: number;
  backendModelId?: string;
}

export type ModelTable = Record<string, ModelTableEntry>;

export function isBackendKind(value: string): value is BackendKind {
  return (BACKEND_KINDS as readonly string[]).includes(value);
}
