import { ModelConfig, ModelTable, isBackendKind } from '../entities/Model.js';
import { ConfigError } from '../errors.js';

/**
 * Maps model names to their backend and input budget.
 * Loaded once per process; lookups return the same frozen object every time.
 */
export class BackendRegistry {
  private readonly resolved = new Map<string, ModelConfig>();

  constructor(private readonly table: Readonly<ModelTable>) {}

  lookup(modelName: string): ModelConfig {
    const cached = this.resolved.get(modelName);
    if (cached) {
      return cached;
    }

    if (!Object.prototype.hasOwnProperty.call(this.table, modelName)) {
      throw new ConfigError(
        `Unknown model "${modelName}". Known models: ${this.modelNames().join(', ') || '(none)'}`
      );
    }

    const entry = this.table[modelName];
    if (!isBackendKind(entry.backend)) {
      throw new ConfigError(`Model "${modelName}" uses unsupported backend "${entry.backend}"`);
    }
    if (!Number.isInteger(entry.maxTokens) || entry.maxTokens <= 0) {
      throw new ConfigError(`Model "${modelName}" must have a positive maxTokens, got ${entry.maxTokens}`);
    }

    const config: ModelConfig = Object.freeze({
      modelName,
      backendKind: entry.backend,
      maxTokens: entry.maxTokens,
      ...(entry.backendModelId ? { backendModelId: entry.backendModelId } : {}),
    });
    this.resolved.set(modelName, config);
    return config;
  }

  has(modelName: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.table, modelName);
  }

  modelNames(): string[] {
    return Object.keys(this.table);
  }
}
