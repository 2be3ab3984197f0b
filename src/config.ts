import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ModelTable } from './core/entities/Model.js';
import { ConfigError, errorMessage } from './core/errors.js';

export const DEFAULT_MODELS_PATH = path.resolve(__dirname, '..', 'config', 'models.json');

export interface Config {
  debug: boolean;
  defaultModel: string;
  models: ModelTable;
  credentials: {
    openaiApiKey?: string;
    anthropicApiKey?: string;
  };
  endpoints: {
    openai: string;
    anthropic: string;
    ollama: string;
  };
  database: {
    path: string;
  };
  history: {
    windowDays: number;
  };
  retry: {
    maxAttempts: number;
    delayMs: number;
    timeoutMs: number;
  };
  cli: {
    question?: string;
    file?: string;
    session?: string;
    /** Continue the most recent session instead of starting one */
    continueLast: boolean;
  };
}

const ModelTableSchema = z.record(
  z.object({
    backend: z.string().min(1, 'Backend must not be empty'),
    maxTokens: z.number().int().positive('maxTokens must be a positive integer'),
    backendModelId: z.string().min(1).optional(),
  })
);

// Zod validation schema
const ConfigSchema = z.object({
  debug: z.boolean(),
  defaultModel: z.string().min(1, 'A default model is required'),
  models: ModelTableSchema.refine((models) => Object.keys(models).length > 0, {
    message: 'At least 1 model is required',
  }),
  credentials: z.object({
    openaiApiKey: z.string().min(1).optional(),
    anthropicApiKey: z.string().min(1).optional(),
  }),
  endpoints: z.object({
    openai: z.string().url('Invalid OpenAI URL format'),
    anthropic: z.string().url('Invalid Anthropic URL format'),
    ollama: z.string().url('Invalid Ollama URL format'),
  }),
  database: z.object({
    path: z.string().min(1),
  }),
  history: z.object({
    windowDays: z.number().int().min(1).max(3650),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    delayMs: z.number().int().min(0).max(60000),
    timeoutMs: z.number().int().min(1000).max(600000),
  }),
  cli: z.object({
    question: z.string().optional(),
    file: z.string().optional(),
    session: z.string().optional(),
    continueLast: z.boolean(),
  }),
});

const SHORT_FLAGS: Record<string, string> = {
  q: 'question',
  f: 'file',
  m: 'model',
  s: 'session',
  c: 'continue',
};

/**
 * Parse command line arguments
 * Usage: chatrelay --model sonnet -q "What is a monad?" --debug
 *        chatrelay -c
 */
export function parseArgs(argv: readonly string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    let key: string | undefined;
    if (arg.startsWith('--')) {
      key = arg.slice(2);
    } else if (arg.startsWith('-') && arg.length === 2) {
      key = SHORT_FLAGS[arg.slice(1)] ?? arg.slice(1);
    }
    if (!key) {
      continue;
    }

    const equals = key.indexOf('=');
    if (equals !== -1) {
      args[key.slice(0, equals)] = key.slice(equals + 1);
      continue;
    }

    // Check if next arg is a value or another flag
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('-')) {
      args[key] = next;
      i++;
    } else {
      args[key] = true;
    }
  }

  return args;
}

/**
 * Read the model table (model name -> backend, budget, backend id)
 */
export function loadModelTable(filePath: string): ModelTable {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read model table ${filePath}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Model table ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = ModelTableSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid model table ${filePath}:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Get configuration from CLI arguments, environment variables and the model table.
 * CLI arguments win over the environment. Throws ConfigError listing every
 * validation issue.
 */
export function getConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  // Helper to get value from CLI args or env, with type conversion
  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string =>
    getOptionalString(cliKey, envKey) ?? defaultValue;

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = getOptionalString(cliKey, envKey);
    return value !== undefined ? Number(value) : defaultValue;
  };

  const models = loadModelTable(getString('models-config', 'MODELS_CONFIG_PATH', DEFAULT_MODELS_PATH));
  const defaultModel = getString('model', 'CHAT_MODEL', Object.keys(models)[0] ?? '');

  const rawConfig = {
    debug: getBoolean('debug', 'DEBUG', false),
    defaultModel,
    models,
    credentials: {
      openaiApiKey: env.OPENAI_API_KEY || undefined,
      anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    },
    endpoints: {
      openai: getString('openai-url', 'OPENAI_API_URL', 'https://api.openai.com/v1'),
      anthropic: getString('anthropic-url', 'ANTHROPIC_API_URL', 'https://api.anthropic.com'),
      ollama: getString('ollama-url', 'OLLAMA_API_URL', 'http://localhost:11434'),
    },
    database: {
      path: getString('db-path', 'DB_PATH', path.join('data', 'conversations.db')),
    },
    history: {
      windowDays: getNumber('history-days', 'HISTORY_WINDOW_DAYS', 7),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      delayMs: getNumber('retry-delay', 'RETRY_DELAY_MS', 1000),
      timeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 120000),
    },
    cli: {
      question: getOptionalString('question', 'CHAT_QUESTION'),
      file: getOptionalString('file', 'CHAT_FILE'),
      session: getOptionalString('session', 'CHAT_SESSION'),
      continueLast: getBoolean('continue', 'CHAT_CONTINUE', false),
    },
  };

  // Validate configuration
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError(`Configuration validation failed:\n${formatIssues(parsed.error)}`);
  }

  const config: Config = parsed.data;
  if (!Object.prototype.hasOwnProperty.call(config.models, config.defaultModel)) {
    throw new ConfigError(
      `Default model "${config.defaultModel}" is not in the model table (${Object.keys(config.models).join(', ')})`
    );
  }
  return config;
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `  • ${issue.path.join('.') || 'root'}: ${issue.message}`)
    .join('\n');
}

/**
 * Print configuration summary (stderr, never the secrets themselves)
 */
export function printConfigInfo(config: Config): void {
  console.error(`Default model: ${config.defaultModel}`);
  console.error(`Models: ${Object.keys(config.models).length} configured`);
  Object.entries(config.models).forEach(([name, entry], idx) => {
    const remap = entry.backendModelId ? ` -> ${entry.backendModelId}` : '';
    console.error(`   ${idx + 1}. ${name} (${entry.backend}${remap}, ${entry.maxTokens} tokens)`);
  });
  console.error(`Ollama: ${config.endpoints.ollama}`);
  console.error(
    `Credentials: OPENAI_API_KEY ${config.credentials.openaiApiKey ? 'set' : 'missing'}, ANTHROPIC_API_KEY ${config.credentials.anthropicApiKey ? 'set' : 'missing'}`
  );
  console.error(`Database: ${config.database.path}`);
  console.error(
    `Retry: ${config.retry.maxAttempts}x every ${config.retry.delayMs}ms (timeout ${config.retry.timeoutMs}ms)`
  );
}
