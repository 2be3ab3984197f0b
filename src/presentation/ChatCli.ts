import fs from 'fs';
import readline from 'readline';
import { Config } from '../config.js';
import { ConversationState } from '../core/entities/Conversation.js';
import { HttpTransport } from '../core/interfaces/IHttpTransport.js';
import { IConversationRepository } from '../core/interfaces/IConversationRepository.js';
import { BackendRegistry } from '../core/registry/BackendRegistry.js';
import { ChatRelayError } from '../core/errors.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from '../infrastructure/database/repositories/ConversationRepository.js';
import { OpenAiApiClient } from '../infrastructure/http/OpenAiApiClient.js';
import { AnthropicApiClient } from '../infrastructure/http/AnthropicApiClient.js';
import { OllamaApiClient } from '../infrastructure/http/OllamaApiClient.js';
import { ChatDispatcher } from '../application/services/ChatDispatcher.js';
import { ChatTurn, ConversationService, isCancellation } from '../application/services/ConversationService.js';
import { SessionService } from '../application/services/SessionService.js';
import { RetryConfig } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('cli');

const HELP_TEXT = `Commands:
  \\help                  show this help
  \\model [name]          list models, or switch to one
  \\session [name]        list sessions, or continue one
  \\new [name]            start a new session
  \\rename_session name   rename the current session
  \\quit                  exit (Ctrl+C also works)
Ctrl+C while an answer streams stops it; the partial answer is not saved.`;

export interface ChatCliDeps {
  transport?: HttpTransport;
  /** Replaces the SQLite repository; the CLI will not own or close it */
  repository?: IConversationRepository;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
}

/**
 * Command line front end. Wires configuration into the services and runs
 * one-off, file or interactive mode.
 */
export class ChatCli {
  private readonly registry: BackendRegistry;
  private readonly conversationService: ConversationService;
  private readonly sessionService: SessionService;
  private readonly dbConnection: DatabaseConnection | null = null;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly errorOutput: NodeJS.WritableStream;
  private activeTurn: ChatTurn | null = null;

  constructor(
    private config: Config,
    deps: ChatCliDeps = {}
  ) {
    this.input = deps.input ?? process.stdin;
    this.output = deps.output ?? process.stdout;
    this.errorOutput = deps.errorOutput ?? process.stderr;

    // Initialize repository
    let conversationRepo = deps.repository;
    if (!conversationRepo) {
      this.dbConnection = new DatabaseConnection(config.database.path);
      conversationRepo = new ConversationRepository(this.dbConnection.getDatabase());
    }

    // Initialize backends
    const retryConfig: RetryConfig = {
      maxAttempts: config.retry.maxAttempts,
      initialDelayMs: config.retry.delayMs,
      maxDelayMs: config.retry.delayMs,
      multiplier: 1,
      timeoutMs: config.retry.timeoutMs,
    };
    const transport = deps.transport;

    this.registry = new BackendRegistry(config.models);
    const dispatcher = new ChatDispatcher(this.registry, {
      openai: new OpenAiApiClient({
        baseUrl: config.endpoints.openai,
        apiKey: config.credentials.openaiApiKey,
        transport,
        retryConfig,
      }),
      anthropic: new AnthropicApiClient({
        baseUrl: config.endpoints.anthropic,
        apiKey: config.credentials.anthropicApiKey,
        transport,
        retryConfig,
      }),
      ollama: new OllamaApiClient({
        baseUrl: config.endpoints.ollama,
        transport,
        retryConfig,
      }),
    });

    // Initialize services
    this.conversationService = new ConversationService(conversationRepo, dispatcher, this.registry, {
      historyWindowDays: config.history.windowDays,
    });
    this.sessionService = new SessionService(conversationRepo, this.registry);
  }

  /**
   * Run the mode selected by the configuration
   * @returns process exit code
   */
  async run(): Promise<number> {
    const { question, file, session } = this.config.cli;

    try {
      if (file !== undefined || question !== undefined) {
        const text = file !== undefined ? fs.readFileSync(file, 'utf8').trim() : (question ?? '');
        await this.ask(this.openSession(session), text);
        return 0;
      }

      await this.interactive(session);
      return 0;
    } catch (error) {
      if (error instanceof ChatRelayError) {
        this.printError(error);
        return 1;
      }
      throw error;
    }
  }

  /**
   * Stream one answer to the output
   */
  async ask(state: ConversationState, text: string): Promise<string> {
    const turn = this.conversationService.send(state, text);
    this.activeTurn = turn;

    this.output.write('\n');
    try {
      for await (const fragment of turn) {
        this.output.write(fragment);
      }
      this.output.write('\u0007\n');
      return turn.response;
    } finally {
      this.activeTurn = null;
    }
  }

  /**
   * Stop the answer currently streaming, if any
   * @returns whether there was one
   */
  interrupt(): boolean {
    if (!this.activeTurn) {
      return false;
    }
    this.activeTurn.close();
    return true;
  }

  async interactive(sessionName?: string): Promise<void> {
    const firstUse = this.sessionService.isFirstUse();
    let state = this.openSession(sessionName);

    this.printStatus(state);
    if (firstUse) {
      this.errorOutput.write('\\help for help. \\model to change model. \\session to go to a previous session. Ctrl+C to quit.\n');
    }

    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      prompt: '> ',
    });
    rl.on('SIGINT', () => {
      if (!this.interrupt()) {
        rl.close();
      }
    });

    try {
      rl.prompt();
      for await (const rawLine of rl) {
        const line = rawLine.trim();
        if (line === '\\quit') {
          break;
        }
        if (line) {
          state = await this.handleLine(state, line);
        }
        rl.prompt();
      }
    } finally {
      rl.close();
    }
  }

  /**
   * Execute a backslash command or send the line as a message.
   * Expected failures are printed and the loop continues.
   */
  async handleLine(state: ConversationState, line: string): Promise<ConversationState> {
    try {
      if (line.startsWith('\\')) {
        return this.handleCommand(state, line);
      }
      await this.ask(state, line);
    } catch (error) {
      if (isCancellation(error)) {
        this.errorOutput.write('\n(stopped, answer not saved)\n');
      } else if (error instanceof ChatRelayError) {
        this.printError(error);
      } else {
        throw error;
      }
    }
    return state;
  }

  handleCommand(state: ConversationState, line: string): ConversationState {
    const [command, ...rest] = line.split(/\s+/);
    const argument = rest.join(' ');

    switch (command) {
      case '\\help':
        this.errorOutput.write(`${HELP_TEXT}\n`);
        return state;

      case '\\model': {
        if (!argument) {
          this.registry.modelNames().forEach((name) => {
            const marker = name === state.modelName ? '*' : ' ';
            this.errorOutput.write(`${marker} ${name}\n`);
          });
          return state;
        }
        const next = this.sessionService.switchModel(state, argument);
        this.printStatus(next);
        return next;
      }

      case '\\session': {
        if (!argument) {
          this.sessionService.list().forEach((session) => {
            const marker = session.id === state.sessionId ? '*' : ' ';
            this.errorOutput.write(`${marker} ${session.name} (${session.createdAt.toISOString()})\n`);
          });
          return state;
        }
        const next = this.sessionService.resume(argument, state.modelName);
        this.errorOutput.write(`Switched to session ${argument}\n`);
        return next;
      }

      case '\\new': {
        const next = this.sessionService.start(state.modelName, argument || undefined);
        this.errorOutput.write(`Started session ${this.sessionService.current(next)?.name ?? next.sessionId}\n`);
        return next;
      }

      case '\\rename_session':
        if (!argument) {
          this.errorOutput.write('Usage: \\rename_session <name>\n');
          return state;
        }
        this.sessionService.rename(state, argument);
        this.errorOutput.write(`Session renamed to ${argument}\n`);
        return state;

      default:
        this.errorOutput.write(`Unknown command ${command}. Type \\help for help.\n`);
        return state;
    }
  }

  shutdown(): void {
    this.interrupt();
    this.dbConnection?.close();
  }

  private openSession(sessionName?: string): ConversationState {
    if (sessionName) {
      return this.sessionService.resume(sessionName, this.config.defaultModel);
    }
    return this.config.cli.continueLast
      ? this.sessionService.resumeLast(this.config.defaultModel)
      : this.sessionService.start(this.config.defaultModel);
  }

  private printStatus(state: ConversationState): void {
    this.errorOutput.write(`Using model: ${state.modelName}. Context length: ${state.maxTokens}\n`);
  }

  private printError(error: ChatRelayError): void {
    logger.debug('Turn failed', { code: error.code, error: error.message });
    this.errorOutput.write(`\nError: ${error.message}\n`);
  }
}
