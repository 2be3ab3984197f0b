import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { ConversationState, Message, TurnStatus } from '../../core/entities/Conversation.js';
import { BackendRegistry } from '../../core/registry/BackendRegistry.js';
import { messageTokens } from '../../core/windowing/PromptWindower.js';
import { FragmentStream } from '../../core/stream/FragmentStream.js';
import { MessageTooLongError, StreamCancelledError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { ChatDispatcher } from './ChatDispatcher.js';

const logger = createLogger('conversation');

const DAY_MS = 24 * 60 * 60 * 1000;
const ECHOED_ROLE_PREFIX = 'assistant:';

export interface ConversationServiceOptions {
  /** How far back recent entries are read from storage */
  historyWindowDays: number;
  now?: () => Date;
}

interface TurnSteps {
  /** Persist the user message and read back the recent history */
  begin(): Message[];
  open(history: Message[]): FragmentStream;
  commit(response: string): void;
}

/**
 * One user-message-in, assistant-message-out cycle.
 *
 * Iterate it to receive fragments. The assistant message is persisted only
 * when the stream runs to completion; on error or early exit the fragments
 * already handed out stay handed out but nothing is stored for them.
 */
export class ChatTurn implements AsyncIterable<string> {
  private currentStatus: TurnStatus = 'idle';
  private text = '';
  private stream: FragmentStream | null = null;
  private closeRequested = false;

  constructor(private readonly steps: TurnSteps) {}

  get status(): TurnStatus {
    return this.currentStatus;
  }

  /**
   * Text received so far
   */
  get response(): string {
    return this.text;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.currentStatus !== 'idle') {
      throw new Error('A turn can only be consumed once');
    }

    try {
      this.currentStatus = 'windowing';
      const history = this.steps.begin();

      this.currentStatus = 'dispatching';
      const stream = this.steps.open(history);
      this.stream = stream;
      if (this.closeRequested) {
        stream.close();
      }

      this.currentStatus = 'streaming';
      for await (const fragment of stream) {
        this.text += fragment;
        yield fragment;
      }

      this.steps.commit(this.text);
      this.currentStatus = 'completed';
    } finally {
      if (this.currentStatus !== 'completed') {
        this.currentStatus = 'failed';
        this.stream?.close();
      }
    }
  }

  /**
   * Abandon the turn; a pending read rejects with StreamCancelledError
   */
  close(): void {
    this.closeRequested = true;
    this.stream?.close();
  }

  /**
   * Consume the turn and return the full response
   */
  async collect(): Promise<string> {
    const fragments: string[] = [];
    for await (const fragment of this) {
      fragments.push(fragment);
    }
    return fragments.join('');
  }
}

/**
 * Drives conversation turns against the storage collaborator
 */
export class ConversationService {
  private readonly now: () => Date;

  constructor(
    private readonly conversationRepo: IConversationRepository,
    private readonly dispatcher: ChatDispatcher,
    private readonly registry: BackendRegistry,
    private readonly options: ConversationServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Start a turn. Throws MessageTooLongError before anything is stored when
   * the message alone, costed as the windower costs it, is over the model's budget.
   */
  send(state: ConversationState, userMessage: string): ChatTurn {
    const estimated = messageTokens({ role: 'user', content: userMessage });
    if (estimated > state.maxTokens) {
      throw new MessageTooLongError(estimated, state.maxTokens);
    }

    const config = this.registry.lookup(state.modelName);

    return new ChatTurn({
      begin: () => {
        this.conversationRepo.append('user', userMessage, state.sessionId);
        return this.getRecentHistory(state.sessionId);
      },
      open: (history) => this.dispatcher.respond(history, state.modelName),
      commit: (response) => {
        const content =
          config.backendKind === 'ollama' ? stripEchoedRole(response) : response;
        this.conversationRepo.append('assistant', content, state.sessionId, state.modelName);
        logger.debug('Turn completed', {
          session: state.sessionId,
          model: state.modelName,
          characters: content.length,
        });
      },
    });
  }

  /**
   * Entries inside the lookback window, oldest first
   */
  getRecentHistory(sessionId: number): Message[] {
    const since = new Date(this.now().getTime() - this.options.historyWindowDays * DAY_MS);
    return this.conversationRepo
      .recentEntries(sessionId, since)
      .map((entry) => ({ role: entry.role, content: entry.content }));
  }
}

/**
 * A flattened transcript invites the model to answer with "assistant: ..."
 */
export function stripEchoedRole(response: string): string {
  return response.startsWith(ECHOED_ROLE_PREFIX)
    ? response.slice(ECHOED_ROLE_PREFIX.length).trim()
    : response;
}

export function isCancellation(error: unknown): boolean {
  return error instanceof StreamCancelledError;
}
