import { randomBytes } from 'crypto';
import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { ConversationState, Session } from '../../core/entities/Conversation.js';
import { BackendRegistry } from '../../core/registry/BackendRegistry.js';
import { ConfigError } from '../../core/errors.js';

/**
 * Service for managing chat sessions and the per-session conversation state
 */
export class SessionService {
  constructor(
    private conversationRepo: IConversationRepository,
    private registry: BackendRegistry
  ) {}

  /**
   * Create a new session, named by a random hash unless a name is given
   */
  start(modelName: string, name?: string): ConversationState {
    const config = this.registry.lookup(modelName);
    const sessionId = this.conversationRepo.createSession(name ?? randomHash());
    return { modelName, maxTokens: config.maxTokens, sessionId };
  }

  resume(name: string, modelName: string): ConversationState {
    const session = this.conversationRepo.findSession(name);
    if (!session) {
      throw new ConfigError(`No session named "${name}"`);
    }
    return this.stateFor(session, modelName);
  }

  /**
   * Continue the most recently created session, or start one if there is none
   */
  resumeLast(modelName: string): ConversationState {
    const session = this.conversationRepo.getLastSession();
    return session ? this.stateFor(session, modelName) : this.start(modelName);
  }

  /**
   * Same session, different model. The caller replaces its state with the result.
   */
  switchModel(state: ConversationState, modelName: string): ConversationState {
    const config = this.registry.lookup(modelName);
    return { ...state, modelName, maxTokens: config.maxTokens };
  }

  rename(state: ConversationState, name: string): void {
    const existing = this.conversationRepo.findSession(name);
    if (existing && existing.id !== state.sessionId) {
      throw new ConfigError(`A session named "${name}" already exists`);
    }
    this.conversationRepo.renameSession(state.sessionId, name);
  }

  current(state: ConversationState): Session | null {
    return this.conversationRepo.getSession(state.sessionId);
  }

  list(): Session[] {
    return this.conversationRepo.listSessions();
  }

  isFirstUse(): boolean {
    return this.conversationRepo.getLastSession() === null;
  }

  private stateFor(session: Session, modelName: string): ConversationState {
    const config = this.registry.lookup(modelName);
    return { modelName, maxTokens: config.maxTokens, sessionId: session.id };
  }
}

export function randomHash(bytes = 4): string {
  return randomBytes(bytes).toString('hex');
}
