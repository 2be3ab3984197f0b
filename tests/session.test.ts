/**
 * Tests for session management
 */

import { SessionService, randomHash } from '../src/application/services/SessionService.js';
import { BackendRegistry } from '../src/core/registry/BackendRegistry.js';
import { ConfigError } from '../src/core/errors.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from '../src/infrastructure/database/repositories/ConversationRepository.js';

const registry = new BackendRegistry({
  'gpt-4o': { backend: 'openai', maxTokens: 8000 },
  sonnet: { backend: 'anthropic', maxTokens: 100000 },
});

describe('SessionService', () => {
  let connection: DatabaseConnection;
  let repo: ConversationRepository;
  let sessions: SessionService;

  beforeEach(() => {
    connection = new DatabaseConnection(':memory:');
    repo = new ConversationRepository(connection.getDatabase());
    sessions = new SessionService(repo, registry);
  });

  afterEach(() => {
    connection.close();
  });

  test('should start a named session', () => {
    const state = sessions.start('gpt-4o', 'main');

    expect(state).toEqual({ modelName: 'gpt-4o', maxTokens: 8000, sessionId: 1 });
    expect(sessions.current(state)?.name).toBe('main');
  });

  test('should name an unnamed session with a random hash', () => {
    const state = sessions.start('gpt-4o');
    expect(sessions.current(state)?.name).toMatch(/^[0-9a-f]{8}$/);
    expect(randomHash(2)).toMatch(/^[0-9a-f]{4}$/);
  });

  test('should resume a session by name', () => {
    const started = sessions.start('gpt-4o', 'main');
    sessions.start('gpt-4o', 'other');

    expect(sessions.resume('main', 'sonnet')).toEqual({
      modelName: 'sonnet',
      maxTokens: 100000,
      sessionId: started.sessionId,
    });
  });

  test('should fail to resume an unknown session', () => {
    expect(() => sessions.resume('ghost', 'gpt-4o')).toThrow(new ConfigError('No session named "ghost"'));
  });

  test('should resume the last session, or start one', () => {
    expect(sessions.isFirstUse()).toBe(true);

    const first = sessions.resumeLast('gpt-4o');
    expect(sessions.isFirstUse()).toBe(false);
    expect(sessions.resumeLast('gpt-4o').sessionId).toBe(first.sessionId);
  });

  test('should switch model within the same session', () => {
    const state = sessions.start('gpt-4o', 'main');

    expect(sessions.switchModel(state, 'sonnet')).toEqual({
      modelName: 'sonnet',
      maxTokens: 100000,
      sessionId: state.sessionId,
    });
    expect(() => sessions.switchModel(state, 'nope')).toThrow(ConfigError);
  });

  test('should rename a session unless the name is taken', () => {
    const state = sessions.start('gpt-4o', 'main');
    sessions.start('gpt-4o', 'taken');

    expect(() => sessions.rename(state, 'taken')).toThrow('A session named "taken" already exists');

    sessions.rename(state, 'main');
    sessions.rename(state, 'renamed');
    expect(sessions.list().map((session) => session.name).sort()).toEqual(['renamed', 'taken']);
  });
});
