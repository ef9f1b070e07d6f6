import { ConversationState } from '../../types/conversation';
import { SessionStore } from './session.adapter';

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, ConversationState>();

  async get(sessionId: string): Promise<ConversationState | null> {
    return this.sessions.get(sessionId) || null;
  }

  async save(state: ConversationState): Promise<void> {
    this.sessions.set(state.session_id, state);
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
