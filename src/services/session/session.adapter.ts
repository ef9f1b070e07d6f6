import { ConversationState } from '../../types/conversation';

export interface SessionStore {
  get(sessionId: string): Promise<ConversationState | null>;
  save(state: ConversationState): Promise<void>;
  delete(sessionId: string): Promise<void>;
}
