import { getRedis } from '../../config/redis';
import { ConversationState } from '../../types/conversation';
import { toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { conversationStateSchema } from '../../utils/schemas';
import { SessionStore } from './session.adapter';

const KEY_PREFIX = 'session:';

export class RedisSessionStore implements SessionStore {
  constructor(private ttlSeconds: number) {}

  async get(sessionId: string): Promise<ConversationState | null> {
    const data = await getRedis().get(`${KEY_PREFIX}${sessionId}`);
    if (!data) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error: unknown) {
      logger.warn('Discarding unreadable session', { sessionId, error: toError(error).message });
      return null;
    }

    const parsed = conversationStateSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Discarding malformed session', { sessionId, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async save(state: ConversationState): Promise<void> {
    await getRedis().set(`${KEY_PREFIX}${state.session_id}`, JSON.stringify(state), { EX: this.ttlSeconds });
  }

  async delete(sessionId: string): Promise<void> {
    await getRedis().del(`${KEY_PREFIX}${sessionId}`);
  }
}
