import { SessionStore } from './session.adapter';
import { InMemorySessionStore } from './memory.adapter';
import { RedisSessionStore } from './redis.adapter';

export interface SessionConfig {
  provider: 'memory' | 'redis';
  ttlSeconds: number;
}

export class SessionFactory {
  static create(config: SessionConfig): SessionStore {
    switch (config.provider) {
      case 'memory':
        return new InMemorySessionStore();
      case 'redis':
        return new RedisSessionStore(config.ttlSeconds);
      default:
        throw new Error(`Unsupported session store: ${String(config.provider)}`);
    }
  }
}
