import { AgentResponse, Channel, IncomingMessage } from '../types/agent';
import { createConversationState, describeStage, trimHistory } from '../utils/conversationState';
import { toError } from '../utils/errors';
import { logger } from '../utils/logger';
import { KeyedMutex } from '../utils/mutex';
import { DeliverySink } from './delivery/delivery.adapter';
import { SessionStore } from './session/session.adapter';
import { WorkflowService } from './workflow.service';

export interface AgentServiceDeps {
  workflow: WorkflowService;
  sessions: SessionStore;
  sinkFor: (channel: Channel) => DeliverySink;
  historyLimit: number;
}

/**
 * Host side of a conversation turn: loads the session, runs the state
 * machine, persists the new state and delivers the reply. Turns of one
 * session never overlap; different sessions run independently.
 */
export class AgentService {
  private turnLocks = new KeyedMutex();

  constructor(private deps: AgentServiceDeps) {}

  async handleMessage(incoming: IncomingMessage): Promise<AgentResponse> {
    const { session_id, message, channel } = incoming;

    return this.turnLocks.runExclusive(session_id, async () => {
      try {
        const current = (await this.deps.sessions.get(session_id)) ?? createConversationState(session_id);

        const { state, reply } = await this.deps.workflow.processTurn(current, message);
        await this.deps.sessions.save(trimHistory(state, this.deps.historyLimit));

        const delivered = await this.deliver(channel, session_id, reply);

        logger.info('Message handled', {
          sessionId: session_id,
          channel,
          stage: describeStage(state.stage),
          delivered,
        });

        return {
          success: state.stage.kind !== 'ERROR',
          session_id,
          response: reply,
          stage: describeStage(state.stage),
          reservation_id: state.last_reservation_id,
          delivered,
        };
      } catch (error: unknown) {
        logger.error('Failed to handle message', {
          sessionId: session_id,
          channel,
          error: toError(error).message,
        });

        throw error;
      }
    });
  }

  async resetSession(sessionId: string): Promise<void> {
    await this.turnLocks.runExclusive(sessionId, () => this.deps.sessions.delete(sessionId));
    logger.info('Session reset', { sessionId });
  }

  private async deliver(channel: Channel, sessionId: string, text: string): Promise<boolean> {
    const sink = this.deps.sinkFor(channel);
    try {
      await sink.send(sessionId, text);
      return true;
    } catch (error: unknown) {
      logger.error('Delivery failed', { sessionId, provider: sink.provider, error: toError(error).message });
      return false;
    }
  }
}
