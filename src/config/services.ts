import path from 'path';
import { AgentService } from '../services/agent.service';
import { AnthropicService } from '../services/anthropic.service';
import { AnswerService } from '../services/answer.service';
import { ClassifierService } from '../services/classifier.service';
import { DeliverySink } from '../services/delivery/delivery.adapter';
import { DeliveryFactory } from '../services/delivery/delivery.factory';
import { JsonFileReservationStore } from '../services/reservation.store';
import { SessionFactory } from '../services/session/session.factory';
import { WorkflowService } from '../services/workflow.service';
import { Channel } from '../types/agent';
import { ReservationStore } from '../types/reservation';
import { env } from './env';

let reservationStore: ReservationStore | null = null;
let agentService: AgentService | null = null;
const sinks = new Map<Channel, DeliverySink>();

function sinkFor(channel: Channel): DeliverySink {
  let sink = sinks.get(channel);
  if (!sink) {
    sink = DeliveryFactory.create(channel, {
      accountSid: env.TWILIO_ACCOUNT_SID,
      authToken: env.TWILIO_AUTH_TOKEN,
      fromNumber: env.TWILIO_PHONE_NUMBER,
    });
    sinks.set(channel, sink);
  }
  return sink;
}

export function getReservationStore(): ReservationStore {
  if (!reservationStore) {
    reservationStore = new JsonFileReservationStore(path.resolve(env.RESERVATIONS_FILE));
  }
  return reservationStore;
}

export function getAgentService(): AgentService {
  if (!agentService) {
    const llm = new AnthropicService();
    const store = getReservationStore();

    agentService = new AgentService({
      workflow: new WorkflowService({
        classifier: new ClassifierService(llm),
        answerer: new AnswerService(llm),
        store,
      }),
      sessions: SessionFactory.create({ provider: env.SESSION_STORE, ttlSeconds: env.SESSION_TTL_SECONDS }),
      sinkFor,
      historyLimit: env.HISTORY_LIMIT,
    });
  }
  return agentService;
}
