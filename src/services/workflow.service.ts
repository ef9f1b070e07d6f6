import { v4 as uuidv4 } from 'uuid';
import { IntentClassifier, QuestionAnswerer } from '../types/agent';
import {
  CollectedSlots,
  ConversationState,
  HistoryEntry,
  Intent,
  SlotName,
  Stage,
  TurnResult,
} from '../types/conversation';
import { Reservation, ReservationStore } from '../types/reservation';
import { StoreWriteError, toError } from '../utils/errors';
import { logger } from '../utils/logger';
import { appendHistory, describeStage, isTerminal, resetWorkflow } from '../utils/conversationState';
import {
  CLARIFICATION_PROMPT,
  DEGRADED_SERVICE_NOTICE,
  formatBookingConfirmation,
  formatRescheduleConfirmation,
  STORE_FAILURE_REPLY,
  UNEXPECTED_ERROR_REPLY,
} from '../utils/prompts';
import { BOOKING_SLOTS, RESCHEDULE_SLOTS, SlotService } from './slot.service';

type Workflow = 'booking' | 'rescheduling';

interface WorkflowDefinition {
  stage: 'COLLECTING_BOOKING_SLOT' | 'COLLECTING_RESCHEDULE_SLOT';
  slots: readonly SlotName[];
}

const WORKFLOWS: Record<Workflow, WorkflowDefinition> = {
  booking: { stage: 'COLLECTING_BOOKING_SLOT', slots: BOOKING_SLOTS },
  rescheduling: { stage: 'COLLECTING_RESCHEDULE_SLOT', slots: RESCHEDULE_SLOTS },
};

const MAX_ID_ATTEMPTS = 5;

type Outcome = TurnResult;

type IntentHandler = (state: ConversationState, text: string, degraded: boolean) => Promise<Outcome>;

export interface WorkflowDeps {
  classifier: IntentClassifier;
  answerer: QuestionAnswerer;
  store: ReservationStore;
  slots?: SlotService;
  generateId?: () => string;
  now?: () => Date;
}

export function generateReservationId(): string {
  return `RSV-${uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

/**
 * The conversation state machine. Holds no per-session data: each call takes
 * the session's state and returns the next one together with the reply.
 */
export class WorkflowService {
  private classifier: IntentClassifier;
  private answerer: QuestionAnswerer;
  private store: ReservationStore;
  private slots: SlotService;
  private generateId: () => string;
  private now: () => Date;

  // Extending Intent requires an entry here.
  private readonly intentTransitions: Record<Intent, IntentHandler> = {
    booking: async (state) => this.startWorkflow(state, 'booking'),
    rescheduling: async (state) => this.startWorkflow(state, 'rescheduling'),
    question: async (state, text) => this.answerQuestion(state, text),
    unknown: async (state, _text, degraded) => ({
      state,
      reply: degraded ? `${DEGRADED_SERVICE_NOTICE} ${CLARIFICATION_PROMPT}` : CLARIFICATION_PROMPT,
    }),
  };

  constructor(deps: WorkflowDeps) {
    this.classifier = deps.classifier;
    this.answerer = deps.answerer;
    this.store = deps.store;
    this.slots = deps.slots ?? new SlotService(deps.store);
    this.generateId = deps.generateId ?? generateReservationId;
    this.now = deps.now ?? (() => new Date());
  }

  async processTurn(current: ConversationState, text: string): Promise<TurnResult> {
    const fresh = isTerminal(current.stage) ? resetWorkflow(current) : current;
    const priorHistory = fresh.history;
    const inbound = appendHistory(fresh, 'user', text, this.now());

    let outcome: Outcome;
    try {
      outcome = await this.dispatch(inbound, text, priorHistory);
    } catch (error: unknown) {
      logger.error('Turn failed', {
        sessionId: current.session_id,
        stage: describeStage(inbound.stage),
        error: toError(error).message,
      });
      outcome = { state: { ...inbound, stage: { kind: 'ERROR' } }, reply: UNEXPECTED_ERROR_REPLY };
    }

    const state = appendHistory(outcome.state, 'agent', outcome.reply, this.now());

    logger.info('Turn processed', {
      sessionId: state.session_id,
      from: describeStage(current.stage),
      to: describeStage(state.stage),
      intent: state.pending_intent,
    });

    return { state, reply: outcome.reply };
  }

  private async dispatch(state: ConversationState, text: string, history: HistoryEntry[]): Promise<Outcome> {
    const { stage } = state;

    switch (stage.kind) {
      case 'AWAITING_INTENT':
      case 'COMPLETE':
      case 'ERROR':
      // answerQuestion always ends in COMPLETE, so this is never saved; a stray one is a new request.
      case 'ANSWERING_QUESTION': {
        const { intent, degraded } = await this.classifier.classify(text, history);
        const handler = this.intentTransitions[intent];
        return handler({ ...state, stage: { kind: 'AWAITING_INTENT' }, pending_intent: intent }, text, degraded);
      }

      case 'COLLECTING_BOOKING_SLOT':
        return this.collectSlot(state, 'booking', stage.slot, text);

      case 'COLLECTING_RESCHEDULE_SLOT':
        return this.collectSlot(state, 'rescheduling', stage.slot, text);

    }
  }

  private startWorkflow(state: ConversationState, workflow: Workflow): Outcome {
    const { stage, slots } = WORKFLOWS[workflow];
    return {
      state: { ...state, stage: { kind: stage, slot: 0 }, collected_slots: {} },
      reply: this.slots.prompt(slots[0]),
    };
  }

  private async answerQuestion(state: ConversationState, text: string): Promise<Outcome> {
    const answering: ConversationState = { ...state, stage: { kind: 'ANSWERING_QUESTION' } };
    const reply = await this.answerer.answer(text);
    return { state: { ...answering, stage: { kind: 'COMPLETE' } }, reply };
  }

  private async collectSlot(
    state: ConversationState,
    workflow: Workflow,
    index: number,
    text: string
  ): Promise<Outcome> {
    const definition = WORKFLOWS[workflow];
    const slot = definition.slots[index];
    if (!slot) {
      throw new Error(`No slot ${index} in ${workflow} workflow`);
    }

    const result = await this.slots.validate(slot, text, state.collected_slots);
    if (!result.ok) {
      logger.debug('Slot rejected', { sessionId: state.session_id, slot });
      return { state, reply: `${result.error} ${this.slots.prompt(slot)}` };
    }

    const collected: CollectedSlots = { ...state.collected_slots, ...result.update };
    const nextSlot = definition.slots[index + 1];

    if (nextSlot) {
      const stage: Stage = { kind: definition.stage, slot: index + 1 };
      return { state: { ...state, stage, collected_slots: collected }, reply: this.slots.prompt(nextSlot) };
    }

    try {
      return workflow === 'booking'
        ? await this.finalizeBooking(state, collected)
        : await this.finalizeReschedule(state, collected);
    } catch (error: unknown) {
      if (error instanceof StoreWriteError) {
        logger.error('Reservation write failed, staying on last slot', {
          sessionId: state.session_id,
          workflow,
          error: error.message,
        });
        return { state, reply: STORE_FAILURE_REPLY };
      }
      throw error;
    }
  }

  private async finalizeBooking(state: ConversationState, collected: CollectedSlots): Promise<Outcome> {
    const { check_in, check_out, room_type, guests } = collected;
    if (!check_in || !check_out || !room_type || guests === undefined) {
      throw new Error('Booking finalized with missing slots');
    }

    const timestamp = this.now().toISOString();
    const reservation: Reservation = {
      id: await this.allocateId(),
      guest_id: state.session_id,
      check_in,
      check_out,
      room_type,
      guests,
      status: 'active',
      created_at: timestamp,
      updated_at: timestamp,
    };

    await this.store.put(reservation);

    return {
      state: { ...state, stage: { kind: 'COMPLETE' }, collected_slots: collected, last_reservation_id: reservation.id },
      reply: formatBookingConfirmation(reservation),
    };
  }

  private async finalizeReschedule(state: ConversationState, collected: CollectedSlots): Promise<Outcome> {
    const { reservation_id, new_check_in, new_check_out } = collected;
    if (!reservation_id || !new_check_in || !new_check_out) {
      throw new Error('Reschedule finalized with missing slots');
    }

    const updated = await this.store.update(
      reservation_id,
      { check_in: new_check_in, check_out: new_check_out },
      { expectStatus: 'active' }
    );
    if (!updated) {
      // Removed or cancelled after the id was accepted; ask for it again.
      return {
        state: { ...state, stage: { kind: 'COLLECTING_RESCHEDULE_SLOT', slot: 0 }, collected_slots: {} },
        reply: `Reservation "${reservation_id}" was not found. ${this.slots.prompt('reservation_id')}`,
      };
    }

    return {
      state: { ...state, stage: { kind: 'COMPLETE' }, collected_slots: collected, last_reservation_id: reservation_id },
      reply: formatRescheduleConfirmation(reservation_id, new_check_in, new_check_out),
    };
  }

  private async allocateId(): Promise<string> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateId();
      if (!(await this.store.get(id))) return id;
    }
    throw new StoreWriteError('Could not allocate a unique reservation id');
  }
}
