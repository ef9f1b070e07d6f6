import { ConversationState, HistoryEntry, Stage } from '../types/conversation';

export function createConversationState(sessionId: string, now: Date = new Date()): ConversationState {
  const timestamp = now.toISOString();
  return {
    session_id: sessionId,
    stage: { kind: 'AWAITING_INTENT' },
    pending_intent: null,
    collected_slots: {},
    history: [],
    last_reservation_id: null,
    created_at: timestamp,
    updated_at: timestamp,
  };
}

export function appendHistory(
  state: ConversationState,
  role: HistoryEntry['role'],
  text: string,
  now: Date = new Date()
): ConversationState {
  const at = now.toISOString();
  return {
    ...state,
    history: [...state.history, { role, text, at }],
    updated_at: at,
  };
}

/** Starts a fresh request in the same session. History survives. */
export function resetWorkflow(state: ConversationState): ConversationState {
  return {
    ...state,
    stage: { kind: 'AWAITING_INTENT' },
    pending_intent: null,
    collected_slots: {},
    last_reservation_id: null,
  };
}

export function isTerminal(stage: Stage): boolean {
  return stage.kind === 'COMPLETE' || stage.kind === 'ERROR';
}

export function describeStage(stage: Stage): string {
  switch (stage.kind) {
    case 'COLLECTING_BOOKING_SLOT':
    case 'COLLECTING_RESCHEDULE_SLOT':
      return `${stage.kind}(${stage.slot})`;
    default:
      return stage.kind;
  }
}

export function trimHistory(state: ConversationState, limit: number): ConversationState {
  if (state.history.length <= limit) return state;
  return { ...state, history: state.history.slice(-limit) };
}
