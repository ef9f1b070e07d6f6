import { RoomType } from './reservation';

export const INTENTS = ['booking', 'rescheduling', 'question', 'unknown'] as const;

export type Intent = (typeof INTENTS)[number];

export type Stage =
  | { kind: 'AWAITING_INTENT' }
  | { kind: 'COLLECTING_BOOKING_SLOT'; slot: number }
  | { kind: 'COLLECTING_RESCHEDULE_SLOT'; slot: number }
  | { kind: 'ANSWERING_QUESTION' }
  | { kind: 'COMPLETE' }
  | { kind: 'ERROR' };

export type StageKind = Stage['kind'];

export interface CollectedSlots {
  check_in?: string;
  check_out?: string;
  room_type?: RoomType;
  guests?: number;
  reservation_id?: string;
  new_check_in?: string;
  new_check_out?: string;
}

export type SlotName = keyof CollectedSlots;

export type BookingSlot = Extract<SlotName, 'check_in' | 'check_out' | 'room_type' | 'guests'>;

export type RescheduleSlot = Extract<SlotName, 'reservation_id' | 'new_check_in' | 'new_check_out'>;

export interface HistoryEntry {
  role: 'user' | 'agent';
  text: string;
  at: string;
}

export interface ConversationState {
  session_id: string;
  stage: Stage;
  pending_intent: Intent | null;
  collected_slots: CollectedSlots;
  history: HistoryEntry[];
  last_reservation_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface TurnResult {
  state: ConversationState;
  reply: string;
}

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}
