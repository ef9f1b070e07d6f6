import { z } from 'zod';
import { ROOM_TYPES } from '../types/reservation';
import { INTENTS } from '../types/conversation';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

// Key order here is the key order written to disk.
export const reservationSchema = z.object({
  id: z.string().min(1),
  guest_id: z.string().min(1),
  check_in: isoDate,
  check_out: isoDate,
  room_type: z.enum(ROOM_TYPES),
  guests: z.number().int().min(1),
  status: z.enum(['active', 'cancelled']),
  created_at: z.string(),
  updated_at: z.string(),
});

export const reservationDocumentSchema = z.object({
  reservations: z.record(reservationSchema),
});

export type ReservationDocument = z.infer<typeof reservationDocumentSchema>;

const stageSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('AWAITING_INTENT') }),
  z.object({ kind: z.literal('COLLECTING_BOOKING_SLOT'), slot: z.number().int().min(0) }),
  z.object({ kind: z.literal('COLLECTING_RESCHEDULE_SLOT'), slot: z.number().int().min(0) }),
  z.object({ kind: z.literal('ANSWERING_QUESTION') }),
  z.object({ kind: z.literal('COMPLETE') }),
  z.object({ kind: z.literal('ERROR') }),
]);

export const conversationStateSchema = z.object({
  session_id: z.string().min(1),
  stage: stageSchema,
  pending_intent: z.enum(INTENTS).nullable(),
  collected_slots: z.object({
    check_in: isoDate.optional(),
    check_out: isoDate.optional(),
    room_type: z.enum(ROOM_TYPES).optional(),
    guests: z.number().int().min(1).optional(),
    reservation_id: z.string().optional(),
    new_check_in: isoDate.optional(),
    new_check_out: isoDate.optional(),
  }),
  history: z.array(
    z.object({
      role: z.enum(['user', 'agent']),
      text: z.string(),
      at: z.string(),
    })
  ),
  last_reservation_id: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
