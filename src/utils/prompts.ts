import { HOTEL, HotelProfile } from '../config/hotel';
import { HistoryEntry, SlotName } from '../types/conversation';
import { Reservation, ROOM_TYPES } from '../types/reservation';

const CLASSIFIER_PROMPT = `You route messages for a hotel booking assistant.

Classify the guest's latest message as exactly one of:
- booking: the guest wants to book a new room
- rescheduling: the guest wants to change the dates of an existing reservation
- question: the guest is asking about the hotel (amenities, times, rooms, prices, location)
- unknown: none of the above, or too unclear to tell

Reply with the single label only, in lower case, with no other text.`;

const BASE_ANSWER_PROMPT = `You are a hotel booking assistant. Answer guest questions about the hotel.

RULES:
- Be concise and friendly
- Only use the hotel facts given below; if the answer is not there, say you don't know and offer to help with a booking
- Never invent prices, availability or policies
- Do not take bookings in your answer; the guest can say "book a room" to start one`;

export const SLOT_PROMPTS: Record<SlotName, string> = {
  check_in: 'Please provide check-in date (YYYY-MM-DD).',
  check_out: 'Please provide check-out date (YYYY-MM-DD).',
  room_type: `Please choose a room type: ${ROOM_TYPES.join(', ')}.`,
  guests: 'How many guests?',
  reservation_id: 'Please provide your reservation ID.',
  new_check_in: 'Please provide new check-in date (YYYY-MM-DD).',
  new_check_out: 'Please provide new check-out date (YYYY-MM-DD).',
};

export const CLARIFICATION_PROMPT =
  'I can help you book a room, reschedule an existing reservation, or answer questions about the hotel. What would you like to do?';

export const DEGRADED_SERVICE_NOTICE = "Sorry, I'm having trouble understanding requests right now.";

export const STORE_FAILURE_REPLY =
  "Sorry, we couldn't save your reservation just now. Please send your last answer again to retry.";

export const UNEXPECTED_ERROR_REPLY = 'Sorry, something went wrong. Please try again.';

export const ANSWER_FALLBACK = "Sorry, I can't answer that right now. Please try again in a moment.";

export function buildClassifierPrompt(): string {
  return CLASSIFIER_PROMPT;
}

export function buildClassificationRequest(text: string, history: HistoryEntry[]): string {
  const recent = history.slice(-6);
  if (recent.length === 0) {
    return `Guest message: ${text}`;
  }

  const transcript = recent.map((entry) => `${entry.role === 'user' ? 'Guest' : 'Assistant'}: ${entry.text}`).join('\n');
  return `Recent conversation:\n${transcript}\n\nGuest message: ${text}`;
}

export function buildAnswerSystemPrompt(hotel: HotelProfile = HOTEL): string {
  const rooms = ROOM_TYPES.map((type) => {
    const info = hotel.room_types[type];
    return `- ${type}: ${hotel.currency} ${info.price} per night, up to ${info.capacity} guests`;
  });

  const facts = [
    `Name: ${hotel.name}`,
    `Location: ${hotel.location}`,
    `Amenities: ${hotel.amenities.join(', ')}`,
    `Check-in time: ${hotel.check_in_time}`,
    `Check-out time: ${hotel.check_out_time}`,
    `Room types:\n${rooms.join('\n')}`,
  ];

  return `${BASE_ANSWER_PROMPT}\n\nHOTEL INFO:\n${facts.join('\n')}`;
}

export function formatBookingConfirmation(reservation: Reservation): string {
  const guests = `${reservation.guests} guest${reservation.guests === 1 ? '' : 's'}`;
  return (
    `Booking confirmed! Reservation ID: ${reservation.id}. ` +
    `Room: ${reservation.room_type}, ${guests}, check-in ${reservation.check_in}, check-out ${reservation.check_out}.`
  );
}

export function formatRescheduleConfirmation(id: string, checkIn: string, checkOut: string): string {
  return `Reservation updated successfully! Reservation ID: ${id}. New check-in ${checkIn}, new check-out ${checkOut}.`;
}
