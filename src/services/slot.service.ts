import { DateTime } from 'luxon';
import { HOTEL, HotelProfile } from '../config/hotel';
import { BookingSlot, CollectedSlots, RescheduleSlot, SlotName } from '../types/conversation';
import { isRoomType, ReservationStore, ROOM_TYPES } from '../types/reservation';
import { SLOT_PROMPTS } from '../utils/prompts';

export const BOOKING_SLOTS: readonly BookingSlot[] = ['check_in', 'check_out', 'room_type', 'guests'];

export const RESCHEDULE_SLOTS: readonly RescheduleSlot[] = ['reservation_id', 'new_check_in', 'new_check_out'];

export type SlotValidation = { ok: true; update: CollectedSlots } | { ok: false; error: string };

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Parses a strict `YYYY-MM-DD` calendar date, or returns null. */
export function parseIsoDate(input: string): string | null {
  const trimmed = input.trim();
  if (!ISO_DATE.test(trimmed)) return null;

  const date = DateTime.fromFormat(trimmed, 'yyyy-MM-dd', { zone: 'utc' });
  return date.isValid ? date.toISODate() : null;
}

export class SlotService {
  constructor(
    private store: ReservationStore,
    private hotel: HotelProfile = HOTEL
  ) {}

  prompt(slot: SlotName): string {
    return SLOT_PROMPTS[slot];
  }

  /**
   * Checks one answer against its slot. `collected` holds the slots already
   * validated in this workflow; cross-slot rules read from it.
   */
  async validate(slot: SlotName, input: string, collected: CollectedSlots): Promise<SlotValidation> {
    switch (slot) {
      case 'check_in':
      case 'new_check_in': {
        const date = parseIsoDate(input);
        if (!date) return invalidDate(input);
        return { ok: true, update: slot === 'check_in' ? { check_in: date } : { new_check_in: date } };
      }

      case 'check_out':
        return this.validateDeparture(input, collected.check_in, (date) => ({ check_out: date }));

      case 'new_check_out':
        return this.validateDeparture(input, collected.new_check_in, (date) => ({ new_check_out: date }));

      case 'room_type': {
        const roomType = input.trim().toLowerCase();
        if (!isRoomType(roomType)) {
          return {
            ok: false,
            error: `"${input.trim()}" is not a room type we offer. Valid options: ${ROOM_TYPES.join(', ')}.`,
          };
        }
        return { ok: true, update: { room_type: roomType } };
      }

      case 'guests': {
        const trimmed = input.trim();
        const guests = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
        if (!Number.isSafeInteger(guests) || guests < 1) {
          return { ok: false, error: 'Please enter the number of guests as a whole number of at least 1.' };
        }

        if (collected.room_type) {
          const { capacity } = this.hotel.room_types[collected.room_type];
          if (guests > capacity) {
            return {
              ok: false,
              error: `A ${collected.room_type} room holds up to ${capacity} guests. Please enter a smaller number.`,
            };
          }
        }
        return { ok: true, update: { guests } };
      }

      case 'reservation_id': {
        const id = input.trim();
        const reservation = id ? await this.store.get(id) : null;
        if (!reservation || reservation.status !== 'active') {
          return { ok: false, error: `Reservation "${id}" was not found.` };
        }
        return { ok: true, update: { reservation_id: reservation.id } };
      }
    }
  }

  private validateDeparture(
    input: string,
    arrival: string | undefined,
    toUpdate: (date: string) => CollectedSlots
  ): SlotValidation {
    const date = parseIsoDate(input);
    if (!date) return invalidDate(input);

    if (!arrival) {
      return { ok: false, error: 'A check-in date is needed before the check-out date.' };
    }

    // ISO dates order lexically.
    if (date <= arrival) {
      return { ok: false, error: `Check-out date must be after the check-in date (${arrival}).` };
    }
    return { ok: true, update: toUpdate(date) };
  }
}

function invalidDate(input: string): SlotValidation {
  return { ok: false, error: `"${input.trim()}" is not a valid date. Please use the format YYYY-MM-DD.` };
}
