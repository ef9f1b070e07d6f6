export const ROOM_TYPES = ['standard', 'deluxe', 'suite'] as const;

export type RoomType = (typeof ROOM_TYPES)[number];

export type ReservationStatus = 'active' | 'cancelled';

export interface Reservation {
  id: string;
  /** Session that made the booking; for SMS this is the guest's phone number. */
  guest_id: string;
  check_in: string;
  check_out: string;
  room_type: RoomType;
  guests: number;
  status: ReservationStatus;
  created_at: string;
  updated_at: string;
}

export type ReservationUpdate = Partial<Pick<Reservation, 'check_in' | 'check_out' | 'status'>>;

export interface UpdateOptions {
  expectStatus?: ReservationStatus;
}

/**
 * Durable reservation storage. Mutations resolve only after the change is
 * flushed to the backing medium.
 */
export interface ReservationStore {
  get(id: string): Promise<Reservation | null>;
  put(reservation: Reservation): Promise<string>;
  /**
   * Resolves `false` when no record has the given id, or when
   * `expectStatus` is set and the record's status differs.
   */
  update(id: string, fields: ReservationUpdate, options?: UpdateOptions): Promise<boolean>;
  list(): Promise<Reservation[]>;
}

export function isRoomType(value: string): value is RoomType {
  return ROOM_TYPES.some((type) => type === value);
}
