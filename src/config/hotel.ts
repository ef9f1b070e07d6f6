import { RoomType } from '../types/reservation';

export interface RoomTypeInfo {
  price: number;
  capacity: number;
}

export interface HotelProfile {
  name: string;
  location: string;
  amenities: string[];
  check_in_time: string;
  check_out_time: string;
  currency: string;
  room_types: Record<RoomType, RoomTypeInfo>;
}

export const HOTEL: HotelProfile = {
  name: 'Sunset Resort',
  location: 'Goa, India',
  amenities: ['pool', 'spa', 'restaurant', 'free Wi-Fi'],
  check_in_time: '2:00 PM',
  check_out_time: '11:00 AM',
  currency: 'INR',
  room_types: {
    standard: { price: 5000, capacity: 2 },
    deluxe: { price: 8000, capacity: 4 },
    suite: { price: 12000, capacity: 6 },
  },
};
