import { describe, it, expect } from 'vitest';
import { bookTravel, bookingSchema } from '../src/workflows/index.js';

describe('bookTravel', () => {
  it('should confirm a booking under an id derived from the plan', () => {
    expect(bookTravel({ a: 1 })).toEqual({
      booked: true,
      booking_id: 'TRV-3967',
      status: 'confirmed',
      message: 'Travel booking confirmed successfully',
    });
  });

  it('should book the same plan under the same id', () => {
    expect(bookTravel({ a: 1 }).booking_id).toBe(bookTravel({ a: 1 }).booking_id);
    expect(bookTravel(null).booking_id).toBe('TRV-0936');
    expect(bookTravel(undefined).booking_id).toBe('TRV-0936');
  });

  it('should produce a valid booking', () => {
    expect(bookingSchema.safeParse(bookTravel({ destination: 'Lisbon' })).success).toBe(true);
  });
});
