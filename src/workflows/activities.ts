import { createHash } from 'node:crypto';
import { z } from 'zod';

export const bookingSchema = z.object({
  booked: z.boolean(),
  booking_id: z.string(),
  status: z.string(),
  message: z.string(),
});

export type Booking = z.infer<typeof bookingSchema>;

/**
 * Confirms a travel booking. The booking id is derived from the plan, so the
 * same plan always books under the same id.
 */
export function bookTravel(plan: unknown): Booking {
  const digest = createHash('sha256').update(JSON.stringify(plan ?? null)).digest('hex');
  const suffix = (parseInt(digest.slice(0, 8), 16) % 10000).toString().padStart(4, '0');

  return {
    booked: true,
    booking_id: `TRV-${suffix}`,
    status: 'confirmed',
    message: 'Travel booking confirmed successfully',
  };
}
