/**
 * Travel planner.
 *
 * Three agents build a plan (destination, itinerary, local recommendations),
 * the plan is published as custom status, and the instance waits for a
 * human decision on `approval_event` before booking.
 */

import { z } from 'zod';
import { AgentNames } from '../agent/index.js';
import type { OrchestrationContext, Task } from '../orchestrator/index.js';
import { bookingSchema, type Booking } from './activities.js';

export const APPROVAL_EVENT = 'approval_event';
export const BOOK_TRAVEL_ACTIVITY = 'book_travel';

export const travelRequestSchema = z.object({
  specialRequirements: z.string().default(''),
  durationInDays: z.number().int().positive().default(3),
  budget: z.string().default('$1000'),
  travelDates: z.string().default('TBD'),
});

export type TravelRequest = z.infer<typeof travelRequestSchema>;

const destinationSchema = z
  .object({
    destination_name: z.string().min(1),
    description: z.string().optional(),
    reasoning: z.string().optional(),
    match_score: z.number().optional(),
  })
  .passthrough();

const destinationsSchema = z.object({
  recommendations: z.array(destinationSchema),
});

// Itinerary and recommendations are passed through as the agents wrote them
const agentDocumentSchema = z.record(z.unknown());

export type Destination = z.infer<typeof destinationSchema>;

export type ApprovalStatus = 'pending' | 'approved' | 'rejected';

export interface TravelPlan {
  destination: Destination;
  itinerary: Record<string, unknown>;
  local_recommendations: Record<string, unknown>;
  approval_status: ApprovalStatus;
  booking_details?: Booking;
}

/**
 * Parse a JSON reply, tolerating a surrounding markdown code fence.
 */
export function parseAgentJson<T>(agentName: string, text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const fenced = /^\s*```(?:json)?\s*([\s\S]*?)\s*```\s*$/.exec(text);
  const body = fenced?.[1] ?? text;

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new Error(`${agentName} did not reply with JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return schema.parse(data);
}

export function* travelPlanner(ctx: OrchestrationContext): Generator<Task<unknown>, TravelPlan, unknown> {
  const request = ctx.getInput(travelRequestSchema);

  const destinationsText = yield* ctx.callAgent(AgentNames.DESTINATION_EXPERT, request.specialRequirements);
  const { recommendations } = parseAgentJson(AgentNames.DESTINATION_EXPERT, destinationsText, destinationsSchema);
  const destination = recommendations[0];
  if (!destination) {
    throw new Error(`${AgentNames.DESTINATION_EXPERT} recommended no destinations`);
  }

  const itineraryText = yield* ctx.callAgent(AgentNames.ITINERARY_PLANNER, {
    destination_name: destination.destination_name,
    duration_in_days: request.durationInDays,
    budget: request.budget,
    travel_dates: request.travelDates,
    special_requirements: request.specialRequirements,
  });
  const itinerary = parseAgentJson(AgentNames.ITINERARY_PLANNER, itineraryText, agentDocumentSchema);

  const localText = yield* ctx.callAgent(AgentNames.LOCAL_RECOMMENDATIONS, {
    destination_name: destination.destination_name,
    duration_in_days: request.durationInDays,
    preferred_cuisine: 'Any',
    include_hidden_gems: true,
    family_friendly: true,
  });
  const localRecommendations = parseAgentJson(AgentNames.LOCAL_RECOMMENDATIONS, localText, agentDocumentSchema);

  const plan: TravelPlan = {
    destination,
    itinerary,
    local_recommendations: localRecommendations,
    approval_status: 'pending',
  };
  ctx.setCustomStatus(plan);

  const decision = yield* ctx.waitForEvent(APPROVAL_EVENT);
  if (decision !== 'approved') {
    return { ...plan, approval_status: 'rejected' };
  }

  const booking = yield* ctx.callActivity(BOOK_TRAVEL_ACTIVITY, plan, bookingSchema);
  return { ...plan, booking_details: booking, approval_status: 'approved' };
}
