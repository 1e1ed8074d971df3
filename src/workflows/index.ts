/**
 * Bundled workflows and the activities they call.
 */

import type { OrchestrationRegistry } from '../orchestrator/index.js';
import { bookTravel } from './activities.js';
import { agentRun } from './agent-run.js';
import { multiSdkWeather } from './multi-sdk-weather.js';
import { multilingualWriter } from './multilingual-writer.js';
import { BOOK_TRAVEL_ACTIVITY, travelPlanner } from './travel-planner.js';

export const OrchestrationNames = {
  AGENT_RUN: 'agent_run',
  MULTILINGUAL_WRITER: 'multilingual_writer',
  TRAVEL_PLANNER: 'travel_planner',
  MULTI_SDK_WEATHER: 'multi_sdk_weather',
} as const;

export type OrchestrationName = (typeof OrchestrationNames)[keyof typeof OrchestrationNames];

export function registerWorkflows(registry: OrchestrationRegistry): OrchestrationRegistry {
  return registry
    .registerOrchestration(OrchestrationNames.AGENT_RUN, agentRun)
    .registerOrchestration(OrchestrationNames.MULTILINGUAL_WRITER, multilingualWriter)
    .registerOrchestration(OrchestrationNames.TRAVEL_PLANNER, travelPlanner)
    .registerOrchestration(OrchestrationNames.MULTI_SDK_WEATHER, multiSdkWeather)
    .registerActivity(BOOK_TRAVEL_ACTIVITY, bookTravel);
}

export { agentRun, agentRunInputSchema, type AgentRunInput } from './agent-run.js';
export { multilingualWriter, type MultilingualText } from './multilingual-writer.js';
export { multiSdkWeather, weatherRequestSchema, type WeatherReport } from './multi-sdk-weather.js';
export {
  APPROVAL_EVENT,
  BOOK_TRAVEL_ACTIVITY,
  parseAgentJson,
  travelPlanner,
  travelRequestSchema,
  type ApprovalStatus,
  type Destination,
  type TravelPlan,
  type TravelRequest,
} from './travel-planner.js';
export { bookTravel, bookingSchema, type Booking } from './activities.js';
