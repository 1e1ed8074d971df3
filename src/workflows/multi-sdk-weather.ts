import { z } from 'zod';
import { AgentNames } from '../agent/index.js';
import type { OrchestrationContext, Task } from '../orchestrator/index.js';

export const weatherRequestSchema = z.object({
  city1: z.string().min(1),
  city2: z.string().min(1),
});

export interface WeatherReport {
  city1_weather: string;
  city2_weather: string;
}

/**
 * Asks two agents of different kinds for the weather in two cities at once.
 */
export function* multiSdkWeather(ctx: OrchestrationContext): Generator<Task<unknown>, WeatherReport, unknown> {
  const { city1, city2 } = ctx.getInput(weatherRequestSchema);

  const first = ctx.callAgent(AgentNames.OPENAI_WEATHER, `Current weather in ${city1}`);
  const second = ctx.callAgent(AgentNames.TRANSCRIPT_WEATHER, `Current weather in ${city2}`);
  yield* ctx.all([first, second]);

  return {
    city1_weather: yield* first,
    city2_weather: yield* second,
  };
}
