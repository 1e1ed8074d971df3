/**
 * Default agent catalog.
 *
 * Registers the agents used by the bundled workflows. The weather agents
 * attach the weather MCP server only when a URL is configured.
 */

import { Agent, MCPServerStreamableHttp, type MCPServer } from '@openai/agents';
import { openai } from '@ai-sdk/openai';
import type { DurableAgentsConfig } from '../config/index.js';
import { defineOpenAIAgent } from './openai-agents-runner.js';
import { defineTranscriptAgent } from './transcript-runner.js';
import { AgentRegistry } from './registry.js';
import {
  CONCISE_WEATHER_PROMPT,
  DESTINATION_PROMPT,
  FRENCH_TRANSLATOR_PROMPT,
  HAIKU_PROMPT,
  ITINERARY_PROMPT,
  LOCAL_RECOMMENDATIONS_PROMPT,
  PARAGRAPH_WRITER_PROMPT,
  SPANISH_TRANSLATOR_PROMPT,
  WEATHER_PROMPT,
} from './prompts.js';

export type CatalogConfig = Pick<DurableAgentsConfig, 'openaiModel' | 'weatherMcpUrl'>;

/**
 * Agents registered under their session-key names.
 */
export const AgentNames = {
  HAIKU: 'haiku_agent',
  ENGLISH_WRITER: 'english_paragraph_writer_agent',
  FRENCH_TRANSLATOR: 'french_translator_agent',
  SPANISH_TRANSLATOR: 'spanish_translator_agent',
  DESTINATION_EXPERT: 'destination_expert_agent',
  ITINERARY_PLANNER: 'itinerary_planner_agent',
  LOCAL_RECOMMENDATIONS: 'local_recommendations_agent',
  OPENAI_WEATHER: 'openai_weather_agent',
  TRANSCRIPT_WEATHER: 'transcript_weather_agent',
} as const;

export type AgentName = (typeof AgentNames)[keyof typeof AgentNames];

function weatherServers(config: CatalogConfig): MCPServer[] {
  if (!config.weatherMcpUrl) {
    return [];
  }
  return [new MCPServerStreamableHttp({ url: config.weatherMcpUrl, name: 'weather', cacheToolsList: true })];
}

/**
 * Build a registry holding every catalog agent.
 */
export function createAgentCatalog(config: CatalogConfig): AgentRegistry {
  const model = config.openaiModel;
  const sdkAgent = (name: string, instructions: string, mcpServers: MCPServer[] = []): Agent =>
    new Agent({ name, instructions, model, mcpServers });

  return new AgentRegistry()
    .register(defineOpenAIAgent(AgentNames.HAIKU, sdkAgent('Haiku agent', HAIKU_PROMPT)))
    .register(
      defineOpenAIAgent(AgentNames.ENGLISH_WRITER, sdkAgent('English Paragraph Writer Agent', PARAGRAPH_WRITER_PROMPT))
    )
    .register(
      defineOpenAIAgent(AgentNames.FRENCH_TRANSLATOR, sdkAgent('French Translator Agent', FRENCH_TRANSLATOR_PROMPT))
    )
    .register(
      defineOpenAIAgent(AgentNames.SPANISH_TRANSLATOR, sdkAgent('Spanish Translator Agent', SPANISH_TRANSLATOR_PROMPT))
    )
    .register(defineOpenAIAgent(AgentNames.DESTINATION_EXPERT, sdkAgent('DestinationExpert', DESTINATION_PROMPT)))
    .register(defineOpenAIAgent(AgentNames.ITINERARY_PLANNER, sdkAgent('ItineraryPlanner', ITINERARY_PROMPT)))
    .register(
      defineOpenAIAgent(AgentNames.LOCAL_RECOMMENDATIONS, sdkAgent('LocalRecommendations', LOCAL_RECOMMENDATIONS_PROMPT))
    )
    .register(
      defineOpenAIAgent(AgentNames.OPENAI_WEATHER, sdkAgent('Weather Agent', WEATHER_PROMPT, weatherServers(config)))
    )
    .register(
      defineTranscriptAgent(AgentNames.TRANSCRIPT_WEATHER, {
        model: openai(model),
        instructions: CONCISE_WEATHER_PROMPT,
        ...(config.weatherMcpUrl !== undefined ? { mcpUrl: config.weatherMcpUrl } : {}),
      })
    );
}
