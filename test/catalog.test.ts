import { describe, it, expect } from 'vitest';
import { AgentNames, createAgentCatalog } from '../src/agent/index.js';

describe('createAgentCatalog', () => {
  it('should register every catalog agent under its name and kind', () => {
    const registry = createAgentCatalog({ openaiModel: 'gpt-test' });

    expect(registry.size).toBe(9);
    expect(registry.list()).toEqual([
      { name: AgentNames.HAIKU, kind: 'openai-agents' },
      { name: AgentNames.ENGLISH_WRITER, kind: 'openai-agents' },
      { name: AgentNames.FRENCH_TRANSLATOR, kind: 'openai-agents' },
      { name: AgentNames.SPANISH_TRANSLATOR, kind: 'openai-agents' },
      { name: AgentNames.DESTINATION_EXPERT, kind: 'openai-agents' },
      { name: AgentNames.ITINERARY_PLANNER, kind: 'openai-agents' },
      { name: AgentNames.LOCAL_RECOMMENDATIONS, kind: 'openai-agents' },
      { name: AgentNames.OPENAI_WEATHER, kind: 'openai-agents' },
      { name: AgentNames.TRANSCRIPT_WEATHER, kind: 'transcript' },
    ]);
  });

  it('should build the weather agents with an MCP server URL', () => {
    const registry = createAgentCatalog({ openaiModel: 'gpt-test', weatherMcpUrl: 'http://localhost:8000/mcp' });

    expect(registry.has(AgentNames.OPENAI_WEATHER)).toBe(true);
    expect(registry.has(AgentNames.TRANSCRIPT_WEATHER)).toBe(true);
  });

  it("should open new sessions with each kind's initial state", () => {
    const registry = createAgentCatalog({ openaiModel: 'gpt-test' });

    expect(registry.get(AgentNames.HAIKU)?.open(undefined).snapshot()).toEqual({ items: [] });
    expect(registry.get(AgentNames.TRANSCRIPT_WEATHER)?.open(undefined).snapshot()).toEqual({ turns: [] });
  });
});
