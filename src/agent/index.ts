/**
 * Agent Module
 *
 * Agent kinds, the registry that routes agent names to them, and the
 * default catalog.
 *
 * Available kinds:
 * - openai-agents - `@openai/agents` Agent over SDK item history
 * - transcript - Vercel AI SDK model over a role/content transcript
 */

export {
  bindAgent,
  type AgentDefinition,
  type AgentRunner,
  type AgentTurn,
  type OpenSession,
  type RegisteredAgent,
  type SessionCodec,
} from './runner.js';

export { AgentRegistry } from './registry.js';

export {
  OPENAI_AGENTS_KIND,
  OpenAIAgentsRunner,
  defineOpenAIAgent,
  openAIAgentsCodec,
  type OpenAIAgentsState,
} from './openai-agents-runner.js';

export {
  TRANSCRIPT_KIND,
  TranscriptRunner,
  defineTranscriptAgent,
  transcriptCodec,
  type TranscriptRunnerConfig,
  type TranscriptState,
  type TranscriptTurn,
} from './transcript-runner.js';

export { AgentNames, createAgentCatalog, type AgentName, type CatalogConfig } from './catalog.js';
