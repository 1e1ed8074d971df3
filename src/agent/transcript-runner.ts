/**
 * Transcript Runner
 *
 * Runs a chat model through the Vercel AI SDK. Session state is a plain list
 * of user and assistant turns, independent of any SDK item format.
 */

import { experimental_createMCPClient, generateText, type CoreMessage, type LanguageModel } from 'ai';
import { z } from 'zod';
import { createLogger } from '../utils/index.js';
import type { AgentDefinition, AgentRunner, AgentTurn, SessionCodec } from './runner.js';

const logger = createLogger('agent:transcript');

export const TRANSCRIPT_KIND = 'transcript';

const turnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

const transcriptStateSchema = z.object({
  turns: z.array(turnSchema),
});

export type TranscriptTurn = z.infer<typeof turnSchema>;
export type TranscriptState = z.infer<typeof transcriptStateSchema>;

export const transcriptCodec: SessionCodec<TranscriptState> = {
  initialState: () => ({ turns: [] }),
  serialize: (state) => ({ turns: state.turns.map((t) => ({ ...t })) }),
  deserialize: (stored) => {
    const result = transcriptStateSchema.safeParse(stored);
    if (!result.success) {
      throw new Error(`Invalid transcript session state: ${result.error.message}`);
    }
    return result.data;
  },
};

export interface TranscriptRunnerConfig {
  model: LanguageModel;
  /** System prompt sent with every turn */
  instructions: string;
  /** MCP server reached over SSE; its tools are offered to the model */
  mcpUrl?: string;
  /** Maximum tool-call steps per turn (default: 5) */
  maxSteps?: number;
}

export class TranscriptRunner implements AgentRunner<TranscriptState> {
  private readonly maxSteps: number;

  constructor(private readonly config: TranscriptRunnerConfig) {
    this.maxSteps = config.maxSteps ?? 5;
  }

  async run(state: TranscriptState, input: string): Promise<AgentTurn<TranscriptState>> {
    const turns: TranscriptTurn[] = [...state.turns, { role: 'user', content: input }];
    const messages: CoreMessage[] = turns.map((t) => ({ role: t.role, content: t.content }));

    if (!this.config.mcpUrl) {
      const result = await generateText({
        model: this.config.model,
        system: this.config.instructions,
        messages,
      });
      return this.toTurn(turns, result.text);
    }

    const mcpClient = await experimental_createMCPClient({
      transport: { type: 'sse', url: this.config.mcpUrl },
    });

    try {
      const tools = await mcpClient.tools();
      const result = await generateText({
        model: this.config.model,
        system: this.config.instructions,
        messages,
        tools,
        maxSteps: this.maxSteps,
      });
      return this.toTurn(turns, result.text);
    } finally {
      await mcpClient.close();
    }
  }

  private toTurn(turns: TranscriptTurn[], text: string): AgentTurn<TranscriptState> {
    logger.debug({ turns: turns.length + 1 }, 'Transcript turn completed');
    return {
      state: { turns: [...turns, { role: 'assistant', content: text }] },
      output: text,
    };
  }
}

export function defineTranscriptAgent(name: string, config: TranscriptRunnerConfig): AgentDefinition<TranscriptState> {
  return {
    name,
    kind: TRANSCRIPT_KIND,
    codec: transcriptCodec,
    runner: new TranscriptRunner(config),
  };
}
