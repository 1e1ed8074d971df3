import { z } from 'zod';
import type { OrchestrationContext, Task } from '../orchestrator/index.js';

export const agentRunInputSchema = z.object({
  agentName: z.string().min(1),
  sessionId: z.string().min(1),
  input: z.unknown(),
});

export type AgentRunInput = z.infer<typeof agentRunInputSchema>;

/**
 * Runs one turn of one agent session as an orchestration, so the call is
 * tracked with a status, a history and a wait-for-completion handle.
 */
export function* agentRun(ctx: OrchestrationContext): Generator<Task<unknown>, string, unknown> {
  const { agentName, sessionId, input } = ctx.getInput(agentRunInputSchema);
  return yield* ctx.callAgent(agentName, input, { sessionId });
}
