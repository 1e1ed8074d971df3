import { AgentNames } from '../agent/index.js';
import type { OrchestrationContext, Task } from '../orchestrator/index.js';

export interface MultilingualText {
  english: string;
  french: string;
  spanish: string;
}

/**
 * Writes a paragraph in English, then translates it to French and Spanish
 * in parallel.
 */
export function* multilingualWriter(ctx: OrchestrationContext): Generator<Task<unknown>, MultilingualText, unknown> {
  const topic = ctx.getInput();

  const english = yield* ctx.callAgent(AgentNames.ENGLISH_WRITER, topic);

  const frenchTask = ctx.callAgent(AgentNames.FRENCH_TRANSLATOR, english);
  const spanishTask = ctx.callAgent(AgentNames.SPANISH_TRANSLATOR, english);
  yield* ctx.all([frenchTask, spanishTask]);

  return {
    english,
    french: yield* frenchTask,
    spanish: yield* spanishTask,
  };
}
