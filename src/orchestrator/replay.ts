/**
 * Replay driver.
 *
 * Runs an orchestration function from the start against a history and
 * reports where it stopped: finished, failed, or blocked on an outstanding
 * task. The function is never resumed from a captured stack; every
 * activation is a fresh run that fast-forwards through recorded outcomes.
 */

import {
  serializeError,
  type ActionScheduledEvent,
  type HistoryEvent,
  type SerializedError,
} from '../types/index.js';
import { OrchestrationContext } from './context.js';
import { buildHistoryView } from './history.js';
import { Task } from './task.js';

/**
 * Orchestration function. Awaits tasks with `yield*` and returns its output.
 */
export type OrchestrationFunction<TOutput = unknown> = (
  ctx: OrchestrationContext
) => Generator<Task<unknown>, TOutput, unknown>;

export type ReplayOutcome =
  | { status: 'completed'; output: unknown }
  | { status: 'failed'; error: SerializedError }
  | { status: 'blocked'; awaitingEvent: boolean };

export interface ReplayResult {
  outcome: ReplayOutcome;
  newActions: readonly ActionScheduledEvent[];
  customStatus: { set: boolean; value: unknown };
}

export interface ReplayInput {
  instanceId: string;
  name: string;
  input: unknown;
  createdAt: string;
  history: readonly HistoryEvent[];
  replayHorizon: number;
  now: string;
}

/**
 * Run the function once against the given history.
 */
export function replayOnce(fn: OrchestrationFunction, input: ReplayInput): ReplayResult {
  const ctx = new OrchestrationContext({
    instanceId: input.instanceId,
    name: input.name,
    input: input.input,
    createdAt: input.createdAt,
    view: buildHistoryView(input.history),
    replayHorizon: input.replayHorizon,
    now: input.now,
  });

  const finish = (outcome: ReplayOutcome): ReplayResult => ({
    outcome: ctx.fatal ? { status: 'failed', error: serializeError(ctx.fatal) } : outcome,
    newActions: ctx.newActions,
    customStatus: ctx.customStatus,
  });

  try {
    const generator = fn(ctx);
    let step = generator.next();

    for (;;) {
      if (ctx.fatal) {
        return finish({ status: 'failed', error: serializeError(ctx.fatal) });
      }
      if (step.done) {
        return finish({ status: 'completed', output: step.value });
      }

      const task: unknown = step.value;
      if (!(task instanceof Task)) {
        throw new Error('Orchestration functions may only yield tasks; use yield* on context operations');
      }

      const settled = task.settlement();
      if (settled === null) {
        return finish({ status: 'blocked', awaitingEvent: task.awaitsEvent() });
      }

      ctx.consume(settled);
      step = generator.next();
    }
  } catch (error) {
    return finish({ status: 'failed', error: serializeError(error) });
  }
}

/**
 * Replay until the function blocks on work that is genuinely outstanding.
 *
 * A newly scheduled event wait can be satisfied at once by an event that was
 * raised earlier, so the history is extended with the new actions and the
 * function replayed again until no new wait settles immediately.
 */
export function replay(
  fn: OrchestrationFunction,
  input: ReplayInput
): ReplayResult & { appended: ActionScheduledEvent[] } {
  let history: HistoryEvent[] = [...input.history];
  const appended: ActionScheduledEvent[] = [];

  for (;;) {
    const result = replayOnce(fn, { ...input, history });
    if (result.newActions.length === 0 || result.outcome.status !== 'blocked') {
      return { ...result, appended: [...appended, ...result.newActions] };
    }

    appended.push(...result.newActions);
    history = [...history, ...result.newActions];
    const view = buildHistoryView(history);
    const unblocked = result.newActions.some((a) => view.outcomes.has(a.sequenceNo));
    if (!unblocked) {
      return { ...result, appended };
    }
  }
}
