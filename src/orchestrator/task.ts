/**
 * Orchestration tasks.
 *
 * A task is the handle an orchestration function receives for every durable
 * operation. Functions consume tasks with `yield*`, which suspends until the
 * task has a recorded outcome and then evaluates to its typed value:
 *
 *   const reply = yield* ctx.callAgent('haiku_agent', 'Tell me about the sea');
 *
 * Tasks are rebuilt on every replay from the folded history, so a task never
 * changes state while a single replay pass runs.
 */

import type { z } from 'zod';
import {
  ActionKind,
  AggregateChildFailure,
  OrchestrationTaskError,
  serializeError,
  type ChildFailure,
} from '../types/index.js';
import type { ActionOutcome } from './history.js';

/**
 * Validates a recorded result into the task's value type.
 */
export type ResultSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Outcome of a task as seen by the replay driver.
 * `order` is the history position at which the task settled.
 */
export type Settlement<T> =
  | { ok: true; value: T; order: number; timestamp: string }
  | { ok: false; error: Error; order: number; timestamp: string };

export abstract class Task<T> {
  private cached: Settlement<T> | null | undefined;

  /**
   * Outcome recorded in history, or null while the task is outstanding.
   */
  settlement(): Settlement<T> | null {
    if (this.cached === undefined) {
      this.cached = this.computeSettlement();
    }
    return this.cached;
  }

  get isSettled(): boolean {
    return this.settlement() !== null;
  }

  /** Whether an unresolved external-event wait is part of this task */
  abstract awaitsEvent(): boolean;

  /** Label used when the task fails as part of a fan-in */
  abstract describe(): { sequenceNo: number; name: string };

  protected abstract computeSettlement(): Settlement<T> | null;

  *[Symbol.iterator](): Generator<Task<unknown>, T, unknown> {
    yield this;
    const settled = this.settlement();
    if (settled === null) {
      throw new Error('Orchestration resumed before the awaited task settled');
    }
    if (!settled.ok) {
      throw settled.error;
    }
    return settled.value;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * A single scheduled action: call, timer or external-event wait.
 */
export class ActionTask<T> extends Task<T> {
  constructor(
    readonly sequenceNo: number,
    readonly kind: ActionKind,
    readonly name: string,
    private readonly outcome: ActionOutcome | undefined,
    private readonly decode: (raw: unknown) => T
  ) {
    super();
  }

  awaitsEvent(): boolean {
    return this.kind === ActionKind.EXTERNAL_EVENT && !this.isSettled;
  }

  describe(): { sequenceNo: number; name: string } {
    return { sequenceNo: this.sequenceNo, name: this.name };
  }

  protected computeSettlement(): Settlement<T> | null {
    const outcome = this.outcome;
    if (!outcome) {
      return null;
    }

    const { order, timestamp } = outcome;
    if (!outcome.ok) {
      return { ok: false, error: new OrchestrationTaskError(outcome.error), order, timestamp };
    }

    try {
      return { ok: true, value: this.decode(outcome.result), order, timestamp };
    } catch (error) {
      return { ok: false, error: toError(error), order, timestamp };
    }
  }
}

/**
 * Fan-in over every participant.
 * Settles once all participants have settled; fails if any of them failed.
 */
export class WhenAllTask<T> extends Task<T[]> {
  constructor(private readonly tasks: readonly Task<T>[]) {
    super();
  }

  awaitsEvent(): boolean {
    return this.tasks.some((t) => t.awaitsEvent());
  }

  describe(): { sequenceNo: number; name: string } {
    const first = this.tasks[0];
    return { sequenceNo: first ? first.describe().sequenceNo : -1, name: 'all' };
  }

  protected computeSettlement(): Settlement<T[]> | null {
    const settlements: Settlement<T>[] = [];
    for (const task of this.tasks) {
      const settled = task.settlement();
      if (settled === null) {
        return null;
      }
      settlements.push(settled);
    }

    // Settles at the position of the last participant
    let order = -1;
    let timestamp = '';
    for (const s of settlements) {
      if (s.order > order) {
        order = s.order;
        timestamp = s.timestamp;
      }
    }

    const failures: ChildFailure[] = [];
    const values: T[] = [];
    settlements.forEach((s, index) => {
      if (s.ok) {
        values.push(s.value);
        return;
      }
      const task = this.tasks[index];
      const label = task ? task.describe() : { sequenceNo: -1, name: 'unknown' };
      failures.push({ ...label, error: serializeError(s.error) });
    });

    if (failures.length > 0) {
      return { ok: false, error: new AggregateChildFailure(failures), order, timestamp };
    }
    return { ok: true, value: values, order, timestamp };
  }
}

/**
 * Race over participants. Settles with the index of the participant that
 * settled first in history; the others stay outstanding.
 */
export class WhenAnyTask extends Task<number> {
  constructor(private readonly tasks: readonly Task<unknown>[]) {
    super();
  }

  awaitsEvent(): boolean {
    return this.tasks.some((t) => t.awaitsEvent());
  }

  describe(): { sequenceNo: number; name: string } {
    const first = this.tasks[0];
    return { sequenceNo: first ? first.describe().sequenceNo : -1, name: 'any' };
  }

  protected computeSettlement(): Settlement<number> | null {
    let winner: { index: number; order: number; timestamp: string } | null = null;

    for (const [index, task] of this.tasks.entries()) {
      const settled = task.settlement();
      if (settled !== null && (winner === null || settled.order < winner.order)) {
        winner = { index, order: settled.order, timestamp: settled.timestamp };
      }
    }

    if (winner === null) {
      return null;
    }
    const { index, order, timestamp } = winner;
    return { ok: true, value: index, order, timestamp };
  }
}
