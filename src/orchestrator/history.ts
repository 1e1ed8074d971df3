/**
 * History folding.
 *
 * Turns the append-only event list of an instance into the per-action view
 * used by replay and by the history query.
 */

import {
  ActionKind,
  ActionStatus,
  type ActionRecord,
  type ActionScheduledEvent,
  type HistoryEvent,
  type SerializedError,
} from '../types/index.js';

/**
 * Recorded outcome of one action.
 * `order` is the history index at which the action became settled.
 */
export type ActionOutcome =
  | { ok: true; result: unknown; order: number; timestamp: string }
  | { ok: false; error: SerializedError; order: number; timestamp: string };

export interface HistoryView {
  startedAt: string | null;
  input: unknown;
  scheduled: Map<number, ActionScheduledEvent>;
  outcomes: Map<number, ActionOutcome>;
  /** Raised events not yet claimed by a wait, per event name in arrival order */
  unclaimedEvents: Map<string, number>;
  terminal: boolean;
}

/**
 * Build the replay view of a history.
 *
 * External events are matched by position: the k-th wait for event E (in
 * sequence order) receives the k-th raised E (in arrival order). An event
 * raised before its wait is scheduled settles the wait at the wait's own
 * position, so it is consumed exactly once and never ahead of the wait.
 */
export function buildHistoryView(history: readonly HistoryEvent[]): HistoryView {
  const view: HistoryView = {
    startedAt: null,
    input: undefined,
    scheduled: new Map(),
    outcomes: new Map(),
    unclaimedEvents: new Map(),
    terminal: false,
  };

  const scheduledIndex = new Map<number, number>();
  const waitsByName = new Map<string, number[]>();
  const raisedByName = new Map<string, Array<{ index: number; payload: unknown; timestamp: string }>>();

  history.forEach((event, index) => {
    switch (event.type) {
      case 'OrchestrationStarted':
        view.startedAt = event.timestamp;
        view.input = event.input;
        break;
      case 'ActionScheduled':
        view.scheduled.set(event.sequenceNo, event);
        scheduledIndex.set(event.sequenceNo, index);
        if (event.kind === ActionKind.EXTERNAL_EVENT) {
          pushTo(waitsByName, event.name, event.sequenceNo);
        }
        break;
      case 'ActionCompleted':
        if (!view.outcomes.has(event.sequenceNo)) {
          view.outcomes.set(event.sequenceNo, {
            ok: true,
            result: event.result,
            order: index,
            timestamp: event.timestamp,
          });
        }
        break;
      case 'ActionFailed':
        if (!view.outcomes.has(event.sequenceNo)) {
          view.outcomes.set(event.sequenceNo, {
            ok: false,
            error: event.error,
            order: index,
            timestamp: event.timestamp,
          });
        }
        break;
      case 'EventRaised':
        pushTo(raisedByName, event.name, { index, payload: event.payload, timestamp: event.timestamp });
        break;
      case 'OrchestrationCompleted':
      case 'OrchestrationFailed':
        view.terminal = true;
        break;
    }
  });

  for (const [name, raised] of raisedByName) {
    const waits = (waitsByName.get(name) ?? []).sort((a, b) => a - b);
    raised.forEach((event, k) => {
      const sequenceNo = waits[k];
      if (sequenceNo === undefined) {
        view.unclaimedEvents.set(name, (view.unclaimedEvents.get(name) ?? 0) + 1);
        return;
      }
      const waitIndex = scheduledIndex.get(sequenceNo) ?? event.index;
      const settledByWait = waitIndex > event.index;
      view.outcomes.set(sequenceNo, {
        ok: true,
        result: event.payload,
        order: Math.max(waitIndex, event.index),
        timestamp: settledByWait ? (view.scheduled.get(sequenceNo)?.timestamp ?? event.timestamp) : event.timestamp,
      });
    });
  }

  return view;
}

/**
 * One record per sequence number, in sequence order.
 */
export function foldHistory(history: readonly HistoryEvent[]): ActionRecord[] {
  const view = buildHistoryView(history);

  return Array.from(view.scheduled.values())
    .sort((a, b) => a.sequenceNo - b.sequenceNo)
    .map((scheduled) => {
      const record: ActionRecord = {
        sequenceNo: scheduled.sequenceNo,
        kind: scheduled.kind,
        name: scheduled.name,
        status: ActionStatus.SCHEDULED,
        scheduledAt: scheduled.timestamp,
      };
      if (scheduled.target) record.target = scheduled.target;
      if (scheduled.input !== undefined) record.input = scheduled.input;
      if (scheduled.fireAt) record.fireAt = scheduled.fireAt;

      const outcome = view.outcomes.get(scheduled.sequenceNo);
      if (outcome?.ok) {
        record.status = ActionStatus.COMPLETED;
        record.result = outcome.result;
        record.completedAt = outcome.timestamp;
      } else if (outcome) {
        record.status = ActionStatus.FAILED;
        record.error = outcome.error;
        record.completedAt = outcome.timestamp;
      }
      return record;
    });
}

/**
 * Scheduled actions without an outcome.
 */
export function outstandingActions(history: readonly HistoryEvent[]): ActionScheduledEvent[] {
  const view = buildHistoryView(history);
  return Array.from(view.scheduled.values())
    .filter((a) => !view.outcomes.has(a.sequenceNo))
    .sort((a, b) => a.sequenceNo - b.sequenceNo);
}

function pushTo<T>(map: Map<string, T[]>, key: string, value: T): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}
