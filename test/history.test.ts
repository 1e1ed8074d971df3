/**
 * History folding tests
 */

import { describe, it, expect } from 'vitest';
import { buildHistoryView, foldHistory, outstandingActions } from '../src/orchestrator/index.js';
import type { HistoryEvent } from '../src/types/index.js';

const T0 = '2026-01-01T00:00:00.000Z';
const T1 = '2026-01-01T00:00:01.000Z';
const T2 = '2026-01-01T00:00:02.000Z';
const T3 = '2026-01-01T00:00:03.000Z';

const target = { type: 'entity', agentName: 'haiku_agent', sessionId: 's1', operation: 'run' } as const;

describe('foldHistory', () => {
  it('should produce one record per sequence number with its outcome', () => {
    const history: HistoryEvent[] = [
      { type: 'OrchestrationStarted', input: 'moon', timestamp: T0 },
      { type: 'ActionScheduled', sequenceNo: 0, kind: 'call', name: 'haiku_agent', target, input: 'moon', timestamp: T1 },
      { type: 'ActionScheduled', sequenceNo: 1, kind: 'timer', name: 'timer', input: undefined, fireAt: T3, timestamp: T1 },
      { type: 'ActionCompleted', sequenceNo: 0, result: 'a haiku', timestamp: T2 },
    ];

    expect(foldHistory(history)).toEqual([
      {
        sequenceNo: 0,
        kind: 'call',
        name: 'haiku_agent',
        status: 'completed',
        target,
        input: 'moon',
        result: 'a haiku',
        scheduledAt: T1,
        completedAt: T2,
      },
      {
        sequenceNo: 1,
        kind: 'timer',
        name: 'timer',
        status: 'scheduled',
        fireAt: T3,
        scheduledAt: T1,
      },
    ]);
  });

  it('should keep the first outcome of an action', () => {
    const history: HistoryEvent[] = [
      { type: 'OrchestrationStarted', input: 'moon', timestamp: T0 },
      { type: 'ActionScheduled', sequenceNo: 0, kind: 'call', name: 'haiku_agent', target, input: 'moon', timestamp: T1 },
      { type: 'ActionFailed', sequenceNo: 0, error: { name: 'AdapterError', message: 'boom' }, timestamp: T2 },
      { type: 'ActionCompleted', sequenceNo: 0, result: 'late', timestamp: T3 },
    ];

    const [record] = foldHistory(history);
    expect(record).toMatchObject({ status: 'failed', error: { name: 'AdapterError', message: 'boom' }, completedAt: T2 });
    expect(record?.result).toBeUndefined();
  });

  it('should match raised events to waits by position per event name', () => {
    const history: HistoryEvent[] = [
      { type: 'OrchestrationStarted', input: {}, timestamp: T0 },
      { type: 'EventRaised', name: 'approval', payload: 'first', timestamp: T1 },
      { type: 'ActionScheduled', sequenceNo: 0, kind: 'externalEvent', name: 'approval', input: undefined, timestamp: T2 },
      { type: 'ActionScheduled', sequenceNo: 1, kind: 'externalEvent', name: 'other', input: undefined, timestamp: T2 },
      { type: 'ActionScheduled', sequenceNo: 2, kind: 'externalEvent', name: 'approval', input: undefined, timestamp: T2 },
      { type: 'EventRaised', name: 'approval', payload: 'second', timestamp: T3 },
      { type: 'EventRaised', name: 'approval', payload: 'third', timestamp: T3 },
    ];

    const records = foldHistory(history);
    expect(records.map((r) => [r.sequenceNo, r.status, r.result])).toEqual([
      [0, 'completed', 'first'],
      [1, 'scheduled', undefined],
      [2, 'completed', 'second'],
    ]);
    // An event raised before its wait settles at the wait's own timestamp
    expect(records[0]?.completedAt).toBe(T2);

    const view = buildHistoryView(history);
    expect(view.unclaimedEvents.get('approval')).toBe(1);
    expect(view.outcomes.get(0)?.order).toBe(2);
    expect(view.outcomes.get(2)?.order).toBe(5);
  });

  it('should mark terminal histories', () => {
    const view = buildHistoryView([
      { type: 'OrchestrationStarted', input: 'x', timestamp: T0 },
      { type: 'OrchestrationCompleted', output: 'done', timestamp: T1 },
    ]);

    expect(view.terminal).toBe(true);
    expect(view.startedAt).toBe(T0);
    expect(view.input).toBe('x');
  });
});

describe('outstandingActions', () => {
  it('should list scheduled actions without an outcome in sequence order', () => {
    const history: HistoryEvent[] = [
      { type: 'OrchestrationStarted', input: 'x', timestamp: T0 },
      { type: 'ActionScheduled', sequenceNo: 1, kind: 'timer', name: 'timer', input: undefined, fireAt: T3, timestamp: T1 },
      { type: 'ActionScheduled', sequenceNo: 0, kind: 'call', name: 'haiku_agent', target, input: 'x', timestamp: T1 },
      { type: 'ActionScheduled', sequenceNo: 2, kind: 'call', name: 'haiku_agent', target, input: 'y', timestamp: T1 },
      { type: 'ActionCompleted', sequenceNo: 2, result: 'ok', timestamp: T2 },
    ];

    expect(outstandingActions(history).map((a) => a.sequenceNo)).toEqual([0, 1]);
  });
});
