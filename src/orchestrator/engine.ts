/**
 * Orchestration engine.
 *
 * Drives orchestration instances through activations. An activation takes
 * the instance's lane of the keyed serial queue, appends the inbound events
 * (completions, raised events), replays the function, persists every new
 * event, and only then dispatches the newly scheduled work. Completions of
 * that work come back as new activations.
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { SessionEntities } from '../entity/index.js';
import type { OrchestrationStore } from '../store/index.js';
import {
  ActionKind,
  HistoryLimitError,
  InstanceConflictError,
  InstanceNotFoundError,
  OrchestrationNotFoundError,
  OrchestrationStatus,
  OrchestrationTaskError,
  isTerminalStatus,
  serializeError,
  toStatusView,
  type ActionRecord,
  type ActionScheduledEvent,
  type CallTarget,
  type HistoryEvent,
  type InstanceSummary,
  type ListInstancesFilter,
  type OrchestrationStatusView,
} from '../types/index.js';
import { KeyedSerialQueue, createLogger } from '../utils/index.js';
import { buildHistoryView, foldHistory, outstandingActions } from './history.js';
import type { OrchestrationRegistry } from './registry.js';
import { replay, type ReplayOutcome } from './replay.js';

const log = createLogger('orchestration-engine');

// Longest delay a Node.js timer accepts; longer timers are re-armed in steps
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface OrchestrationEngineConfig {
  /** History events allowed per instance before it is failed */
  maxHistoryEvents: number;
}

export interface OrchestrationEngineDeps {
  registry: OrchestrationRegistry;
  store: OrchestrationStore;
  sessions: Pick<SessionEntities, 'run'>;
  config: OrchestrationEngineConfig;
  /** Wall clock used for timestamps (tests pin it) */
  clock?: () => Date;
}

export interface StartOptions {
  /** Explicit instance id; a random one is generated when omitted */
  instanceId?: string;
  /** Set when the instance is a sub-orchestration */
  parent?: { instanceId: string; sequenceNo: number; generation?: string };
}

export interface RecoveryReport {
  recovered: number;
  failed: number;
}

export interface EngineStats {
  /** Live instances with dispatched work tracked in this process */
  trackedInstances: number;
  /** Instances with at least one armed timer */
  timedInstances: number;
}

export type EventDelivery = 'delivered' | 'unknown_instance' | 'terminal_instance';

/**
 * Events emitted by OrchestrationEngine.
 */
export interface OrchestrationEngineEvents {
  'status-changed': (status: OrchestrationStatusView) => void;
  'terminal': (status: OrchestrationStatusView) => void;
}

type CallResult = { settled: true; result: unknown } | { settled: false };

export class OrchestrationEngine extends EventEmitter {
  private readonly registry: OrchestrationRegistry;
  private readonly store: OrchestrationStore;
  private readonly sessions: Pick<SessionEntities, 'run'>;
  private readonly config: OrchestrationEngineConfig;
  private readonly clock: () => Date;

  private readonly queue = new KeyedSerialQueue({ name: 'instance-queue', maxQueueDepth: 0 });
  private readonly timers = new Map<string, Map<number, NodeJS.Timeout>>();
  private readonly dispatched = new Map<string, Set<number>>();
  private closed = false;

  constructor(deps: OrchestrationEngineDeps) {
    super();
    this.registry = deps.registry;
    this.store = deps.store;
    this.sessions = deps.sessions;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => new Date());
    // One listener per pending waitForCompletion call
    this.setMaxListeners(0);
  }

  // ==========================================================================
  // Client operations
  // ==========================================================================

  /**
   * Create an instance and run its first activation.
   * An explicit id may reuse a terminal instance but not a live one.
   */
  async start(name: string, input: unknown, options: StartOptions = {}): Promise<string> {
    if (!this.registry.getOrchestration(name)) {
      throw new OrchestrationNotFoundError(name);
    }

    const instanceId = options.instanceId ?? nanoid();

    await this.queue.enqueue(instanceId, async () => {
      const existing = await this.store.loadSummary(instanceId);
      if (existing && !isTerminalStatus(existing.status)) {
        throw new InstanceConflictError(instanceId);
      }

      const now = this.now();
      const summary: InstanceSummary = {
        instanceId,
        name,
        status: OrchestrationStatus.RUNNING,
        input,
        output: undefined,
        customStatus: undefined,
        createdAt: now,
        lastUpdatedAt: now,
        historyLength: 1,
        generation: nanoid(),
        ...(options.parent !== undefined
          ? {
              parentInstanceId: options.parent.instanceId,
              parentSequenceNo: options.parent.sequenceNo,
              parentGeneration: options.parent.generation,
            }
          : {}),
      };

      this.dispatched.delete(instanceId);
      this.clearTimers(instanceId);
      await this.store.create(summary, [{ type: 'OrchestrationStarted', input, timestamp: now }]);
      log.info({ instanceId, name, parentInstanceId: options.parent?.instanceId }, 'Orchestration started');

      await this.activate(instanceId, []);
    });

    return instanceId;
  }

  /**
   * Append a raised event to a live instance and replay it.
   * Unknown and terminal instances are reported, not thrown.
   */
  deliverEvent(instanceId: string, eventName: string, payload: unknown): Promise<EventDelivery> {
    return this.queue.enqueue(instanceId, async (): Promise<EventDelivery> => {
      const summary = await this.store.loadSummary(instanceId);
      if (!summary) {
        return 'unknown_instance';
      }
      if (isTerminalStatus(summary.status)) {
        return 'terminal_instance';
      }

      await this.activate(instanceId, [{ type: 'EventRaised', name: eventName, payload, timestamp: this.now() }]);
      return 'delivered';
    });
  }

  async getStatus(instanceId: string): Promise<OrchestrationStatusView> {
    const summary = await this.store.loadSummary(instanceId);
    if (!summary) {
      throw new InstanceNotFoundError(instanceId);
    }
    return toStatusView(summary);
  }

  async getSummary(instanceId: string): Promise<InstanceSummary> {
    const summary = await this.store.loadSummary(instanceId);
    if (!summary) {
      throw new InstanceNotFoundError(instanceId);
    }
    return summary;
  }

  async getHistory(instanceId: string): Promise<ActionRecord[]> {
    await this.getSummary(instanceId);
    return foldHistory(await this.store.loadHistory(instanceId));
  }

  async list(filter: ListInstancesFilter = {}): Promise<OrchestrationStatusView[]> {
    const summaries = await this.store.list(filter);
    return summaries.map(toStatusView);
  }

  /**
   * Resolve once the instance is terminal, or with its current status
   * when the timeout elapses first.
   */
  waitForCompletion(instanceId: string, timeoutMs: number): Promise<OrchestrationStatusView> {
    return new Promise<OrchestrationStatusView>((resolve, reject) => {
      let settled = false;

      const finish = (status: OrchestrationStatusView): void => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve(status);
      };

      const fail = (error: unknown): void => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(error);
      };

      const onTerminal = (status: OrchestrationStatusView): void => {
        if (status.instanceId === instanceId) {
          finish(status);
        }
      };

      const timer = setTimeout(() => {
        this.getStatus(instanceId).then(finish, fail);
      }, timeoutMs);

      const cleanup = (): void => {
        clearTimeout(timer);
        this.off('terminal', onTerminal);
      };

      this.on('terminal', onTerminal);

      this.getStatus(instanceId).then((status) => {
        if (isTerminalStatus(status.status)) {
          finish(status);
        }
      }, fail);
    });
  }

  /**
   * Resume every live instance after a restart: replay it, re-arm its timers
   * and re-dispatch calls that have no recorded outcome. A call that was in
   * flight when the process stopped runs again. An instance that cannot be
   * loaded is logged and counted as failed; the others still resume.
   */
  async recover(): Promise<RecoveryReport> {
    const everything = Number.MAX_SAFE_INTEGER;
    const live = [
      ...(await this.store.list({ status: OrchestrationStatus.RUNNING, limit: everything })),
      ...(await this.store.list({ status: OrchestrationStatus.PENDING, limit: everything })),
    ];

    const report: RecoveryReport = { recovered: 0, failed: 0 };
    for (const { instanceId } of live) {
      try {
        await this.queue.enqueue(instanceId, async () => {
          const summary = await this.activate(instanceId, []);
          if (isTerminalStatus(summary.status)) {
            return;
          }
          const history = await this.store.loadHistory(instanceId);
          for (const action of outstandingActions(history)) {
            this.dispatch(instanceId, action, summary.generation);
          }
        });
        report.recovered++;
      } catch (error) {
        report.failed++;
        log.error({ instanceId, err: error }, 'Failed to recover orchestration');
      }
    }

    log.info(report, 'Recovered live orchestrations');
    return report;
  }

  stats(): EngineStats {
    return { trackedInstances: this.dispatched.size, timedInstances: this.timers.size };
  }

  /**
   * Stop timers and drop late completions. Persisted state is untouched.
   */
  close(): void {
    this.closed = true;
    for (const instanceId of Array.from(this.timers.keys())) {
      this.clearTimers(instanceId);
    }
    this.removeAllListeners();
  }

  // ==========================================================================
  // Activation
  // ==========================================================================

  /**
   * Must run on the instance's queue lane. Outcomes carry the generation of
   * the run that dispatched them and are dropped once the id has been reused.
   */
  private async activate(instanceId: string, inbound: HistoryEvent[], generation?: string): Promise<InstanceSummary> {
    const summary = await this.store.loadSummary(instanceId);
    if (!summary) {
      throw new InstanceNotFoundError(instanceId);
    }
    if (isTerminalStatus(summary.status)) {
      log.debug({ instanceId, events: inbound.length }, 'Ignoring events for terminal instance');
      return summary;
    }
    if (generation !== undefined && generation !== summary.generation) {
      log.debug({ instanceId, generation }, 'Dropping outcome of an earlier run');
      return summary;
    }

    const history = await this.store.loadHistory(instanceId);
    const view = buildHistoryView(history);

    const accepted = inbound.filter((event) => {
      if (event.type !== 'ActionCompleted' && event.type !== 'ActionFailed') {
        return true;
      }
      if (!view.scheduled.has(event.sequenceNo) || view.outcomes.has(event.sequenceNo)) {
        log.debug({ instanceId, sequenceNo: event.sequenceNo }, 'Dropping duplicate or unknown completion');
        return false;
      }
      return true;
    });

    if (inbound.length > 0 && accepted.length === 0) {
      return summary;
    }

    const working = [...history, ...accepted];
    const now = this.now();
    const fn = this.registry.getOrchestration(summary.name);

    let outcome: ReplayOutcome;
    let newActions: ActionScheduledEvent[] = [];
    let customStatus = summary.customStatus;

    if (!fn) {
      outcome = { status: 'failed', error: serializeError(new OrchestrationNotFoundError(summary.name)) };
    } else {
      const result = replay(fn, {
        instanceId,
        name: summary.name,
        input: summary.input,
        createdAt: summary.createdAt,
        history: working,
        replayHorizon: history.length,
        now,
      });
      outcome = result.outcome;
      newActions = result.appended;
      if (result.customStatus.set) {
        customStatus = result.customStatus.value;
      }
    }

    if (working.length + newActions.length > this.config.maxHistoryEvents) {
      log.warn({ instanceId, limit: this.config.maxHistoryEvents }, 'History limit exceeded');
      outcome = { status: 'failed', error: serializeError(new HistoryLimitError(this.config.maxHistoryEvents)) };
      newActions = [];
    }

    const appended: HistoryEvent[] = [...accepted, ...newActions];
    const next: InstanceSummary = {
      ...summary,
      customStatus,
      lastUpdatedAt: now,
      status: OrchestrationStatus.RUNNING,
    };

    switch (outcome.status) {
      case 'completed':
        appended.push({ type: 'OrchestrationCompleted', output: outcome.output, timestamp: now });
        next.status = OrchestrationStatus.COMPLETED;
        next.output = outcome.output;
        break;
      case 'failed':
        appended.push({ type: 'OrchestrationFailed', error: outcome.error, timestamp: now });
        next.status = OrchestrationStatus.FAILED;
        next.error = outcome.error;
        break;
      case 'blocked':
        next.status = outcome.awaitingEvent ? OrchestrationStatus.PENDING : OrchestrationStatus.RUNNING;
        break;
    }
    next.historyLength = history.length + appended.length;

    await this.store.append(instanceId, appended, next);

    if (next.status !== summary.status) {
      log.info({ instanceId, from: summary.status, to: next.status }, 'Orchestration status changed');
    }

    const statusView = toStatusView(next);
    this.emit('status-changed', statusView);

    if (isTerminalStatus(next.status)) {
      if (next.status === OrchestrationStatus.FAILED) {
        log.warn({ instanceId, error: next.error }, 'Orchestration failed');
      }
      this.clearTimers(instanceId);
      this.dispatched.delete(instanceId);
      this.emit('terminal', statusView);
      this.notifyParent(next);
    } else {
      for (const action of newActions) {
        this.dispatch(instanceId, action, next.generation);
      }
    }

    return next;
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Start the work of a scheduled action, at most once per call site per process.
   */
  private dispatch(instanceId: string, action: ActionScheduledEvent, generation: string | undefined): void {
    if (action.kind === ActionKind.EXTERNAL_EVENT) {
      return;
    }

    let seen = this.dispatched.get(instanceId);
    if (!seen) {
      seen = new Set();
      this.dispatched.set(instanceId, seen);
    }
    if (seen.has(action.sequenceNo)) {
      return;
    }
    seen.add(action.sequenceNo);

    if (action.kind === ActionKind.TIMER) {
      this.armTimer(instanceId, action.sequenceNo, action.fireAt ? new Date(action.fireAt) : this.clock(), generation);
      return;
    }

    void this.executeCall(instanceId, action, generation).catch((error: unknown) => {
      log.error({ instanceId, sequenceNo: action.sequenceNo, err: error }, 'Failed to record call outcome');
    });
  }

  private async executeCall(
    instanceId: string,
    action: ActionScheduledEvent,
    generation: string | undefined
  ): Promise<void> {
    const { sequenceNo } = action;
    let event: HistoryEvent;

    try {
      const outcome = await this.invoke(instanceId, action, generation);
      if (!outcome.settled) {
        // Sub-orchestration: the child reports back when it terminates
        return;
      }
      event = { type: 'ActionCompleted', sequenceNo, result: outcome.result, timestamp: this.now() };
    } catch (error) {
      log.warn({ instanceId, sequenceNo, name: action.name, err: error }, 'Call failed');
      event = { type: 'ActionFailed', sequenceNo, error: serializeError(error), timestamp: this.now() };
    }

    await this.deliver(instanceId, event, generation);
  }

  private async invoke(
    instanceId: string,
    action: ActionScheduledEvent,
    generation: string | undefined
  ): Promise<CallResult> {
    const target = action.target;
    if (!target) {
      throw new Error(`Call #${action.sequenceNo} of ${instanceId} has no target`);
    }

    switch (target.type) {
      case 'entity': {
        const result = await this.sessions.run(
          { agentName: target.agentName, sessionId: target.sessionId },
          action.input
        );
        return { settled: true, result };
      }
      case 'activity': {
        const activity = this.registry.getActivity(target.name);
        if (!activity) {
          throw new OrchestrationNotFoundError(target.name, 'activity');
        }
        const result: unknown = await activity(action.input);
        return { settled: true, result };
      }
      case 'orchestration':
        return this.startChild(instanceId, action, target, generation);
    }
  }

  private async startChild(
    parentId: string,
    action: ActionScheduledEvent,
    target: Extract<CallTarget, { type: 'orchestration' }>,
    parentGeneration: string | undefined
  ): Promise<CallResult> {
    const existing = await this.store.loadSummary(target.instanceId);

    // Re-dispatched after a restart: the child of this very run already exists
    if (
      existing &&
      existing.parentInstanceId === parentId &&
      existing.parentSequenceNo === action.sequenceNo &&
      existing.parentGeneration === parentGeneration
    ) {
      if (existing.status === OrchestrationStatus.COMPLETED) {
        return { settled: true, result: existing.output };
      }
      if (existing.status === OrchestrationStatus.FAILED) {
        throw new OrchestrationTaskError(
          existing.error ?? { name: 'Error', message: `Sub-orchestration ${target.instanceId} failed` }
        );
      }
      return { settled: false };
    }

    await this.start(target.name, action.input, {
      instanceId: target.instanceId,
      parent: { instanceId: parentId, sequenceNo: action.sequenceNo, generation: parentGeneration },
    });
    return { settled: false };
  }

  private notifyParent(child: InstanceSummary): void {
    const { parentInstanceId, parentSequenceNo } = child;
    if (parentInstanceId === undefined || parentSequenceNo === undefined) {
      return;
    }

    const timestamp = this.now();
    const event: HistoryEvent =
      child.status === OrchestrationStatus.COMPLETED
        ? { type: 'ActionCompleted', sequenceNo: parentSequenceNo, result: child.output, timestamp }
        : {
            type: 'ActionFailed',
            sequenceNo: parentSequenceNo,
            error: child.error ?? { name: 'Error', message: `Sub-orchestration ${child.instanceId} failed` },
            timestamp,
          };

    void this.deliver(parentInstanceId, event, child.parentGeneration).catch((error: unknown) => {
      log.error({ parentInstanceId, childInstanceId: child.instanceId, err: error }, 'Failed to notify parent');
    });
  }

  private async deliver(instanceId: string, event: HistoryEvent, generation: string | undefined): Promise<void> {
    if (this.closed) {
      log.debug({ instanceId, type: event.type }, 'Engine closed, dropping outcome');
      return;
    }
    await this.queue.enqueue(instanceId, () => this.activate(instanceId, [event], generation));
  }

  // ==========================================================================
  // Timers
  // ==========================================================================

  private armTimer(instanceId: string, sequenceNo: number, fireAt: Date, generation: string | undefined): void {
    const remaining = fireAt.getTime() - this.clock().getTime();
    const stepped = remaining > MAX_TIMER_DELAY_MS;
    const delay = stepped ? MAX_TIMER_DELAY_MS : Math.max(0, remaining);

    const handle = setTimeout(() => {
      this.timers.get(instanceId)?.delete(sequenceNo);

      if (stepped) {
        this.armTimer(instanceId, sequenceNo, fireAt, generation);
        return;
      }

      const event: HistoryEvent = { type: 'ActionCompleted', sequenceNo, result: null, timestamp: this.now() };
      void this.deliver(instanceId, event, generation).catch((error: unknown) => {
        log.error({ instanceId, sequenceNo, err: error }, 'Failed to record timer');
      });
    }, delay);

    let instanceTimers = this.timers.get(instanceId);
    if (!instanceTimers) {
      instanceTimers = new Map();
      this.timers.set(instanceId, instanceTimers);
    }
    instanceTimers.set(sequenceNo, handle);
    log.debug({ instanceId, sequenceNo, fireAt: fireAt.toISOString() }, 'Timer armed');
  }

  private clearTimers(instanceId: string): void {
    const instanceTimers = this.timers.get(instanceId);
    if (!instanceTimers) return;
    for (const handle of instanceTimers.values()) {
      clearTimeout(handle);
    }
    this.timers.delete(instanceId);
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
