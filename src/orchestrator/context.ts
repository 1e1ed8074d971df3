/**
 * Orchestration context.
 *
 * The only handle an orchestration function has on the outside world. Every
 * value it exposes is a pure function of history, so re-running the function
 * against the same history takes the same path and creates the same tasks.
 */

import { createHash } from 'node:crypto';
import {
  ActionKind,
  InputMissingError,
  NonDeterminismError,
  type ActionScheduledEvent,
  type CallTarget,
} from '../types/index.js';
import type { HistoryView } from './history.js';
import { ActionTask, Task, WhenAllTask, WhenAnyTask, type ResultSchema, type Settlement } from './task.js';

export interface CallAgentOptions {
  /** Session to run in; a deterministic id is generated when omitted */
  sessionId?: string;
}

export interface SubOrchestrationOptions {
  /** Child instance id (default `<parentId>:<sequenceNo>`) */
  instanceId?: string;
}

export interface ContextInit {
  instanceId: string;
  name: string;
  input: unknown;
  createdAt: string;
  view: HistoryView;
  /** History length before this activation's inbound events */
  replayHorizon: number;
  /** Timestamp stamped on newly scheduled actions */
  now: string;
}

/**
 * Absent values, zero, empty text and empty collections count as missing input.
 */
function isMissing(input: unknown): boolean {
  if (input === undefined || input === null || input === '' || input === false || input === 0) {
    return true;
  }
  if (Array.isArray(input)) {
    return input.length === 0;
  }
  if (typeof input === 'object') {
    return Object.keys(input).length === 0;
  }
  return false;
}

export class OrchestrationContext {
  readonly instanceId: string;
  readonly name: string;

  private readonly rawInput: unknown;
  private readonly view: HistoryView;
  private readonly replayHorizon: number;
  private readonly now: string;

  private nextSequenceNo = 0;
  private guidCounter = 0;
  private currentTime: Date;
  private replaying: boolean;
  private customStatusValue: unknown;
  private customStatusSet = false;
  private fatalError: Error | null = null;
  private readonly scheduledActions: ActionScheduledEvent[] = [];

  constructor(init: ContextInit) {
    this.instanceId = init.instanceId;
    this.name = init.name;
    this.rawInput = init.input;
    this.view = init.view;
    this.replayHorizon = init.replayHorizon;
    this.now = init.now;
    this.currentTime = new Date(init.createdAt);
    this.replaying = init.view.scheduled.size > 0;
  }

  // ==========================================================================
  // Deterministic data
  // ==========================================================================

  /**
   * Orchestration input as given to start.
   */
  get input(): unknown {
    return this.rawInput;
  }

  /**
   * Input validated for use. Fails the orchestration with InputMissingError
   * when no input was given, before any action is scheduled.
   */
  getInput(): unknown;
  getInput<T>(schema: ResultSchema<T>): T;
  getInput<T>(schema?: ResultSchema<T>): unknown {
    if (isMissing(this.rawInput)) {
      throw new InputMissingError(this.name);
    }
    return schema ? schema.parse(this.rawInput) : this.rawInput;
  }

  /**
   * Replay-safe clock: the instance creation time, advanced to the
   * timestamp of each outcome the function has consumed.
   */
  get currentUtcDateTime(): Date {
    return new Date(this.currentTime.getTime());
  }

  /**
   * True while the function is re-executing steps it has already taken.
   */
  get isReplaying(): boolean {
    return this.replaying;
  }

  /**
   * Replay-safe unique id derived from the instance id and a call counter.
   */
  newGuid(): string {
    const hex = createHash('sha256').update(`${this.instanceId}:${this.guidCounter++}`).digest('hex');
    return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join('-');
  }

  setCustomStatus(value: unknown): void {
    this.customStatusValue = value;
    this.customStatusSet = true;
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  /**
   * Run one turn of an agent session. Resolves with the agent's reply text.
   */
  callAgent(agentName: string, input: unknown, options: CallAgentOptions = {}): Task<string> {
    const sessionId = options.sessionId || this.newGuid();
    const target: CallTarget = { type: 'entity', agentName, sessionId, operation: 'run' };
    return this.schedule(ActionKind.CALL, agentName, { target, input }, (raw) => {
      if (typeof raw !== 'string') {
        throw new Error(`Agent ${agentName} returned a non-text reply`);
      }
      return raw;
    });
  }

  callActivity(name: string, input?: unknown): Task<unknown>;
  callActivity<T>(name: string, input: unknown, schema: ResultSchema<T>): Task<T>;
  callActivity<T>(name: string, input?: unknown, schema?: ResultSchema<T>): Task<T> | Task<unknown> {
    const target: CallTarget = { type: 'activity', name };
    return schema
      ? this.schedule(ActionKind.CALL, name, { target, input }, (raw) => schema.parse(raw))
      : this.schedule(ActionKind.CALL, name, { target, input }, (raw): unknown => raw);
  }

  callSubOrchestration(name: string, input?: unknown, options?: SubOrchestrationOptions): Task<unknown>;
  callSubOrchestration<T>(
    name: string,
    input: unknown,
    options: SubOrchestrationOptions,
    schema: ResultSchema<T>
  ): Task<T>;
  callSubOrchestration<T>(
    name: string,
    input?: unknown,
    options: SubOrchestrationOptions = {},
    schema?: ResultSchema<T>
  ): Task<T> | Task<unknown> {
    const instanceId = options.instanceId ?? `${this.instanceId}:${this.nextSequenceNo}`;
    const target: CallTarget = { type: 'orchestration', name, instanceId };
    return schema
      ? this.schedule(ActionKind.CALL, name, { target, input }, (raw) => schema.parse(raw))
      : this.schedule(ActionKind.CALL, name, { target, input }, (raw): unknown => raw);
  }

  /**
   * Durable timer. Timeouts are expressed as `any([work, timer])`.
   */
  createTimer(fireAt: Date): Task<void> {
    return this.schedule(ActionKind.TIMER, 'timer', { fireAt: fireAt.toISOString() }, () => undefined);
  }

  waitForEvent(name: string): Task<unknown>;
  waitForEvent<T>(name: string, schema: ResultSchema<T>): Task<T>;
  waitForEvent<T>(name: string, schema?: ResultSchema<T>): Task<T> | Task<unknown> {
    return schema
      ? this.schedule(ActionKind.EXTERNAL_EVENT, name, {}, (raw) => schema.parse(raw))
      : this.schedule(ActionKind.EXTERNAL_EVENT, name, {}, (raw): unknown => raw);
  }

  /**
   * Fan-in: values in participant order once every participant settled.
   */
  all<T>(tasks: readonly Task<T>[]): Task<T[]> {
    return new WhenAllTask(tasks);
  }

  /**
   * Race: index of the first participant to settle.
   */
  any(tasks: readonly Task<unknown>[]): Task<number> {
    return new WhenAnyTask(tasks);
  }

  // ==========================================================================
  // Replay driver hooks
  // ==========================================================================

  /** @internal */
  consume(settlement: Settlement<unknown>): void {
    if (settlement.timestamp) {
      const at = new Date(settlement.timestamp);
      if (at.getTime() > this.currentTime.getTime()) {
        this.currentTime = at;
      }
    }
    if (settlement.order >= this.replayHorizon) {
      this.replaying = false;
    }
  }

  /** @internal */
  get newActions(): readonly ActionScheduledEvent[] {
    return this.scheduledActions;
  }

  /** @internal */
  get fatal(): Error | null {
    return this.fatalError;
  }

  /** @internal */
  get customStatus(): { set: boolean; value: unknown } {
    return { set: this.customStatusSet, value: this.customStatusValue };
  }

  private schedule<T>(
    kind: ActionKind,
    name: string,
    details: { target?: CallTarget; input?: unknown; fireAt?: string },
    decode: (raw: unknown) => T
  ): Task<T> {
    const sequenceNo = this.nextSequenceNo++;
    const recorded = this.view.scheduled.get(sequenceNo);

    if (recorded) {
      if (recorded.kind !== kind || recorded.name !== name) {
        const error = new NonDeterminismError(
          sequenceNo,
          `${recorded.kind}:${recorded.name}`,
          `${kind}:${name}`
        );
        // Recorded here as well so a catch in the function cannot hide it
        this.fatalError ??= error;
        throw error;
      }
      return new ActionTask(sequenceNo, kind, name, this.view.outcomes.get(sequenceNo), decode);
    }

    this.replaying = false;
    const event: ActionScheduledEvent = {
      type: 'ActionScheduled',
      sequenceNo,
      kind,
      name,
      input: details.input,
      timestamp: this.now,
      ...(details.target !== undefined ? { target: details.target } : {}),
      ...(details.fireAt !== undefined ? { fireAt: details.fireAt } : {}),
    };
    this.scheduledActions.push(event);
    return new ActionTask(sequenceNo, kind, name, undefined, decode);
  }
}
