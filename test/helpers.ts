/**
 * Shared fakes for the unit tests: scripted agents, deferred promises and an
 * in-memory runtime.
 */

import { z } from 'zod';
import { AgentRegistry, type AgentDefinition, type AgentRunner, type AgentTurn } from '../src/agent/index.js';
import { OrchestrationRegistry } from '../src/orchestrator/index.js';
import { createRuntime, type Runtime, type RuntimeOverrides } from '../src/runtime.js';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const scriptedStateSchema = z.object({ inputs: z.array(z.string()) });

export type ScriptedState = z.infer<typeof scriptedStateSchema>;

export type ScriptedReply = (input: string, state: ScriptedState) => string | Promise<string>;

/**
 * Runner whose state is the list of inputs it has seen.
 */
export class ScriptedRunner implements AgentRunner<ScriptedState> {
  readonly calls: string[] = [];

  constructor(private readonly reply: ScriptedReply) {}

  async run(state: ScriptedState, input: string): Promise<AgentTurn<ScriptedState>> {
    this.calls.push(input);
    const output = await this.reply(input, state);
    return { state: { inputs: [...state.inputs, input] }, output };
  }
}

export function scriptedAgent(name: string, reply: ScriptedReply): AgentDefinition<ScriptedState> & {
  runner: ScriptedRunner;
} {
  return {
    name,
    kind: 'scripted',
    codec: {
      initialState: () => ({ inputs: [] }),
      serialize: (state) => ({ inputs: [...state.inputs] }),
      deserialize: (stored) => scriptedStateSchema.parse(stored),
    },
    runner: new ScriptedRunner(reply),
  };
}

export interface TestRuntimeOptions extends RuntimeOverrides {
  maxQueuedRunsPerSession?: number;
  maxHistoryEvents?: number;
}

/**
 * Runtime on memory stores with no catalog agents unless given.
 */
export function createTestRuntime(options: TestRuntimeOptions = {}): Runtime {
  const { maxQueuedRunsPerSession = 100, maxHistoryEvents = 10000, ...overrides } = options;
  return createRuntime(
    {
      store: 'memory',
      dataDir: '.unused',
      maxQueuedRunsPerSession,
      maxHistoryEvents,
      openaiModel: 'gpt-test',
    },
    {
      agents: new AgentRegistry(),
      orchestrations: new OrchestrationRegistry(),
      ...overrides,
    }
  );
}
