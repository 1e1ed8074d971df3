/**
 * Agent runner contracts.
 *
 * An agent kind owns the shape of its session state through a codec and
 * produces replies through a runner. The session entity only ever sees the
 * stored (serialized) form, so it stays agnostic of the concrete shape.
 */

/**
 * Encodes one agent kind's session state to and from its stored form.
 */
export interface SessionCodec<TState> {
  initialState(): TState;
  serialize(state: TState): unknown;
  /** Throws if the stored value is not a valid state for this kind */
  deserialize(stored: unknown): TState;
}

export interface AgentTurn<TState> {
  state: TState;
  output: string;
}

/**
 * Produces a reply from accumulated state plus new input.
 * The runner appends the input to the state per its kind's convention.
 */
export interface AgentRunner<TState> {
  run(state: TState, input: string): Promise<AgentTurn<TState>>;
}

export interface AgentDefinition<TState> {
  /** Name used in session keys; must not contain `--` */
  name: string;
  /** Agent kind, e.g. `openai-agents` or `transcript` */
  kind: string;
  codec: SessionCodec<TState>;
  runner: AgentRunner<TState>;
}

/**
 * State decoded for one run, with the runner bound to it.
 */
export interface OpenSession {
  /** Decoded state re-encoded to its stored form */
  snapshot(): unknown;
  /** Run one turn; returns the new stored state and the reply text */
  run(input: string): Promise<{ state: unknown; output: string }>;
}

/**
 * Type-erased agent as held by the registry.
 */
export interface RegisteredAgent {
  readonly name: string;
  readonly kind: string;
  /** Decode stored state (undefined means a new session) */
  open(stored: unknown): OpenSession;
}

export function bindAgent<TState>(definition: AgentDefinition<TState>): RegisteredAgent {
  const { codec, runner } = definition;

  return {
    name: definition.name,
    kind: definition.kind,
    open(stored: unknown): OpenSession {
      const state = stored === undefined ? codec.initialState() : codec.deserialize(stored);
      return {
        snapshot: () => codec.serialize(state),
        run: async (input: string) => {
          const turn = await runner.run(state, input);
          return { state: codec.serialize(turn.state), output: turn.output };
        },
      };
    },
  };
}
