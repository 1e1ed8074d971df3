/**
 * Session types.
 *
 * A session is one ongoing conversation with one agent. It is addressed by
 * the agent's registered name plus a caller-chosen session id.
 */

// Separator between agent name and session id in the canonical key form
export const SESSION_KEY_SEPARATOR = '--';

export interface SessionKey {
  agentName: string;
  sessionId: string;
}

/**
 * Format a key as `<agentName>--<sessionId>`.
 */
export function formatSessionKey(key: SessionKey): string {
  return `${key.agentName}${SESSION_KEY_SEPARATOR}${key.sessionId}`;
}

/**
 * Parse a canonical key. The agent name ends at the first separator,
 * so session ids may themselves contain `--`.
 */
export function parseSessionKey(value: string): SessionKey | null {
  const index = value.indexOf(SESSION_KEY_SEPARATOR);
  if (index <= 0) {
    return null;
  }
  const agentName = value.slice(0, index);
  const sessionId = value.slice(index + SESSION_KEY_SEPARATOR.length);
  if (sessionId.length === 0) {
    return null;
  }
  return { agentName, sessionId };
}

/**
 * Text sent to the runner for a given input. Structured input is sent as JSON.
 */
export function inputToText(input: unknown): string {
  if (typeof input === 'string') {
    return input;
  }
  return input === undefined ? '' : JSON.stringify(input);
}
