/**
 * Conversation store: one opaque state blob per session key.
 *
 * Callers never hold a reference into the store; every get returns a copy and
 * every put stores a copy. Per-key ordering of puts is provided by the owning
 * session entity's serial queue.
 */

import { readFile, writeFile, rename, readdir, rm } from 'node:fs/promises';
import { nanoid } from 'nanoid';
import { formatSessionKey, parseSessionKey, type SessionKey } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { getSessionPath, getSessionsDir, ensureDir, fromFileName } from './paths.js';
import { isNotFound, jsonClone, toStoreError } from './store-errors.js';

const log = createLogger('conversation-store');

export interface ConversationStore {
  /** Current state for the key, or undefined if the session has never run */
  get(key: SessionKey): Promise<unknown>;
  /** Replace the state for the key atomically; undefined is rejected */
  put(key: SessionKey, state: unknown): Promise<void>;
  /** Keys with stored state */
  keys(): Promise<SessionKey[]>;
}

/**
 * In-process store for tests and ephemeral runs.
 */
export class MemoryConversationStore implements ConversationStore {
  private readonly rows = new Map<string, unknown>();

  get(key: SessionKey): Promise<unknown> {
    return Promise.resolve(jsonClone(this.rows.get(formatSessionKey(key))));
  }

  put(key: SessionKey, state: unknown): Promise<void> {
    if (state === undefined) {
      return Promise.reject(undefinedStateError(key));
    }
    this.rows.set(formatSessionKey(key), jsonClone(state));
    return Promise.resolve();
  }

  keys(): Promise<SessionKey[]> {
    const keys: SessionKey[] = [];
    for (const raw of this.rows.keys()) {
      const key = parseSessionKey(raw);
      if (key) keys.push(key);
    }
    return Promise.resolve(keys);
  }
}

/**
 * One JSON file per session under `<root>/sessions`.
 */
export class FileConversationStore implements ConversationStore {
  constructor(private readonly root: string) {}

  async get(key: SessionKey): Promise<unknown> {
    const path = getSessionPath(this.root, formatSessionKey(key));
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw toStoreError(`read session ${formatSessionKey(key)}`, error);
    }

    const data: unknown = JSON.parse(content);
    return data;
  }

  async put(key: SessionKey, state: unknown): Promise<void> {
    if (state === undefined) {
      throw undefinedStateError(key);
    }
    const sessionKey = formatSessionKey(key);
    const path = getSessionPath(this.root, sessionKey);
    // Write to a sibling file and rename so readers never see a partial write
    const tmpPath = `${path}.${nanoid(8)}.tmp`;

    try {
      await ensureDir(getSessionsDir(this.root));
      await writeFile(tmpPath, JSON.stringify(state, null, 2));
      await rename(tmpPath, path);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw toStoreError(`write session ${sessionKey}`, error);
    }

    log.debug({ sessionKey }, 'Session state saved');
  }

  async keys(): Promise<SessionKey[]> {
    let entries: string[];
    try {
      entries = await readdir(getSessionsDir(this.root));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw toStoreError('list sessions', error);
    }

    const keys: SessionKey[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const key = parseSessionKey(fromFileName(entry.slice(0, -'.json'.length)));
      if (key) keys.push(key);
    }
    return keys;
  }
}

function undefinedStateError(key: SessionKey): Error {
  return new Error(`Cannot store undefined state for session ${formatSessionKey(key)}`);
}
