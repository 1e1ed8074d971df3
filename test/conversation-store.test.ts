/**
 * Conversation Store Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileConversationStore, MemoryConversationStore } from '../src/store/index.js';

const key = { agentName: 'haiku_agent', sessionId: 's1' };

describe('MemoryConversationStore', () => {
  it('should return undefined for a session that never ran', async () => {
    const store = new MemoryConversationStore();
    await expect(store.get(key)).resolves.toBeUndefined();
  });

  it('should store and return copies', async () => {
    const store = new MemoryConversationStore();
    const state = { turns: ['hello'] };

    await store.put(key, state);
    state.turns.push('mutated after put');

    const loaded = await store.get(key);
    expect(loaded).toEqual({ turns: ['hello'] });
    expect(loaded).not.toBe(state);
  });

  it('should reject undefined state', async () => {
    const store = new MemoryConversationStore();
    await expect(store.put(key, undefined)).rejects.toThrow('Cannot store undefined state for session haiku_agent--s1');
    await expect(store.keys()).resolves.toEqual([]);
  });

  it('should list stored keys', async () => {
    const store = new MemoryConversationStore();
    await store.put(key, { turns: [] });
    await store.put({ agentName: 'haiku_agent', sessionId: 'a--b' }, { turns: [] });

    await expect(store.keys()).resolves.toEqual([key, { agentName: 'haiku_agent', sessionId: 'a--b' }]);
  });
});

describe('FileConversationStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'conversation-store-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should return undefined when nothing is stored', async () => {
    const store = new FileConversationStore(root);
    await expect(store.get(key)).resolves.toBeUndefined();
    await expect(store.keys()).resolves.toEqual([]);
  });

  it('should persist one JSON file per session key', async () => {
    const store = new FileConversationStore(root);
    await store.put(key, { items: [{ role: 'user', content: 'hi' }] });

    const raw = await readFile(join(root, 'sessions', 'haiku_agent--s1.json'), 'utf-8');
    expect(JSON.parse(raw)).toEqual({ items: [{ role: 'user', content: 'hi' }] });

    // A second store on the same directory sees the same state
    const reopened = new FileConversationStore(root);
    await expect(reopened.get(key)).resolves.toEqual({ items: [{ role: 'user', content: 'hi' }] });
  });

  it('should replace state atomically without leaving temp files', async () => {
    const store = new FileConversationStore(root);
    await store.put(key, { version: 1 });
    await store.put(key, { version: 2 });

    await expect(store.get(key)).resolves.toEqual({ version: 2 });
    await expect(readdir(join(root, 'sessions'))).resolves.toEqual(['haiku_agent--s1.json']);
  });

  it('should reject undefined state like the memory store', async () => {
    const store = new FileConversationStore(root);
    await expect(store.put(key, undefined)).rejects.toThrow('Cannot store undefined state for session haiku_agent--s1');
    await expect(store.get(key)).resolves.toBeUndefined();
  });

  it('should remove the temp file when the rename fails', async () => {
    const store = new FileConversationStore(root);
    // A non-empty directory where the session file belongs makes the rename fail
    await mkdir(join(root, 'sessions', 'haiku_agent--s1.json'), { recursive: true });
    await writeFile(join(root, 'sessions', 'haiku_agent--s1.json', 'keep'), '');

    await expect(store.put(key, { version: 1 })).rejects.toThrow();
    await expect(readdir(join(root, 'sessions'))).resolves.toEqual(['haiku_agent--s1.json']);
  });

  it('should escape session ids that are not safe file names', async () => {
    const store = new FileConversationStore(root);
    const nested = { agentName: 'haiku_agent', sessionId: 'team/alpha' };
    await store.put(nested, { ok: true });

    await expect(readdir(join(root, 'sessions'))).resolves.toEqual(['haiku_agent--team%2Falpha.json']);
    await expect(store.keys()).resolves.toEqual([nested]);
    await expect(store.get(nested)).resolves.toEqual({ ok: true });
  });
});
