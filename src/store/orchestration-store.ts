/**
 * Orchestration instance persistence.
 * Keeps one summary row per instance plus its append-only history.
 */

import { readFile, writeFile, appendFile, rename, readdir, rm } from 'node:fs/promises';
import { nanoid } from 'nanoid';
import {
  historyEventSchema,
  instanceSummarySchema,
  type HistoryEvent,
  type InstanceSummary,
  type ListInstancesFilter,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import {
  ensureDir,
  fromFileName,
  getInstanceDir,
  getInstanceHistoryPath,
  getInstanceSummaryPath,
  getInstancesDir,
} from './paths.js';
import { isNotFound, jsonClone, toStoreError } from './store-errors.js';

const log = createLogger('orchestration-store');

export interface OrchestrationStore {
  /** Create (or replace a terminal) instance with its first history events */
  create(summary: InstanceSummary, history: HistoryEvent[]): Promise<void>;
  /** Append events and replace the summary row */
  append(instanceId: string, events: HistoryEvent[], summary: InstanceSummary): Promise<void>;
  loadSummary(instanceId: string): Promise<InstanceSummary | null>;
  loadHistory(instanceId: string): Promise<HistoryEvent[]>;
  list(filter?: ListInstancesFilter): Promise<InstanceSummary[]>;
}

/**
 * Apply status/name filters, newest first, then paginate.
 */
function applyFilter(summaries: InstanceSummary[], filter: ListInstancesFilter): InstanceSummary[] {
  const { status, name, limit = 20, offset = 0 } = filter;

  return summaries
    .filter((s) => (status ? s.status === status : true))
    .filter((s) => (name ? s.name === name : true))
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
    .slice(offset, offset + limit);
}

/**
 * In-process store for tests and ephemeral runs.
 */
export class MemoryOrchestrationStore implements OrchestrationStore {
  private readonly summaries = new Map<string, InstanceSummary>();
  private readonly histories = new Map<string, HistoryEvent[]>();

  create(summary: InstanceSummary, history: HistoryEvent[]): Promise<void> {
    this.summaries.set(summary.instanceId, instanceSummarySchema.parse(jsonClone(summary)));
    this.histories.set(summary.instanceId, history.map((e) => historyEventSchema.parse(jsonClone(e))));
    return Promise.resolve();
  }

  append(instanceId: string, events: HistoryEvent[], summary: InstanceSummary): Promise<void> {
    const history = this.histories.get(instanceId);
    if (!history) {
      return Promise.reject(new Error(`Cannot append to missing instance ${instanceId}`));
    }
    history.push(...events.map((e) => historyEventSchema.parse(jsonClone(e))));
    this.summaries.set(instanceId, instanceSummarySchema.parse(jsonClone(summary)));
    return Promise.resolve();
  }

  loadSummary(instanceId: string): Promise<InstanceSummary | null> {
    const summary = this.summaries.get(instanceId);
    return Promise.resolve(summary ? instanceSummarySchema.parse(jsonClone(summary)) : null);
  }

  loadHistory(instanceId: string): Promise<HistoryEvent[]> {
    const history = this.histories.get(instanceId) ?? [];
    return Promise.resolve(history.map((e) => historyEventSchema.parse(jsonClone(e))));
  }

  list(filter: ListInstancesFilter = {}): Promise<InstanceSummary[]> {
    return Promise.resolve(applyFilter(Array.from(this.summaries.values()), filter));
  }
}

/**
 * `<root>/instances/<id>/instance.json` plus `history.jsonl`, one event per line.
 */
export class FileOrchestrationStore implements OrchestrationStore {
  constructor(private readonly root: string) {}

  async create(summary: InstanceSummary, history: HistoryEvent[]): Promise<void> {
    const { instanceId } = summary;
    try {
      await ensureDir(getInstanceDir(this.root, instanceId));
      await writeFile(getInstanceHistoryPath(this.root, instanceId), toJsonLines(history));
      await this.writeSummary(summary);
    } catch (error) {
      throw toStoreError(`create instance ${instanceId}`, error);
    }
    log.debug({ instanceId, events: history.length }, 'Instance created');
  }

  async append(instanceId: string, events: HistoryEvent[], summary: InstanceSummary): Promise<void> {
    try {
      if (events.length > 0) {
        await appendFile(getInstanceHistoryPath(this.root, instanceId), toJsonLines(events));
      }
      await this.writeSummary(summary);
    } catch (error) {
      throw toStoreError(`append to instance ${instanceId}`, error);
    }
    log.debug({ instanceId, events: events.length, status: summary.status }, 'History appended');
  }

  async loadSummary(instanceId: string): Promise<InstanceSummary | null> {
    let content: string;
    try {
      content = await readFile(getInstanceSummaryPath(this.root, instanceId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw toStoreError(`read instance ${instanceId}`, error);
    }

    const result = instanceSummarySchema.safeParse(JSON.parse(content));
    if (!result.success) {
      throw new Error(`Corrupted summary for instance ${instanceId}: ${result.error.message}`);
    }
    return result.data;
  }

  async loadHistory(instanceId: string): Promise<HistoryEvent[]> {
    let content: string;
    try {
      content = await readFile(getInstanceHistoryPath(this.root, instanceId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw toStoreError(`read history ${instanceId}`, error);
    }

    const events: HistoryEvent[] = [];
    const lines = content.split('\n');
    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') continue;
      const result = historyEventSchema.safeParse(JSON.parse(line));
      if (!result.success) {
        throw new Error(
          `Corrupted history for instance ${instanceId} at line ${index + 1}: ${result.error.message}`
        );
      }
      events.push(result.data);
    }
    return events;
  }

  async list(filter: ListInstancesFilter = {}): Promise<InstanceSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(getInstancesDir(this.root));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw toStoreError('list instances', error);
    }

    const summaries: InstanceSummary[] = [];
    for (const entry of entries) {
      try {
        const summary = await this.loadSummary(fromFileName(entry));
        if (summary) {
          summaries.push(summary);
        }
      } catch (error) {
        log.warn({ entry, err: error }, 'Skipping unreadable instance');
      }
    }

    return applyFilter(summaries, filter);
  }

  private async writeSummary(summary: InstanceSummary): Promise<void> {
    const path = getInstanceSummaryPath(this.root, summary.instanceId);
    const tmpPath = `${path}.${nanoid(8)}.tmp`;
    try {
      await writeFile(tmpPath, JSON.stringify(summary, null, 2));
      await rename(tmpPath, path);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }
}

function toJsonLines(events: HistoryEvent[]): string {
  return events.map((e) => JSON.stringify(e)).join('\n') + (events.length > 0 ? '\n' : '');
}
