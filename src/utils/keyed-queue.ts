import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { createLogger } from './logger.js';
import { QueueFullError } from '../types/index.js';

/**
 * Keyed serial queue configuration.
 */
export interface KeyedSerialQueueConfig {
  /** Name used in log lines */
  name: string;
  /** Tasks allowed to wait behind the active one for a single key (0 = unlimited) */
  maxQueueDepth: number;
}

const DEFAULT_CONFIG: KeyedSerialQueueConfig = {
  name: 'keyed-queue',
  maxQueueDepth: 0,
};

/**
 * Events emitted by KeyedSerialQueue.
 */
export interface KeyedSerialQueueEvents {
  'backpressure': (key: string, depth: number) => void;
  'key-idle': (key: string) => void;
}

interface QueuedTask {
  run: () => Promise<void>;
}

interface KeyLane {
  active: boolean;
  pending: QueuedTask[];
}

/**
 * Actor-style dispatcher: one lane per key, each lane runs its tasks strictly
 * one at a time in submission order. Lanes for different keys run concurrently.
 */
export class KeyedSerialQueue extends EventEmitter {
  private readonly logger: Logger;
  private readonly config: KeyedSerialQueueConfig;
  private readonly lanes = new Map<string, KeyLane>();

  constructor(config: Partial<KeyedSerialQueueConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = createLogger(this.config.name);
  }

  /**
   * Submit a task for a key. Resolves or rejects with the task's own outcome.
   * Rejects with QueueFullError when the key's lane is at capacity.
   */
  enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const lane = this.getLane(key);

    if (this.config.maxQueueDepth > 0 && lane.pending.length >= this.config.maxQueueDepth) {
      this.logger.warn(
        { key, queueDepth: lane.pending.length, maxDepth: this.config.maxQueueDepth },
        'Queue full, rejecting task'
      );
      this.emit('backpressure', key, lane.pending.length);
      return Promise.reject(new QueueFullError(key, lane.pending.length));
    }

    return new Promise<T>((resolve, reject) => {
      lane.pending.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
      });

      this.logger.debug({ key, queueDepth: lane.pending.length }, 'Task enqueued');
      this.drain(key, lane);
    });
  }

  /**
   * Tasks waiting (not counting the active one) for a key.
   */
  getQueueDepth(key: string): number {
    return this.lanes.get(key)?.pending.length ?? 0;
  }

  /**
   * Whether a task is currently running for a key.
   */
  isActive(key: string): boolean {
    return this.lanes.get(key)?.active ?? false;
  }

  /**
   * Number of keys with running or waiting tasks.
   */
  get activeKeys(): number {
    return this.lanes.size;
  }

  private getLane(key: string): KeyLane {
    let lane = this.lanes.get(key);
    if (!lane) {
      lane = { active: false, pending: [] };
      this.lanes.set(key, lane);
    }
    return lane;
  }

  private drain(key: string, lane: KeyLane): void {
    if (lane.active) return;

    const next = lane.pending.shift();
    if (!next) {
      this.lanes.delete(key);
      this.emit('key-idle', key);
      return;
    }

    lane.active = true;
    // Task wrappers settle their own promise and never reject
    void next.run().finally(() => {
      lane.active = false;
      this.drain(key, lane);
    });
  }
}
