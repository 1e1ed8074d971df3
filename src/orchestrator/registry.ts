import { createLogger } from '../utils/index.js';
import type { OrchestrationFunction } from './replay.js';

const logger = createLogger('orchestrator:registry');

/**
 * Plain async function invoked by `callActivity`. Runs outside replay, so it
 * may do I/O and need not be deterministic.
 */
export type ActivityFunction = (input: unknown) => unknown;

/**
 * Orchestrations and activities known to an engine, by name.
 */
export class OrchestrationRegistry {
  private readonly orchestrations = new Map<string, OrchestrationFunction>();
  private readonly activities = new Map<string, ActivityFunction>();

  registerOrchestration(name: string, fn: OrchestrationFunction): this {
    if (this.orchestrations.has(name)) {
      logger.warn({ name }, 'Orchestration already registered, replacing');
    }
    this.orchestrations.set(name, fn);
    logger.debug({ name }, 'Orchestration registered');
    return this;
  }

  registerActivity(name: string, fn: ActivityFunction): this {
    if (this.activities.has(name)) {
      logger.warn({ name }, 'Activity already registered, replacing');
    }
    this.activities.set(name, fn);
    logger.debug({ name }, 'Activity registered');
    return this;
  }

  getOrchestration(name: string): OrchestrationFunction | null {
    return this.orchestrations.get(name) ?? null;
  }

  getActivity(name: string): ActivityFunction | null {
    return this.activities.get(name) ?? null;
  }

  listOrchestrations(): string[] {
    return Array.from(this.orchestrations.keys());
  }

  listActivities(): string[] {
    return Array.from(this.activities.keys());
  }
}
