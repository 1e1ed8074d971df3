/**
 * Event bus.
 *
 * Delivers external signals (approvals and the like) into running instances
 * by instance id and event name. Delivery is ordered per instance through the
 * engine's serial queue, so same-name events keep their arrival order.
 */

import { EventEmitter } from 'node:events';
import { EventMismatchError, serializeError, type SerializedError } from '../types/index.js';
import { createLogger } from '../utils/index.js';
import type { OrchestrationEngine } from './engine.js';

const log = createLogger('event-bus');

export type RaiseResult =
  | { delivered: true }
  | { delivered: false; reason: 'unknown_instance' | 'terminal_instance'; error: SerializedError };

export interface RaisedEvent {
  instanceId: string;
  eventName: string;
  payload: unknown;
}

/**
 * Events emitted by EventBus.
 */
export interface EventBusEvents {
  'delivered': (event: RaisedEvent) => void;
  'rejected': (event: RaisedEvent, error: EventMismatchError) => void;
}

export class EventBus extends EventEmitter {
  constructor(private readonly engine: Pick<OrchestrationEngine, 'deliverEvent'>) {
    super();
  }

  /**
   * Raise an event. An unknown or terminal target is reported in the result
   * and logged; it is never thrown. Store failures still propagate.
   */
  async raise(instanceId: string, eventName: string, payload: unknown): Promise<RaiseResult> {
    const delivery = await this.engine.deliverEvent(instanceId, eventName, payload);
    const event: RaisedEvent = { instanceId, eventName, payload };

    if (delivery === 'delivered') {
      log.info({ instanceId, eventName }, 'Event delivered');
      this.emit('delivered', event);
      return { delivered: true };
    }

    const mismatch = new EventMismatchError(instanceId, eventName, delivery);
    log.warn({ instanceId, eventName, reason: delivery }, mismatch.message);
    this.emit('rejected', event, mismatch);
    return { delivered: false, reason: delivery, error: serializeError(mismatch) };
  }
}
