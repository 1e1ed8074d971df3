export { logger, createLogger } from './logger.js';
export {
  KeyedSerialQueue,
  type KeyedSerialQueueConfig,
  type KeyedSerialQueueEvents,
} from './keyed-queue.js';
