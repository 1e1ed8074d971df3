/**
 * Storage module.
 * Conversation state and orchestration history behind swappable backends.
 */

export {
  MemoryConversationStore,
  FileConversationStore,
  type ConversationStore,
} from './conversation-store.js';

export {
  MemoryOrchestrationStore,
  FileOrchestrationStore,
  type OrchestrationStore,
} from './orchestration-store.js';

export { toStoreError, isNotFound } from './store-errors.js';
