export { SessionEntities, type SessionEntityConfig } from './session-entity.js';
