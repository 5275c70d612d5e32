export { FileSessionStore, type PersistedSession } from './session-store.js';
