export { SessionStore, type SessionMessage, type SessionStoreOptions } from './session-store.js';
