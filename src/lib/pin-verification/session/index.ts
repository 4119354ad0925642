export {
  PinSessionStore,
  type PinSessionStoreOptions,
} from './session-store.js';
