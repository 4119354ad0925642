import type { PinSessionStore } from '../session/index.js';
import {
  type PinVerificationUIState,
  VerificationStatus,
} from '../types.js';

/** Read from the live session on every call; nothing is cached */
export function resolveVerificationStatus(
  store: PinSessionStore,
  peerId: string,
): VerificationStatus {
  return store.getStatus(peerId);
}

/**
 * Builds the snapshot rendered by banners and dialogs. Sessions only live in
 * the initiator's store, so the PIN is included while pairing is pending.
 */
export function resolveUIState(
  store: PinSessionStore,
  peerId: string,
  errorMessage?: string,
): PinVerificationUIState {
  const status = store.getStatus(peerId);
  const session = store.getSessionForPeer(peerId);
  const state: PinVerificationUIState = { status, peerId };

  if (session) {
    state.sessionId = session.sessionId;
    if (
      status === VerificationStatus.PENDING_INITIATOR ||
      status === VerificationStatus.PENDING_RESPONDER
    ) {
      state.pin = session.pin;
    }
  }
  if (errorMessage !== undefined) {
    state.errorMessage = errorMessage;
  }
  return state;
}
