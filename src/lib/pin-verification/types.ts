/**
 * Verification status of a peer as seen by the presentation layer.
 * Always derived from session state, never stored.
 */
export enum VerificationStatus {
  /** No session exists for the peer */
  NOT_REQUIRED = 'NOT_REQUIRED',
  /** The peer started pairing and waits for the responder's PIN */
  PENDING_INITIATOR = 'PENDING_INITIATOR',
  /** The peer must enter the PIN shown on the initiator */
  PENDING_RESPONDER = 'PENDING_RESPONDER',
  VERIFIED = 'VERIFIED',
  /** Reserved for attempt-based lockout, off unless `attemptLimit` is set */
  BLOCKED = 'BLOCKED',
}

/** One pairing attempt between two peers on a single connection */
export interface PinSession {
  pin: string;
  /** `<connectionAddress>_<createdAt>`, suffixed with a counter on collision */
  sessionId: string;
  initiatorPeerId: string;
  responderPeerId: string;
  connectionAddress: string;
  /** Milliseconds since epoch */
  createdAt: number;
  verified: boolean;
  attemptCount: number;
}

export interface PinVerificationUIState {
  status: VerificationStatus;
  /** Only populated on the initiator side */
  pin?: string;
  peerId?: string;
  sessionId?: string;
  errorMessage?: string;
}

export interface PinVerificationConfig {
  pinLength: number;
  pinAlphabet: string;
  /**
   * Lockout extension point: attempts after which an unverified session is
   * reported as BLOCKED. Unset (the default) means no lockout.
   */
  attemptLimit?: number;
}

export interface SessionStoreStats {
  activeSessions: number;
  peerMappings: number;
}
