/** Sent by the initiator to open a verification with the responder */
export interface PinVerificationRequest {
  readonly sessionId: string;
  readonly initiatorPeerId: string;
  /** Milliseconds since epoch */
  readonly timestamp: number;
}

/** Sent by the responder with the PIN the user typed */
export interface PinVerificationResponse {
  readonly sessionId: string;
  readonly enteredPin: string;
  readonly responderPeerId: string;
}

/** Sent back by the initiator once the entered PIN has been checked */
export interface PinVerificationResult {
  readonly sessionId: string;
  readonly success: boolean;
  readonly errorMessage?: string;
}
