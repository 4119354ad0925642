import type { PinVerificationMessageType } from '../constants.js';

/**
 * Outbound side of the link layer. Delivery, retries and framing belong to
 * the implementation; the payload is one complete message.
 */
export interface PinVerificationTransport {
  send(
    peerId: string,
    type: PinVerificationMessageType,
    payload: Buffer,
  ): Promise<void>;
}

export const PinVerificationEvent = {
  /** `(initiatorPeerId, request)`: a peer asked the local user for its PIN */
  REQUESTED: 'verificationRequested',
  /** `(peerId, sessionId)` */
  VERIFIED: 'verified',
  /** `(peerId, sessionId, errorMessage)` */
  REJECTED: 'rejected',
} as const;
