import { decodeTLV, encodeTLV } from '../tlv/index.js';
import { readText, readTimestamp, textField, timestampField } from './fields.js';
import type { PinVerificationRequest } from './types.js';

export const RequestTLVType = {
  SESSION_ID: 0x01,
  INITIATOR_PEER_ID: 0x02,
  TIMESTAMP: 0x03,
} as const;

export function encodePinVerificationRequest(
  request: PinVerificationRequest,
): Buffer {
  return encodeTLV([
    textField(RequestTLVType.SESSION_ID, request.sessionId),
    textField(RequestTLVType.INITIATOR_PEER_ID, request.initiatorPeerId),
    timestampField(RequestTLVType.TIMESTAMP, request.timestamp),
  ]);
}

export function decodePinVerificationRequest(
  data: Uint8Array,
): PinVerificationRequest | null {
  const fields = decodeTLV(data);
  if (!fields) {
    return null;
  }

  const sessionId = readText(fields, RequestTLVType.SESSION_ID);
  const initiatorPeerId = readText(fields, RequestTLVType.INITIATOR_PEER_ID);
  const timestamp = readTimestamp(fields, RequestTLVType.TIMESTAMP);

  if (
    sessionId === undefined ||
    initiatorPeerId === undefined ||
    timestamp === undefined
  ) {
    return null;
  }
  return { sessionId, initiatorPeerId, timestamp };
}
