import { decodeTLV, encodeTLV } from '../tlv/index.js';
import { readText, textField } from './fields.js';
import type { PinVerificationResponse } from './types.js';

export const ResponseTLVType = {
  SESSION_ID: 0x01,
  ENTERED_PIN: 0x02,
  RESPONDER_PEER_ID: 0x03,
} as const;

export function encodePinVerificationResponse(
  response: PinVerificationResponse,
): Buffer {
  return encodeTLV([
    textField(ResponseTLVType.SESSION_ID, response.sessionId),
    textField(ResponseTLVType.ENTERED_PIN, response.enteredPin),
    textField(ResponseTLVType.RESPONDER_PEER_ID, response.responderPeerId),
  ]);
}

export function decodePinVerificationResponse(
  data: Uint8Array,
): PinVerificationResponse | null {
  const fields = decodeTLV(data);
  if (!fields) {
    return null;
  }

  const sessionId = readText(fields, ResponseTLVType.SESSION_ID);
  const enteredPin = readText(fields, ResponseTLVType.ENTERED_PIN);
  const responderPeerId = readText(fields, ResponseTLVType.RESPONDER_PEER_ID);

  if (
    sessionId === undefined ||
    enteredPin === undefined ||
    responderPeerId === undefined
  ) {
    return null;
  }
  return { sessionId, enteredPin, responderPeerId };
}
