import { type TLVItem, decodeTLV, encodeTLV } from '../tlv/index.js';
import { booleanField, readBoolean, readText, textField } from './fields.js';
import type { PinVerificationResult } from './types.js';

export const ResultTLVType = {
  SESSION_ID: 0x01,
  SUCCESS: 0x02,
  ERROR_MESSAGE: 0x03,
} as const;

/** The error message record is written only when one is present */
export function encodePinVerificationResult(
  result: PinVerificationResult,
): Buffer {
  const items: TLVItem[] = [
    textField(ResultTLVType.SESSION_ID, result.sessionId),
    booleanField(ResultTLVType.SUCCESS, result.success),
  ];
  if (result.errorMessage !== undefined) {
    items.push(textField(ResultTLVType.ERROR_MESSAGE, result.errorMessage));
  }
  return encodeTLV(items);
}

export function decodePinVerificationResult(
  data: Uint8Array,
): PinVerificationResult | null {
  const fields = decodeTLV(data);
  if (!fields) {
    return null;
  }

  const sessionId = readText(fields, ResultTLVType.SESSION_ID);
  const success = readBoolean(fields, ResultTLVType.SUCCESS);
  if (sessionId === undefined || success === undefined) {
    return null;
  }

  const errorMessage = readText(fields, ResultTLVType.ERROR_MESSAGE);
  return errorMessage === undefined
    ? { sessionId, success }
    : { sessionId, success, errorMessage };
}
