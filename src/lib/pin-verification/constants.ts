import type { PinVerificationConfig } from './types.js';

/** Number of characters in a generated PIN */
export const PIN_LENGTH = 6;

/** Uppercase letters and digits without I, O, 0 and 1 */
export const PIN_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

/** A TLV length is a single byte */
export const TLV_MAX_VALUE_LENGTH = 0xff;

/** Width of the request timestamp field (signed 64-bit, big-endian) */
export const TIMESTAMP_BYTE_LENGTH = 8;

export const DEFAULT_PIN_VERIFICATION_CONFIG: PinVerificationConfig = {
  pinLength: PIN_LENGTH,
  pinAlphabet: PIN_ALPHABET,
};

/** Outer envelope type carried next to each payload by the transport */
export const PinVerificationMessageType = {
  REQUEST: 0x01,
  RESPONSE: 0x02,
  RESULT: 0x03,
} as const;

export type PinVerificationMessageType =
  (typeof PinVerificationMessageType)[keyof typeof PinVerificationMessageType];

export const RESULT_ERROR_MESSAGES = {
  INCORRECT_PIN: 'Incorrect PIN',
  UNKNOWN_SESSION: 'Unknown verification session',
  TOO_MANY_ATTEMPTS: 'Too many attempts',
} as const;
