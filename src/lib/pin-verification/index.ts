export {
  DEFAULT_PIN_VERIFICATION_CONFIG,
  PIN_ALPHABET,
  PIN_LENGTH,
  PinVerificationMessageType,
  RESULT_ERROR_MESSAGES,
  TLV_MAX_VALUE_LENGTH,
} from './constants.js';
export { PinGenerationError, PinVerificationError, TLVError } from './errors.js';
export {
  RequestTLVType,
  ResponseTLVType,
  ResultTLVType,
  decodePinVerificationRequest,
  decodePinVerificationResponse,
  decodePinVerificationResult,
  encodePinVerificationRequest,
  encodePinVerificationResponse,
  encodePinVerificationResult,
  type PinVerificationRequest,
  type PinVerificationResponse,
  type PinVerificationResult,
} from './messages/index.js';
export { generatePin, isCompletePin, normalizePinInput } from './pin/index.js';
export {
  PinVerificationEvent,
  PinVerificationHandler,
  type PinVerificationTransport,
} from './protocol/index.js';
export {
  PinSessionStore,
  type PinSessionStoreOptions,
} from './session/index.js';
export { resolveUIState, resolveVerificationStatus } from './status/index.js';
export { decodeTLV, encodeTLV, type TLVItem } from './tlv/index.js';
export {
  VerificationStatus,
  type PinSession,
  type PinVerificationConfig,
  type PinVerificationUIState,
  type SessionStoreStats,
} from './types.js';
