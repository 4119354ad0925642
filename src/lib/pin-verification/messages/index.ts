export {
  RequestTLVType,
  decodePinVerificationRequest,
  encodePinVerificationRequest,
} from './request.js';
export {
  ResponseTLVType,
  decodePinVerificationResponse,
  encodePinVerificationResponse,
} from './response.js';
export {
  ResultTLVType,
  decodePinVerificationResult,
  encodePinVerificationResult,
} from './result.js';
export type {
  PinVerificationRequest,
  PinVerificationResponse,
  PinVerificationResult,
} from './types.js';
