export { PinVerificationHandler } from './pin-verification-handler.js';
export {
  PinVerificationEvent,
  type PinVerificationTransport,
} from './types.js';
