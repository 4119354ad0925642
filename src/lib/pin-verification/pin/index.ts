export { generatePin } from './pin-generator.js';
export { isCompletePin, normalizePinInput } from './pin-input.js';
