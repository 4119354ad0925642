export {
  resolveUIState,
  resolveVerificationStatus,
} from './status-resolver.js';
