export * from './lib/pin-verification/index.js';
