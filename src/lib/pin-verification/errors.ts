// Base error class for all PIN verification errors
export class PinVerificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PinVerificationError';
  }
}

// Represents a failure of the secure random source while generating a PIN
export class PinGenerationError extends PinVerificationError {
  constructor(
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'PinGenerationError';
  }
}

// Represents a value that cannot be expressed as a TLV record
export class TLVError extends PinVerificationError {
  constructor(
    message: string,
    public tag?: number,
  ) {
    super(message);
    this.name = 'TLVError';
  }
}
