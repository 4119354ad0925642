import { randomInt } from 'node:crypto';

import { PIN_ALPHABET, PIN_LENGTH } from '../constants.js';
import { PinGenerationError } from '../errors.js';

/**
 * Generates a PIN with every character drawn independently and uniformly
 * from `alphabet` using the CSPRNG.
 * @throws PinGenerationError if the random source fails
 */
export function generatePin(
  length: number = PIN_LENGTH,
  alphabet: string = PIN_ALPHABET,
): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new PinGenerationError(`Invalid PIN length: ${length}`);
  }
  if (alphabet.length < 2) {
    throw new PinGenerationError('PIN alphabet needs at least two characters');
  }

  let pin = '';
  try {
    for (let i = 0; i < length; i++) {
      pin += alphabet[randomInt(alphabet.length)];
    }
  } catch (error) {
    throw new PinGenerationError(
      'Secure random source failed while generating a PIN',
      error,
    );
  }
  return pin;
}
