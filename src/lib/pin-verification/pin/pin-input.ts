import { PIN_ALPHABET, PIN_LENGTH } from '../constants.js';

/**
 * Cleans up what a human typed into the PIN field: keeps letters and digits,
 * uppercases them and cuts the result to the PIN length.
 */
export function normalizePinInput(
  raw: string,
  length: number = PIN_LENGTH,
): string {
  return raw
    .replace(/[^\p{L}\p{N}]/gu, '')
    .toUpperCase()
    .slice(0, length);
}

export function isCompletePin(
  value: string,
  length: number = PIN_LENGTH,
  alphabet: string = PIN_ALPHABET,
): boolean {
  const candidate = value.toUpperCase();
  return (
    candidate.length === length &&
    [...candidate].every((char) => alphabet.includes(char))
  );
}
