import { TLV_MAX_VALUE_LENGTH } from '../constants.js';
import { TLVError } from '../errors.js';

export interface TLVItem {
  type: number;
  data: Buffer;
}

/**
 * Encodes items as consecutive `[type][length][value]` records.
 * There is no outer framing; message boundaries come from the transport.
 * @throws TLVError if a type does not fit one byte or a value exceeds 255 bytes
 */
export function encodeTLV(items: readonly TLVItem[]): Buffer {
  const chunks: Buffer[] = [];

  for (const { type, data } of items) {
    if (!Number.isInteger(type) || type < 0 || type > 0xff) {
      throw new TLVError(`TLV type out of range: ${type}`, type);
    }
    if (data.length > TLV_MAX_VALUE_LENGTH) {
      throw new TLVError(
        `TLV value for type 0x${type.toString(16)} is ${data.length} bytes, limit is ${TLV_MAX_VALUE_LENGTH}`,
        type,
      );
    }
    chunks.push(Buffer.from([type, data.length]), data);
  }

  return Buffer.concat(chunks);
}

/**
 * Decodes TLV records into a map keyed by type. Unknown types are kept so that
 * message decoders can skip them. A repeated type keeps its last value.
 * Returns null when a record's length runs past the end of the buffer.
 */
export function decodeTLV(data: Uint8Array): Map<number, Buffer> | null {
  const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  const result = new Map<number, Buffer>();
  let offset = 0;

  // a lone trailing byte cannot hold a header and is ignored
  while (offset + 2 <= buffer.length) {
    const type = buffer[offset];
    const length = buffer[offset + 1];
    offset += 2;

    if (offset + length > buffer.length) {
      return null;
    }

    result.set(type, buffer.subarray(offset, offset + length));
    offset += length;
  }

  return result;
}
