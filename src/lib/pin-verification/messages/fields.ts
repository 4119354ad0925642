import { TIMESTAMP_BYTE_LENGTH } from '../constants.js';
import { TLVError } from '../errors.js';
import type { TLVItem } from '../tlv/index.js';

export function textField(type: number, value: string): TLVItem {
  return { type, data: Buffer.from(value, 'utf8') };
}

export function timestampField(type: number, value: number): TLVItem {
  if (!Number.isSafeInteger(value)) {
    throw new TLVError(`Timestamp is not a safe integer: ${value}`, type);
  }
  const data = Buffer.alloc(TIMESTAMP_BYTE_LENGTH);
  data.writeBigInt64BE(BigInt(value));
  return { type, data };
}

export function booleanField(type: number, value: boolean): TLVItem {
  return { type, data: Buffer.from([value ? 1 : 0]) };
}

export function readText(
  fields: ReadonlyMap<number, Buffer>,
  type: number,
): string | undefined {
  return fields.get(type)?.toString('utf8');
}

/** Undefined unless the value is eight bytes holding a safe integer */
export function readTimestamp(
  fields: ReadonlyMap<number, Buffer>,
  type: number,
): number | undefined {
  const data = fields.get(type);
  if (!data || data.length !== TIMESTAMP_BYTE_LENGTH) {
    return undefined;
  }
  const value = Number(data.readBigInt64BE(0));
  return Number.isSafeInteger(value) ? value : undefined;
}

/** Undefined when absent or empty; any nonzero first byte is true */
export function readBoolean(
  fields: ReadonlyMap<number, Buffer>,
  type: number,
): boolean | undefined {
  const data = fields.get(type);
  if (!data || data.length === 0) {
    return undefined;
  }
  return data[0] !== 0;
}
