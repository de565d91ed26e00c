import { Amount } from '@shared/kernel/Amount';
import { LedgerRecord } from '@shared/kernel/LedgerRecord';

export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

/**
 * JSON-safe form of a record: amounts and other bigints become decimal
 * strings, nested objects are converted field by field.
 */
export function toWire(record: LedgerRecord): { [key: string]: WireValue } {
  return encodeObject(record);
}

/** JSON-safe form of any view or query response. */
export function toWireValue(value: unknown): WireValue {
  return encodeValue(value);
}

function encodeObject(obj: object): { [key: string]: WireValue } {
  const out: { [key: string]: WireValue } = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = encodeValue(value);
  }
  return out;
}

function encodeValue(value: unknown): WireValue {
  if (value instanceof Amount) return value.toString();
  if (typeof value === 'bigint') return value.toString();
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) return value.map(encodeValue);
  if (typeof value === 'object') return encodeObject(value);
  return null;
}
