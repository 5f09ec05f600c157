import { JsonValue } from '../kubernetes/utils/StructuralMerge.js';

const NON_ASCII = /[\u007f-\uffff]/g;

function encodeString(value: string): string {
  return JSON.stringify(value).replace(
    NON_ASCII,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
}

function encodeNumber(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'Infinity' : '-Infinity';
  }
  return String(value);
}

/**
 * Encode a payload as a single JSON line with `", "` and `": "` separators.
 * Unbounded limits are written as the bare `Infinity` token the section
 * parsers read back, which `JSON.stringify` would turn into `null`.
 */
export function encodePayload(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    return encodeNumber(value);
  }
  if (typeof value === 'string') {
    return encodeString(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return `[${value.map(encodePayload).join(', ')}]`;
  }
  return encodeMembers(Object.entries(value));
}

/**
 * Encode key/value pairs as one JSON object, in the order given.
 */
export function encodeMembers(entries: Iterable<[string, JsonValue]>): string {
  const members: string[] = [];
  for (const [key, member] of entries) {
    members.push(`${encodeString(key)}: ${encodePayload(member)}`);
  }
  return `{${members.join(', ')}}`;
}
