import { MalformedQuantityError } from '../ErrorHandling.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/;
const NAN_PATTERN = /^[+-]?nan$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

// Checked in order: the two-letter binary suffixes must win over their one-letter prefixes.
const MEMORY_SUFFIXES: ReadonlyArray<readonly [string, number]> = [
  ['Ki', 1024 ** 1],
  ['Mi', 1024 ** 2],
  ['Gi', 1024 ** 3],
  ['Ti', 1024 ** 4],
  ['Pi', 1024 ** 5],
  ['Ei', 1024 ** 6],
  ['K', 1e3],
  ['k', 1e3],
  ['M', 1e6],
  ['G', 1e9],
  ['T', 1e12],
  ['P', 1e15],
  ['E', 1e18],
];

/**
 * Parse a plain decimal number. Accepts `inf`, `infinity` and `nan` in any case,
 * which callers use as explicit defaults for absent limits.
 */
export function parseNumber(value: string, original: string = value): number {
  const normalized = value.trim().toLowerCase();

  const infinity = INFINITY_PATTERN.exec(normalized);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }
  if (NAN_PATTERN.test(normalized)) {
    return NaN;
  }
  if (!DECIMAL_PATTERN.test(normalized)) {
    throw new MalformedQuantityError(original);
  }
  return Number(normalized);
}

/**
 * Parse a CPU quantity into cores: `500m` → 0.5, `2` → 2.
 */
export function parseFraction(value: string): number {
  if (value.endsWith('m')) {
    return 0.001 * parseNumber(value.slice(0, -1), value);
  }
  return parseNumber(value);
}

/**
 * Parse a memory quantity into bytes, honouring binary (`Ki`…`Ei`) and
 * decimal (`K`…`E`) suffixes.
 */
export function parseMemory(value: string): number {
  for (const [suffix, factor] of MEMORY_SUFFIXES) {
    if (value.endsWith(suffix)) {
      return factor * parseNumber(value.slice(0, -suffix.length), value);
    }
  }
  return parseNumber(value);
}

/**
 * Parse an integral count such as the `pods` capacity of a node.
 */
export function parseCount(value: string): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new MalformedQuantityError(value);
  }
  return parseInt(trimmed, 10);
}
