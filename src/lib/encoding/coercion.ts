// ============================================================================
// Coercion Utilities
// ============================================================================
// Scalar-to-float conversion with defaults, and the deterministic
// string-to-code hash used for every categorical feature.
//
// categoricalCode is 32-bit FNV-1a over the UTF-8 bytes of the text. It has
// no seed and no per-process state, so a string maps to the same code in
// every process and every run. Stored vectors rely on that.
// ============================================================================

import { FNV_OFFSET_BASIS, FNV_PRIME, POSITION_CODES } from './constants';
import type { DefaultTally } from './types';

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const TRUE_STRINGS: ReadonlySet<string> = new Set(['true', 'yes', 'y', '1']);
const FALSE_STRINGS: ReadonlySet<string> = new Set(['false', 'no', 'n', '0']);

const utf8 = new TextEncoder();

// ============================================================================
// Primitive conversions
// ============================================================================

/** True for undefined, null and whitespace-only strings. */
export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  return typeof value === 'string' && value.trim() === '';
}

/**
 * Convert a raw value to a finite number, or undefined when it has no
 * numeric reading. Strings must be plain decimal literals.
 */
export function toFiniteNumber(value: unknown): number | undefined {
  switch (typeof value) {
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'boolean':
      return value ? 1 : 0;
    case 'bigint': {
      const n = Number(value);
      return Number.isFinite(n) ? n : undefined;
    }
    case 'string': {
      const text = value.trim();
      if (!DECIMAL_LITERAL.test(text)) return undefined;
      const n = Number(text);
      return Number.isFinite(n) ? n : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Returns `fallback` when `value` is absent or not convertible to a
 * finite number, otherwise the converted value. Never throws.
 */
export function coerceFloat(value: unknown, fallback: number = 0): number {
  return toFiniteNumber(value) ?? fallback;
}

/**
 * Truthiness as 1/0. Accepts booleans, numbers (non-zero is true) and
 * the strings true/false, yes/no, y/n, 1/0. Anything else is undefined.
 */
export function toFlag(value: unknown): 0 | 1 | undefined {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return Number.isNaN(value) || value === 0 ? 0 : 1;
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(text)) return 1;
    if (FALSE_STRINGS.has(text)) return 0;
  }
  return undefined;
}

export function coerceFlag(value: unknown): 0 | 1 {
  return toFlag(value) ?? 0;
}

/**
 * Deterministic code in [0, modulus) for an arbitrary string.
 *
 * Lone UTF-16 surrogates have no UTF-8 form and are encoded as U+FFFD,
 * so `'\uD800'` and `'\uFFFD'` share a code.
 */
export function categoricalCode(text: string, modulus: number): number {
  if (!Number.isInteger(modulus) || modulus <= 0) {
    throw new RangeError(`categoricalCode modulus must be a positive integer, got ${modulus}`);
  }

  let hash = FNV_OFFSET_BASIS;
  for (const byte of utf8.encode(text)) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return (hash >>> 0) % modulus;
}

/** Position code from the fixed enumeration; 0 when unknown. */
export function positionCode(value: unknown): number {
  if (typeof value !== 'string') return 0;
  return POSITION_CODES[value.trim().toUpperCase()] ?? 0;
}

// ============================================================================
// FieldReader
// ============================================================================

/**
 * Per-call coercion front end. Applies the same rules as the free
 * functions above and tallies every default it substitutes, so an encode
 * result can report how much of a record was actually populated.
 *
 * Create one per encode call; it is never shared.
 */
export class FieldReader {
  private missing = 0;
  private coerced = 0;

  float(value: unknown, fallback: number = 0): number {
    if (isBlank(value)) {
      this.missing++;
      return fallback;
    }
    const n = toFiniteNumber(value);
    if (n === undefined) {
      this.coerced++;
      return fallback;
    }
    return n;
  }

  flag(value: unknown): number {
    if (isBlank(value)) {
      this.missing++;
      return 0;
    }
    const flag = toFlag(value);
    if (flag === undefined) {
      this.coerced++;
      return 0;
    }
    return flag;
  }

  /** Categorical code of the value's text; 0 when absent or blank. */
  code(value: unknown, modulus: number): number {
    if (isBlank(value)) {
      this.missing++;
      return 0;
    }
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      this.coerced++;
      return 0;
    }
    return categoricalCode(String(value).trim(), modulus);
  }

  /** Position code; an unknown label is 0 but not a substitution. */
  position(value: unknown): number {
    if (isBlank(value)) {
      this.missing++;
      return 0;
    }
    if (typeof value !== 'string') {
      this.coerced++;
      return 0;
    }
    return positionCode(value);
  }

  /** Lower-cased free text; empty when absent or not a string. */
  text(value: unknown): string {
    if (isBlank(value)) {
      this.missing++;
      return '';
    }
    if (typeof value !== 'string') {
      this.coerced++;
      return '';
    }
    return value.toLowerCase();
  }

  tally(): DefaultTally {
    return { missing: this.missing, coerced: this.coerced };
  }
}
