// ============================================================================
// Tensor Codec
// ============================================================================
// Two storage encodings for encoded vectors:
//
//   JSON array      `[72,1,0,...]`
//   Length-prefixed 4-byte little-endian unsigned count, then `count`
//                   little-endian float32 values
//
// The encoders never depend on either format; these helpers exist for
// the storage collaborators on the other side.
// ============================================================================

import { z } from 'zod';
import { describeError, TensorCodecError } from './errors';
import type { FloatSequence } from './types';

const HEADER_BYTES = 4;
const FLOAT_BYTES = 4;

const NumberArray = z.array(z.number());

function checkLength(actual: number, expected: number | undefined): void {
  if (expected !== undefined && actual !== expected) {
    throw new TensorCodecError(`Decoded tensor has length ${actual}, expected ${expected}`);
  }
}

export function toJsonArray(vector: FloatSequence): string {
  return JSON.stringify(Array.from(vector));
}

/**
 * @throws TensorCodecError on invalid JSON, non-numeric entries, or a
 * length other than `expectedLength`
 */
export function fromJsonArray(text: string, expectedLength?: number): Float32Array {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new TensorCodecError(`Tensor JSON is not valid: ${describeError(error)}`);
  }

  const parsed = NumberArray.safeParse(raw);
  if (!parsed.success) {
    throw new TensorCodecError('Tensor JSON must be an array of numbers');
  }

  checkLength(parsed.data.length, expectedLength);
  return Float32Array.from(parsed.data);
}

export function toLengthPrefixed(vector: FloatSequence): Uint8Array {
  const bytes = new Uint8Array(HEADER_BYTES + vector.length * FLOAT_BYTES);
  const view = new DataView(bytes.buffer);

  view.setUint32(0, vector.length, true);
  for (let i = 0; i < vector.length; i++) {
    view.setFloat32(HEADER_BYTES + i * FLOAT_BYTES, vector[i], true);
  }
  return bytes;
}

/**
 * @throws TensorCodecError when the buffer is truncated, has trailing
 * bytes, or holds a length other than `expectedLength`
 */
export function fromLengthPrefixed(bytes: Uint8Array, expectedLength?: number): Float32Array {
  if (bytes.byteLength < HEADER_BYTES) {
    throw new TensorCodecError(`Tensor buffer is ${bytes.byteLength} bytes, too short for a header`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const count = view.getUint32(0, true);
  const expectedBytes = HEADER_BYTES + count * FLOAT_BYTES;
  if (bytes.byteLength !== expectedBytes) {
    throw new TensorCodecError(
      `Tensor buffer holds ${bytes.byteLength} bytes, header declares ${count} values (${expectedBytes} bytes)`,
    );
  }

  checkLength(count, expectedLength);

  const out = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = view.getFloat32(HEADER_BYTES + i * FLOAT_BYTES, true);
  }
  return out;
}
