import { describe, it, expect } from 'vitest';
import {
  encodePlayState,
  fromJsonArray,
  fromLengthPrefixed,
  TensorCodecError,
  toJsonArray,
  toLengthPrefixed,
} from '@/lib/encoding';
import { createTestPlayState } from '../../helpers/test-utils';

describe('Tensor Codec', () => {
  // -----------------------------------------------------------------------
  // JSON array
  // -----------------------------------------------------------------------
  describe('JSON array', () => {
    it('writes a plain JSON array', () => {
      expect(toJsonArray(Float32Array.from([1, 0.5, -2]))).toBe('[1,0.5,-2]');
    });

    it('reads an array of numbers into a Float32Array', () => {
      const vector = fromJsonArray('[72, 1, 0]');
      expect(vector).toBeInstanceOf(Float32Array);
      expect(Array.from(vector)).toEqual([72, 1, 0]);
    });

    it('restores an encoded play state', () => {
      const state = encodePlayState(createTestPlayState());
      expect(Array.from(fromJsonArray(toJsonArray(state), 20))).toEqual(Array.from(state));
    });

    it('rejects invalid JSON', () => {
      expect(() => fromJsonArray('[1,')).toThrow(TensorCodecError);
      expect(() => fromJsonArray('[1,')).toThrow(/^Tensor JSON is not valid: /);
    });

    it('rejects non-numeric entries', () => {
      expect(() => fromJsonArray('[1,"2"]')).toThrow('Tensor JSON must be an array of numbers');
      expect(() => fromJsonArray('{"length":1}')).toThrow('Tensor JSON must be an array of numbers');
    });

    it('rejects an unexpected length', () => {
      expect(() => fromJsonArray('[1,2]', 3)).toThrow('Decoded tensor has length 2, expected 3');
    });
  });

  // -----------------------------------------------------------------------
  // Length-prefixed binary
  // -----------------------------------------------------------------------
  describe('length-prefixed', () => {
    it('writes a little-endian count followed by float32 values', () => {
      expect(Array.from(toLengthPrefixed([1]))).toEqual([1, 0, 0, 0, 0, 0, 0x80, 0x3f]);
      expect(toLengthPrefixed(new Float32Array(20)).byteLength).toBe(84);
    });

    it('reads back what it writes', () => {
      const state = encodePlayState(createTestPlayState());
      expect(Array.from(fromLengthPrefixed(toLengthPrefixed(state), 20))).toEqual(
        Array.from(state),
      );
    });

    it('reads from a view at a non-zero offset', () => {
      const framed = new Uint8Array(12);
      framed.set([1, 0, 0, 0, 0, 0, 0x80, 0x3f], 4);
      expect(Array.from(fromLengthPrefixed(framed.subarray(4)))).toEqual([1]);
    });

    it('rejects a buffer shorter than the header', () => {
      expect(() => fromLengthPrefixed(new Uint8Array(2))).toThrow(
        'Tensor buffer is 2 bytes, too short for a header',
      );
    });

    it('rejects a count that disagrees with the payload', () => {
      const bytes = Uint8Array.from([2, 0, 0, 0, 0, 0, 0x80, 0x3f]);
      expect(() => fromLengthPrefixed(bytes)).toThrow(
        'Tensor buffer holds 8 bytes, header declares 2 values (12 bytes)',
      );
    });

    it('rejects an unexpected length', () => {
      expect(() => fromLengthPrefixed(toLengthPrefixed([1, 2]), 20)).toThrow(
        'Decoded tensor has length 2, expected 20',
      );
    });
  });
});
