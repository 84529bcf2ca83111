// ============================================================================
// Encoding Errors
// ============================================================================
// Missing and unconvertible values never throw (they are defaulted and
// tallied), and structural failures come back as tagged results. What does
// throw is a caller defect: a wrong-length vector handed to a compositor, a
// bad configuration, or malformed serialized tensor data.
// ============================================================================

import type { EncodeFailure, EncodeResult } from './types';

export class ShapeMismatchError extends Error {
  constructor(
    readonly part: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`${part} vector has length ${actual}, expected ${expected}`);
    this.name = 'ShapeMismatchError';
  }
}

export class EncoderConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid encoder configuration: ${issues.join('; ')}`);
    this.name = 'EncoderConfigError';
  }
}

export class TensorCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TensorCodecError';
  }
}

/** Zero vector of `width` wrapped in a StructuralFailure result. */
export function structuralFailure(
  width: number,
  message: string,
  issues: string[] = [],
): EncodeResult {
  const failure: EncodeFailure = { kind: 'StructuralFailure', message, issues };
  return { ok: false, vector: new Float32Array(width), failure };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
