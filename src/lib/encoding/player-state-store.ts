// ============================================================================
// Player State Store
// ============================================================================
// Latest encoded vector per player, for callers that walk games in
// chronological order and rebuild rosters from up-to-date player state.
//
// The store belongs to whoever creates it. Encoders never read from or
// write to it, and there is no module-level instance.
// ============================================================================

import { isBlank } from './coercion';
import { DEFAULT_ENCODER_CONFIG, type EncoderConfig } from './config';
import { encodePlayerResult } from './player-encoder';
import type { EncodeResult, PlayerRecord } from './types';

export class PlayerStateStore {
  private readonly vectors = new Map<string, Float32Array>();

  constructor(readonly config: EncoderConfig = DEFAULT_ENCODER_CONFIG) {}

  /**
   * Encode `record` and remember the vector under its identity.
   * Records without an identity, and records that fail to encode, are not
   * stored; an existing entry for the same identity is left untouched on
   * failure. The store keeps its own copy of the vector.
   */
  refresh(record: PlayerRecord): EncodeResult {
    const result = encodePlayerResult(record, this.config);
    const key = identityKey(record);
    if (result.ok && key !== undefined) {
      this.vectors.set(key, result.vector.slice());
    }
    return result;
  }

  /** Copy of the stored vector; changing it does not touch the store. */
  get(identity: string): Float32Array | undefined {
    return this.vectors.get(identity)?.slice();
  }

  has(identity: string): boolean {
    return this.vectors.has(identity);
  }

  delete(identity: string): boolean {
    return this.vectors.delete(identity);
  }

  clear(): void {
    this.vectors.clear();
  }

  get size(): number {
    return this.vectors.size;
  }

  /**
   * Roster vector built from stored player vectors, in the given order.
   * Unknown identities become null-player rows; identities past the
   * roster size are ignored.
   */
  buildRoster(identities: readonly string[]): Float32Array {
    const { rosterSize, playerFeatureWidth } = this.config;
    const grid = new Float32Array(rosterSize * playerFeatureWidth);

    const filled = Math.min(identities.length, rosterSize);
    for (let row = 0; row < filled; row++) {
      const vector = this.vectors.get(identities[row]);
      if (vector) {
        grid.set(vector, row * playerFeatureWidth);
      }
    }
    return grid;
  }
}

function identityKey(record: PlayerRecord): string | undefined {
  const identity: unknown = record?.identity;
  if (isBlank(identity)) return undefined;
  if (typeof identity === 'string') return identity.trim();
  if (typeof identity === 'number') return String(identity);
  return undefined;
}
