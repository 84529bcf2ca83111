// ============================================================================
// Roster Encoder
// ============================================================================
// A roster grid is `rosterSize` rows of `playerFeatureWidth` columns,
// flattened row-major. Rows follow the input order exactly (callers sort,
// e.g. by depth chart). Rows past the supplied records hold the null
// player (all zeros); records past the last row are ignored.
// ============================================================================

import { createLogger } from '@/lib/utils/logger';
import { DEFAULT_ENCODER_CONFIG, type EncoderConfig } from './config';
import { encodePlayer } from './player-encoder';
import type { PlayerRecord } from './types';

const logger = createLogger('encoding:roster');

export function encodeRoster(
  records: readonly PlayerRecord[],
  config: EncoderConfig = DEFAULT_ENCODER_CONFIG,
): Float32Array {
  const { rosterSize, playerFeatureWidth } = config;
  const grid = new Float32Array(rosterSize * playerFeatureWidth);

  const input: unknown = records;
  if (!Array.isArray(input)) {
    logger.warn('Roster input is not an array; encoding an empty roster', {
      received: input === null ? 'null' : typeof input,
    });
    return grid;
  }

  const filled = Math.min(records.length, rosterSize);
  for (let row = 0; row < filled; row++) {
    grid.set(encodePlayer(records[row], config), row * playerFeatureWidth);
  }

  if (records.length > rosterSize) {
    logger.debug('Roster truncated', { supplied: records.length, kept: rosterSize });
  }
  logger.debug('Built roster tensor', { players: filled, rows: rosterSize });

  return grid;
}

/**
 * View of one row of an encoded roster grid.
 * @throws RangeError when `row` is outside the grid
 */
export function rosterRow(
  roster: Float32Array,
  row: number,
  config: EncoderConfig = DEFAULT_ENCODER_CONFIG,
): Float32Array {
  if (!Number.isInteger(row) || row < 0 || row >= config.rosterSize) {
    throw new RangeError(`Roster row ${row} is outside 0..${config.rosterSize - 1}`);
  }
  const start = row * config.playerFeatureWidth;
  return roster.subarray(start, start + config.playerFeatureWidth);
}
