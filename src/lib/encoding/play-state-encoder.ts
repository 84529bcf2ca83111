// ============================================================================
// Play State Encoder
// ============================================================================
// 20 slots:
//   0 quarter   1 clock   2 down   3 distance   4 yard line
//   5 home score   6 away score   7 possession (1 home, 0 away)
//   8 red zone     9 goal to go   10 score differential (home - away)
//  11 two-minute warning   12 home timeouts   13 away timeouts
//  14-19 reserved
//
// Yard line is absolute: yards from the goal line the home team attacks.
// The offense's distance to the end zone (the signed yard line) is the
// yard line itself when home has the ball and 100 minus it otherwise.
// ============================================================================

import { createLogger } from '@/lib/utils/logger';
import { FieldReader, isBlank } from './coercion';
import {
  FIELD_LENGTH,
  OVERTIME_QUARTER,
  PLAY_STATE_DEFAULTS,
  PLAY_STATE_WIDTH,
  RED_ZONE_FAR,
  RED_ZONE_NEAR,
} from './constants';
import { describeError, structuralFailure } from './errors';
import { listIssues, PlayStateShape } from './schemas';
import type { EncodeResult, PlayState } from './types';

const logger = createLogger('encoding:play-state');

function readQuarter(reader: FieldReader, value: unknown): number {
  if (typeof value === 'string' && value.trim().toUpperCase() === 'OT') {
    return OVERTIME_QUARTER;
  }
  return reader.float(value, PLAY_STATE_DEFAULTS.quarter);
}

function readPossession(reader: FieldReader, value: unknown): number {
  if (typeof value === 'string' && !isBlank(value)) {
    const side = value.trim().toLowerCase();
    if (side === 'home') return 1;
    if (side === 'away') return 0;
  }
  return reader.float(value) === 1 ? 1 : 0;
}

/** Yards the offense needs to score, given absolute yard line and possession flag. */
export function signedYardLine(yardLine: number, possession: number): number {
  return possession === 1 ? yardLine : FIELD_LENGTH - yardLine;
}

export function isRedZone(yardLine: number): boolean {
  return yardLine <= RED_ZONE_NEAR || yardLine >= RED_ZONE_FAR;
}

export function encodePlayStateResult(state: PlayState): EncodeResult {
  const shape = PlayStateShape.safeParse(state);
  if (!shape.success) {
    return structuralFailure(PLAY_STATE_WIDTH, 'Play state is malformed', listIssues(shape.error));
  }

  const vector = new Float32Array(PLAY_STATE_WIDTH);
  const reader = new FieldReader();

  try {
    const yardLine = reader.float(state.yardLine, PLAY_STATE_DEFAULTS.yardLine);
    const distance = reader.float(state.distance, PLAY_STATE_DEFAULTS.distance);
    const homeScore = reader.float(state.homeScore);
    const awayScore = reader.float(state.awayScore);
    const possession = readPossession(reader, state.possession);

    vector[0] = readQuarter(reader, state.quarter);
    vector[1] = reader.float(state.clock, PLAY_STATE_DEFAULTS.clock);
    vector[2] = reader.float(state.down, PLAY_STATE_DEFAULTS.down);
    vector[3] = distance;
    vector[4] = yardLine;
    vector[5] = homeScore;
    vector[6] = awayScore;
    vector[7] = possession;

    vector[8] = isRedZone(yardLine) ? 1 : 0;
    vector[9] = distance >= signedYardLine(yardLine, possession) ? 1 : 0;
    vector[10] = homeScore - awayScore;
    vector[11] = reader.flag(state.twoMinuteWarning);
    vector[12] = reader.float(state.homeTimeouts, PLAY_STATE_DEFAULTS.timeouts);
    vector[13] = reader.float(state.awayTimeouts, PLAY_STATE_DEFAULTS.timeouts);
  } catch (error) {
    return structuralFailure(PLAY_STATE_WIDTH, `Play state encoding failed: ${describeError(error)}`);
  }

  return { ok: true, vector, defaults: reader.tally() };
}

/** Encode an in-game situation. Never throws; a malformed state encodes as zeros. */
export function encodePlayState(state: PlayState): Float32Array {
  const result = encodePlayStateResult(state);
  if (!result.ok) {
    logger.warn('Play state encoded as zero vector', {
      reason: result.failure.message,
      issues: result.failure.issues,
    });
  }
  return result.vector;
}
