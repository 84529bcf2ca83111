// ============================================================================
// Game Context Encoder
// ============================================================================
// 50 slots:
//   0 temperature   1 dome       2 wind        3 week        4 season
//   5 home wins     6 home losses 7 away wins  8 away losses 9 playoff
//  10-14 weather flags: clear, cloudy, rain, snow, fog
//  15-16 surface flags: grass, turf
//  17 kickoff hour
//  18-49 reserved
//
// Keyword flags are independent case-insensitive substring matches over
// free text: "Cloudy, rain" sets two flags, "Overcast" sets none.
// ============================================================================

import { createLogger } from '@/lib/utils/logger';
import { FieldReader } from './coercion';
import {
  GAME_CONTEXT_DEFAULTS,
  GAME_CONTEXT_WIDTH,
  SURFACE_KEYWORDS,
  WEATHER_KEYWORDS,
} from './constants';
import { describeError, structuralFailure } from './errors';
import { GameContextShape, listIssues } from './schemas';
import type { EncodeResult, GameContext } from './types';

const logger = createLogger('encoding:game-context');

const WEATHER_OFFSET = 10;
const SURFACE_OFFSET = WEATHER_OFFSET + WEATHER_KEYWORDS.length;
const KICKOFF_HOUR_INDEX = SURFACE_OFFSET + SURFACE_KEYWORDS.length;

function keywordFlags(text: string, keywords: readonly string[]): number[] {
  return keywords.map((keyword) => (text.includes(keyword) ? 1 : 0));
}

export function encodeGameContextResult(context: GameContext): EncodeResult {
  const shape = GameContextShape.safeParse(context);
  if (!shape.success) {
    return structuralFailure(GAME_CONTEXT_WIDTH, 'Game context is malformed', listIssues(shape.error));
  }

  const vector = new Float32Array(GAME_CONTEXT_WIDTH);
  const reader = new FieldReader();

  try {
    vector[0] = reader.float(context.temperature, GAME_CONTEXT_DEFAULTS.temperature);
    vector[1] = reader.flag(context.dome);
    vector[2] = reader.float(context.wind);
    vector[3] = reader.float(context.week);
    vector[4] = reader.float(context.season, GAME_CONTEXT_DEFAULTS.season);
    vector[5] = reader.float(context.homeWins);
    vector[6] = reader.float(context.homeLosses);
    vector[7] = reader.float(context.awayWins);
    vector[8] = reader.float(context.awayLosses);
    vector[9] = reader.flag(context.playoff);

    vector.set(keywordFlags(reader.text(context.weather), WEATHER_KEYWORDS), WEATHER_OFFSET);
    vector.set(keywordFlags(reader.text(context.surface), SURFACE_KEYWORDS), SURFACE_OFFSET);

    vector[KICKOFF_HOUR_INDEX] = reader.float(
      context.kickoffHour,
      GAME_CONTEXT_DEFAULTS.kickoffHour,
    );
  } catch (error) {
    return structuralFailure(GAME_CONTEXT_WIDTH, `Game context encoding failed: ${describeError(error)}`);
  }

  return { ok: true, vector, defaults: reader.tally() };
}

/** Encode game metadata. Never throws; a malformed context encodes as zeros. */
export function encodeGameContext(context: GameContext): Float32Array {
  const result = encodeGameContextResult(context);
  if (!result.ok) {
    logger.warn('Game context encoded as zero vector', {
      reason: result.failure.message,
      issues: result.failure.issues,
    });
  }
  return result.vector;
}
