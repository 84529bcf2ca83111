// ============================================================================
// Compositors
// ============================================================================
// Game vector = home roster | away roster | game context
// Play vector = game vector | play state
//
// Pure concatenation in that order: constituents are copied unchanged,
// never interleaved or trimmed. A constituent of the wrong length is a
// caller defect and throws ShapeMismatchError.
// ============================================================================

import { createLogger } from '@/lib/utils/logger';
import { DEFAULT_ENCODER_CONFIG, type EncoderConfig } from './config';
import { GAME_CONTEXT_WIDTH, PLAY_STATE_WIDTH } from './constants';
import { ShapeMismatchError } from './errors';
import { encodeGameContext } from './game-context-encoder';
import { encodePlayState } from './play-state-encoder';
import { encodeRoster } from './roster-encoder';
import type { FloatSequence, GameContext, PlayerRecord, PlayState } from './types';

const logger = createLogger('encoding:compositor');

function requireLength(part: string, vector: FloatSequence, expected: number): void {
  if (vector.length !== expected) {
    throw new ShapeMismatchError(part, expected, vector.length);
  }
}

function concat(parts: readonly FloatSequence[]): Float32Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Float32Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function gameWidth(config: EncoderConfig = DEFAULT_ENCODER_CONFIG): number {
  return 2 * config.rosterSize * config.playerFeatureWidth + GAME_CONTEXT_WIDTH;
}

export function playWidth(config: EncoderConfig = DEFAULT_ENCODER_CONFIG): number {
  return gameWidth(config) + PLAY_STATE_WIDTH;
}

/**
 * Concatenate two roster vectors and a game context vector.
 * @throws ShapeMismatchError when any part has the wrong length
 */
export function composeGame(
  home: FloatSequence,
  away: FloatSequence,
  context: FloatSequence,
  config: EncoderConfig = DEFAULT_ENCODER_CONFIG,
): Float32Array {
  const rosterWidth = config.rosterSize * config.playerFeatureWidth;
  requireLength('home roster', home, rosterWidth);
  requireLength('away roster', away, rosterWidth);
  requireLength('game context', context, GAME_CONTEXT_WIDTH);

  return concat([home, away, context]);
}

/**
 * Append a play state vector to a game vector.
 * @throws ShapeMismatchError when either part has the wrong length
 */
export function composePlay(
  game: FloatSequence,
  playState: FloatSequence,
  config: EncoderConfig = DEFAULT_ENCODER_CONFIG,
): Float32Array {
  requireLength('game', game, gameWidth(config));
  requireLength('play state', playState, PLAY_STATE_WIDTH);

  return concat([game, playState]);
}

/** Encode both rosters and the context, then compose the game vector. */
export function encodeGame(
  homeRecords: readonly PlayerRecord[],
  awayRecords: readonly PlayerRecord[],
  context: GameContext,
  config: EncoderConfig = DEFAULT_ENCODER_CONFIG,
): Float32Array {
  const game = composeGame(
    encodeRoster(homeRecords, config),
    encodeRoster(awayRecords, config),
    encodeGameContext(context),
    config,
  );
  logger.debug('Built game tensor', { length: game.length });
  return game;
}

/** Encode the play state and append it to an already-encoded game vector. */
export function encodePlay(
  game: FloatSequence,
  state: PlayState,
  config: EncoderConfig = DEFAULT_ENCODER_CONFIG,
): Float32Array {
  return composePlay(game, encodePlayState(state), config);
}
