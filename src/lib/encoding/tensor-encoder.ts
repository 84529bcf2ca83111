import { type EncoderConfig, resolveEncoderConfig } from './config';
import { composeGame, composePlay, encodeGame, encodePlay } from './compositor';
import { encodeGameContext, encodeGameContextResult } from './game-context-encoder';
import { describeLayout, type TensorLayout } from './layout';
import { encodePlayStateResult, encodePlayState } from './play-state-encoder';
import { encodePlayer, encodePlayerResult } from './player-encoder';
import { encodeRoster, rosterRow } from './roster-encoder';
import type { EncodeResult, FloatSequence, GameContext, PlayerRecord, PlayState } from './types';

export interface TensorEncoder {
  readonly config: EncoderConfig;
  readonly layout: TensorLayout;
  encodePlayer(record: PlayerRecord): Float32Array;
  encodePlayerResult(record: PlayerRecord): EncodeResult;
  encodeRoster(records: readonly PlayerRecord[]): Float32Array;
  rosterRow(roster: Float32Array, row: number): Float32Array;
  encodeGameContext(context: GameContext): Float32Array;
  encodeGameContextResult(context: GameContext): EncodeResult;
  encodePlayState(state: PlayState): Float32Array;
  encodePlayStateResult(state: PlayState): EncodeResult;
  composeGame(home: FloatSequence, away: FloatSequence, context: FloatSequence): Float32Array;
  composePlay(game: FloatSequence, playState: FloatSequence): Float32Array;
  encodeGame(
    homeRecords: readonly PlayerRecord[],
    awayRecords: readonly PlayerRecord[],
    context: GameContext,
  ): Float32Array;
  encodePlay(game: FloatSequence, state: PlayState): Float32Array;
}

/**
 * Bind every encoder and compositor to one validated configuration.
 *
 * @throws EncoderConfigError when the overrides are invalid
 */
export function createTensorEncoder(overrides: Partial<EncoderConfig> = {}): TensorEncoder {
  const config = resolveEncoderConfig(overrides);
  const layout = describeLayout(config);

  return {
    config,
    layout,
    encodePlayer: (record) => encodePlayer(record, config),
    encodePlayerResult: (record) => encodePlayerResult(record, config),
    encodeRoster: (records) => encodeRoster(records, config),
    rosterRow: (roster, row) => rosterRow(roster, row, config),
    encodeGameContext,
    encodeGameContextResult,
    encodePlayState,
    encodePlayStateResult,
    composeGame: (home, away, context) => composeGame(home, away, context, config),
    composePlay: (game, playState) => composePlay(game, playState, config),
    encodeGame: (homeRecords, awayRecords, context) =>
      encodeGame(homeRecords, awayRecords, context, config),
    encodePlay: (game, state) => encodePlay(game, state, config),
  };
}
