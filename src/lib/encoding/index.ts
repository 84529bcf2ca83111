export * from './types';
export * from './constants';
export * from './fields';
export * from './errors';
export {
  categoricalCode,
  coerceFlag,
  coerceFloat,
  FieldReader,
  positionCode,
  toFiniteNumber,
} from './coercion';
export {
  DEFAULT_ENCODER_CONFIG,
  EncoderConfigSchema,
  loadEncoderConfig,
  resolveEncoderConfig,
  type EncoderConfig,
} from './config';
export {
  describeLayout,
  PLAYER_SECTION_ORDER,
  PLAYER_SECTIONS_WIDTH,
  sliceRange,
  type PlayerSectionName,
  type TensorLayout,
  type TensorRange,
} from './layout';
export { encodePlayer, encodePlayerResult } from './player-encoder';
export { encodeRoster, rosterRow } from './roster-encoder';
export { encodeGameContext, encodeGameContextResult } from './game-context-encoder';
export {
  encodePlayState,
  encodePlayStateResult,
  isRedZone,
  signedYardLine,
} from './play-state-encoder';
export {
  composeGame,
  composePlay,
  encodeGame,
  encodePlay,
  gameWidth,
  playWidth,
} from './compositor';
export { createTensorEncoder, type TensorEncoder } from './tensor-encoder';
export { PlayerStateStore } from './player-state-store';
export {
  fromJsonArray,
  fromLengthPrefixed,
  toJsonArray,
  toLengthPrefixed,
} from './tensor-codec';
