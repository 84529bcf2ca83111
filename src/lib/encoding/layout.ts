// ============================================================================
// Tensor Layout
// ============================================================================
// Offsets of every section and part, derived from the widths in
// constants.ts and an encoder configuration. Consumers slice stored
// vectors through this instead of hard-coding positions.
// ============================================================================

import {
  AVERAGE_SEASON_WIDTH,
  COLLEGE_CAREER_WIDTH,
  COMBINE_WIDTH,
  GAME_CONTEXT_WIDTH,
  NFL_CAREER_WIDTH,
  PLAY_STATE_WIDTH,
  ROSTER_INFO_WIDTH,
  SEASON_WIDTH,
} from './constants';

/** Half-open `[start, end)` slice of a vector. */
export interface TensorRange {
  readonly start: number;
  readonly end: number;
  readonly width: number;
}

export type PlayerSectionName =
  | 'rosterInfo'
  | 'combine'
  | 'collegeCareer'
  | 'nflCareer'
  | 'lastSeason'
  | 'worstSeason'
  | 'bestSeason'
  | 'averageSeason';

/** Fixed section order within the player vector. */
export const PLAYER_SECTION_ORDER: readonly PlayerSectionName[] = [
  'rosterInfo',
  'combine',
  'collegeCareer',
  'nflCareer',
  'lastSeason',
  'worstSeason',
  'bestSeason',
  'averageSeason',
];

/** Sum of all section widths. Slots from here to the declared width stay zero. */
export const PLAYER_SECTIONS_WIDTH =
  ROSTER_INFO_WIDTH +
  COMBINE_WIDTH +
  COLLEGE_CAREER_WIDTH +
  NFL_CAREER_WIDTH +
  3 * SEASON_WIDTH +
  AVERAGE_SEASON_WIDTH;

export interface LayoutDimensions {
  rosterSize: number;
  playerFeatureWidth: number;
}

export interface TensorLayout {
  player: {
    width: number;
    sections: Readonly<Record<PlayerSectionName, TensorRange>>;
    /** Trailing slots no section writes. */
    reserved: TensorRange;
  };
  roster: {
    rows: number;
    rowWidth: number;
    width: number;
  };
  gameContext: { width: number };
  playState: { width: number };
  game: {
    width: number;
    home: TensorRange;
    away: TensorRange;
    context: TensorRange;
  };
  play: {
    width: number;
    game: TensorRange;
    state: TensorRange;
  };
}

export function range(start: number, width: number): TensorRange {
  return { start, end: start + width, width };
}

function createCursor() {
  let offset = 0;
  return {
    next(width: number): TensorRange {
      const r = range(offset, width);
      offset += width;
      return r;
    },
  };
}

/** Section offsets within one player vector. */
export function playerSections(): Readonly<Record<PlayerSectionName, TensorRange>> {
  const cursor = createCursor();
  // Property order here is the section order.
  return {
    rosterInfo: cursor.next(ROSTER_INFO_WIDTH),
    combine: cursor.next(COMBINE_WIDTH),
    collegeCareer: cursor.next(COLLEGE_CAREER_WIDTH),
    nflCareer: cursor.next(NFL_CAREER_WIDTH),
    lastSeason: cursor.next(SEASON_WIDTH),
    worstSeason: cursor.next(SEASON_WIDTH),
    bestSeason: cursor.next(SEASON_WIDTH),
    averageSeason: cursor.next(AVERAGE_SEASON_WIDTH),
  };
}

export function describeLayout(dimensions: LayoutDimensions): TensorLayout {
  const { rosterSize, playerFeatureWidth } = dimensions;
  const rosterWidth = rosterSize * playerFeatureWidth;
  const gameWidth = 2 * rosterWidth + GAME_CONTEXT_WIDTH;

  return {
    player: {
      width: playerFeatureWidth,
      sections: playerSections(),
      reserved: range(PLAYER_SECTIONS_WIDTH, playerFeatureWidth - PLAYER_SECTIONS_WIDTH),
    },
    roster: {
      rows: rosterSize,
      rowWidth: playerFeatureWidth,
      width: rosterWidth,
    },
    gameContext: { width: GAME_CONTEXT_WIDTH },
    playState: { width: PLAY_STATE_WIDTH },
    game: {
      width: gameWidth,
      home: range(0, rosterWidth),
      away: range(rosterWidth, rosterWidth),
      context: range(2 * rosterWidth, GAME_CONTEXT_WIDTH),
    },
    play: {
      width: gameWidth + PLAY_STATE_WIDTH,
      game: range(0, gameWidth),
      state: range(gameWidth, PLAY_STATE_WIDTH),
    },
  };
}

/** View (not a copy) of `vector` over `r`. */
export function sliceRange(vector: Float32Array, r: TensorRange): Float32Array {
  return vector.subarray(r.start, r.end);
}
