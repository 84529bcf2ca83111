// ============================================================================
// Feature Tensor Constants
// ============================================================================
// Single source of truth for every width, default and categorical modulus
// used by the encoders. Stored vectors depend on these values: changing
// any of them changes the meaning of every previously encoded tensor.
// ============================================================================

// ============================================================================
// PLAYER VECTOR SECTIONS
// ============================================================================

export const ROSTER_INFO_WIDTH = 9;
export const COMBINE_WIDTH = 13;
export const COLLEGE_CAREER_WIDTH = 64;
export const NFL_CAREER_WIDTH = 116;
/** Last, worst and best season blocks (team code included). */
export const SEASON_WIDTH = 117;
/** Average season block: same layout as {@link SEASON_WIDTH} without the team code. */
export const AVERAGE_SEASON_WIDTH = 116;

/**
 * Declared player vector width. The sections above only cover 669 slots;
 * index 669 is a reserved trailing slot that is always zero.
 */
export const PLAYER_FEATURE_WIDTH = 670;

// ============================================================================
// ROSTER / GAME / PLAY VECTORS
// ============================================================================

/** Rows in a roster grid. Unfilled rows hold the null player. */
export const ROSTER_SIZE = 64;

export const GAME_CONTEXT_WIDTH = 50;

export const PLAY_STATE_WIDTH = 20;

// ============================================================================
// CATEGORICAL CODES
// ============================================================================

/** Modulus for player identity codes. */
export const IDENTITY_MODULUS = 1_000_000;

/** Modulus for team codes (draft team, current team, season team). */
export const TEAM_MODULUS = 100;

/** 32-bit FNV-1a offset basis. */
export const FNV_OFFSET_BASIS = 0x811c9dc5;

/** 32-bit FNV-1a prime. */
export const FNV_PRIME = 0x01000193;

/**
 * Fixed position enumeration. Anything not listed encodes as 0.
 */
export const POSITION_CODES: Readonly<Record<string, number>> = {
  QB: 1,
  RB: 2,
  WR: 3,
  TE: 4,
  OL: 5,
  DL: 6,
  LB: 7,
  DB: 8,
  K: 9,
  P: 10,
};

// ============================================================================
// DEFAULTS FOR MISSING VALUES
// ============================================================================

export const PLAYER_DEFAULTS = {
  rosterTier: 1,
  rosterSeason: 2024,
  age: 25,
} as const;

export const GAME_CONTEXT_DEFAULTS = {
  temperature: 70,
  season: 2024,
  kickoffHour: 13,
} as const;

export const PLAY_STATE_DEFAULTS = {
  quarter: 1,
  /** Full quarter: 15 minutes. */
  clock: 900,
  down: 1,
  distance: 10,
  yardLine: 50,
  timeouts: 3,
} as const;

/** Quarter value used when the quarter is given as 'OT'. */
export const OVERTIME_QUARTER = 5;

// ============================================================================
// KEYWORD FLAGS
// ============================================================================

/** Weather keywords in flag order (game context indices 10-14). */
export const WEATHER_KEYWORDS = ['clear', 'cloudy', 'rain', 'snow', 'fog'] as const;

/** Surface keywords in flag order (game context indices 15-16). */
export const SURFACE_KEYWORDS = ['grass', 'turf'] as const;

/** Yard-line thresholds for the red-zone flag (either end of the field). */
export const RED_ZONE_NEAR = 20;
export const RED_ZONE_FAR = 80;

/** Field length used to flip the yard line for away possession. */
export const FIELD_LENGTH = 100;
