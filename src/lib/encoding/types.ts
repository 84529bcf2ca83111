// ============================================================
// Feature Tensor Type System
// ============================================================
// Input records arrive from scrapers and storage with loosely
// typed leaves, so every scalar accepts a RawValue and is
// coerced at encode time. Nested shapes are type aliases (not
// interfaces) so they stay assignable to the generic
// StatSource read by the section writers.
// ============================================================

import type {
  COLLEGE_DEFENSE_FIELDS,
  COLLEGE_KICKING_FIELDS,
  COLLEGE_PASSING_FIELDS,
  COLLEGE_RECEIVING_FIELDS,
  COLLEGE_RUSHING_FIELDS,
  COLLEGE_TENURE_FIELDS,
  COMBINE_MEASUREMENT_FIELDS,
  NFL_BASIC_FIELDS,
  NFL_DEFENSE_FIELDS,
  NFL_KICKING_FIELDS,
  NFL_PASSING_FIELDS,
  NFL_RECEIVING_FIELDS,
  NFL_RUSHING_FIELDS,
  NFL_TEAM_PERFORMANCE_FIELDS,
  SEASON_GAMES_FIELDS,
  TEAM_TOTALS_FIELDS,
} from './fields';

// ============================================================
// SCALARS
// ============================================================

/** A scalar as it appears in scraped or stored data. */
export type RawValue = number | string | boolean | null | undefined;

/** Any keyed object the section writers can read values from. */
export type StatSource = { readonly [key: string]: unknown };

type FieldName<T extends readonly string[]> = T[number];

/** Optional raw value per field name. */
export type StatBlock<K extends string> = { readonly [P in K]?: RawValue };

// ============================================================
// PLAYER RECORD
// ============================================================

export type DraftInfo = StatBlock<'team' | 'year' | 'pick'>;

export type CombineMeasurements = StatBlock<
  'year' | 'position' | FieldName<typeof COMBINE_MEASUREMENT_FIELDS>
>;

export type TeamTotals = StatBlock<FieldName<typeof TEAM_TOTALS_FIELDS>>;

export type CollegeCareer = StatBlock<FieldName<typeof COLLEGE_TENURE_FIELDS>> & {
  readonly passing?: StatBlock<FieldName<typeof COLLEGE_PASSING_FIELDS>> | null;
  readonly rushing?: StatBlock<FieldName<typeof COLLEGE_RUSHING_FIELDS>> | null;
  readonly receiving?: StatBlock<FieldName<typeof COLLEGE_RECEIVING_FIELDS>> | null;
  readonly defense?: StatBlock<FieldName<typeof COLLEGE_DEFENSE_FIELDS>> | null;
  readonly kicking?: StatBlock<FieldName<typeof COLLEGE_KICKING_FIELDS>> | null;
  readonly team?: TeamTotals | null;
  readonly opp?: TeamTotals | null;
};

export type NflCareer = StatBlock<FieldName<typeof NFL_BASIC_FIELDS>> & {
  readonly passing?: StatBlock<FieldName<typeof NFL_PASSING_FIELDS>> | null;
  readonly rushing?: StatBlock<FieldName<typeof NFL_RUSHING_FIELDS>> | null;
  readonly receiving?: StatBlock<FieldName<typeof NFL_RECEIVING_FIELDS>> | null;
  readonly defense?: StatBlock<FieldName<typeof NFL_DEFENSE_FIELDS>> | null;
  readonly kicking?: StatBlock<FieldName<typeof NFL_KICKING_FIELDS>> | null;
  readonly teamPerformance?: StatBlock<FieldName<typeof NFL_TEAM_PERFORMANCE_FIELDS>> | null;
};

/**
 * One season's split. Only the team and game counts are encoded today;
 * the rest of the per-season block is a zero-filled extension point.
 */
export type SeasonBlock = StatBlock<'team' | FieldName<typeof SEASON_GAMES_FIELDS>>;

export type SeasonalSplits = {
  readonly last?: SeasonBlock | null;
  readonly worst?: SeasonBlock | null;
  readonly best?: SeasonBlock | null;
  readonly average?: SeasonBlock | null;
};

export interface PlayerRecord {
  /** Stable external player id, e.g. a reference-site slug. */
  identity?: RawValue;
  name?: RawValue;
  position?: RawValue;
  /** Depth/roster tier. Defaults to 1. */
  rosterTier?: RawValue;
  /** Season the roster entry belongs to. Defaults to 2024. */
  rosterSeason?: RawValue;
  currentTeam?: RawValue;
  /** Defaults to 25. */
  age?: RawValue;
  draftInfo?: DraftInfo | null;
  combine?: CombineMeasurements | null;
  college?: CollegeCareer | null;
  nflCareer?: NflCareer | null;
  seasonal?: SeasonalSplits | null;
}

// ============================================================
// GAME CONTEXT & PLAY STATE
// ============================================================

export interface GameContext {
  /** Free-text weather description, e.g. "Partly cloudy, light rain". */
  weather?: RawValue;
  /** Free-text surface description, e.g. "FieldTurf". */
  surface?: RawValue;
  /** Fahrenheit. Defaults to 70. */
  temperature?: RawValue;
  /** Wind speed in mph. */
  wind?: RawValue;
  dome?: RawValue;
  playoff?: RawValue;
  week?: RawValue;
  /** Defaults to 2024. */
  season?: RawValue;
  homeWins?: RawValue;
  homeLosses?: RawValue;
  awayWins?: RawValue;
  awayLosses?: RawValue;
  /** Local kickoff hour (0-23). Defaults to 13. */
  kickoffHour?: RawValue;
}

/** Which side has the ball: 1/'home' or 0/'away'. */
export type Possession = 0 | 1 | 'home' | 'away';

export interface PlayState {
  /** 1-4, or 'OT' (encoded as 5). */
  quarter?: RawValue;
  /** Seconds remaining in the quarter. */
  clock?: RawValue;
  down?: RawValue;
  /** Yards to go for a first down. */
  distance?: RawValue;
  /**
   * Absolute yard line, 0-100, measured from the goal line the home
   * team attacks. 0 is the home team's scoring goal line, 100 is its
   * own goal line.
   */
  yardLine?: RawValue;
  homeScore?: RawValue;
  awayScore?: RawValue;
  possession?: Possession | RawValue;
  twoMinuteWarning?: RawValue;
  homeTimeouts?: RawValue;
  awayTimeouts?: RawValue;
}

// ============================================================
// ENCODE RESULTS
// ============================================================

/** Substitutions made while encoding a record that did encode. */
export interface DefaultTally {
  /** Absent or blank values replaced by their default. */
  missing: number;
  /** Present values that could not be converted and were replaced. */
  coerced: number;
}

export interface EncodeFailure {
  kind: 'StructuralFailure';
  message: string;
  issues: string[];
}

/**
 * Tagged outcome of an encode call. A failed encode still carries a
 * correctly shaped all-zero vector.
 */
export type EncodeResult =
  | { ok: true; vector: Float32Array; defaults: DefaultTally }
  | { ok: false; vector: Float32Array; failure: EncodeFailure };

/** Any ordered numeric sequence accepted by the compositors and codecs. */
export type FloatSequence = ArrayLike<number>;
