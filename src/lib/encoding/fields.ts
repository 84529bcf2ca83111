// ============================================================================
// Stat Field Orders
// ============================================================================
// The order of each list is the order the values appear in the encoded
// vector. Never reorder an existing list; append only where a section
// still has zero-filled room.
// ============================================================================

export const COMBINE_MEASUREMENT_FIELDS = [
  'height',
  'weight',
  'forty',
  'bench',
  'broadJump',
  'shuttle',
  'threeCone',
  'vertical',
] as const;

// ----------------------------------------------------------------------------
// College career (64 slots, 63 used)
// ----------------------------------------------------------------------------

export const COLLEGE_TENURE_FIELDS = [
  'seasons',
  'firstSeasonSchool',
  'lastSeasonSchool',
  'firstSchoolSeasons',
  'lastSchoolSeasons',
] as const;

export const COLLEGE_PASSING_FIELDS = [
  'completions',
  'attempts',
  'yards',
  'touchdowns',
  'interceptions',
] as const;

export const COLLEGE_RUSHING_FIELDS = ['attempts', 'yards', 'touchdowns'] as const;

export const COLLEGE_RECEIVING_FIELDS = ['receptions', 'yards', 'touchdowns'] as const;

export const COLLEGE_DEFENSE_FIELDS = [
  'tackles',
  'sacks',
  'interceptions',
  'intYards',
  'intTouchdowns',
  'passesDefended',
  'fumblesRecovered',
  'fumbleReturnYards',
  'forcedFumbles',
  'tacklesForLoss',
  'qbHits',
] as const;

export const COLLEGE_KICKING_FIELDS = [
  'fieldGoalsMade',
  'fieldGoalsAttempted',
  'extraPointsMade',
  'extraPointsAttempted',
  'punts',
  'puntYards',
] as const;

/** Shared by the `team` and `opp` college blocks. */
export const TEAM_TOTALS_FIELDS = [
  'passCompletions',
  'passAttempts',
  'passYards',
  'passTouchdowns',
  'rushAttempts',
  'rushYards',
  'rushTouchdowns',
  'totalPlays',
  'passFirstDowns',
  'rushFirstDowns',
  'penaltyFirstDowns',
  'penalties',
  'penaltyYards',
  'fumbles',
  'interceptions',
] as const;

// ----------------------------------------------------------------------------
// NFL career (116 slots, 85 used)
// ----------------------------------------------------------------------------

export const NFL_BASIC_FIELDS = ['seasonsPlayed', 'gamesPlayed', 'gamesStarted'] as const;

export const NFL_PASSING_FIELDS = [
  'record',
  'completions',
  'attempts',
  'yards',
  'touchdowns',
  'interceptions',
  'firstDowns',
  'longest',
  'sacked',
  'fourthQuarterComebacks',
  'gameWinningDrives',
] as const;

export const NFL_RUSHING_FIELDS = [
  'attempts',
  'yards',
  'touchdowns',
  'firstDowns',
  'longest',
] as const;

export const NFL_RECEIVING_FIELDS = [
  'targets',
  'receptions',
  'yards',
  'touchdowns',
  'firstDowns',
  'longest',
] as const;

export const NFL_DEFENSE_FIELDS = [
  'interceptions',
  'intYards',
  'intTouchdowns',
  'intLongest',
  'passesDefended',
  'forcedFumbles',
  'fumbles',
  'fumblesRecovered',
  'fumbleReturnYards',
  'fumbleReturnTouchdowns',
  'sacks',
  'soloTackles',
  'assistedTackles',
  'tacklesForLoss',
  'qbHits',
] as const;

export const NFL_KICKING_FIELDS = [
  'fga0to19',
  'fgm0to19',
  'fga20to29',
  'fgm20to29',
  'fga30to39',
  'fgm30to39',
  'fga40to49',
  'fgm40to49',
  'fga50plus',
  'fgm50plus',
  'longest',
  'extraPointsAttempted',
  'extraPointsMade',
  'punts',
  'puntYards',
] as const;

export const NFL_TEAM_PERFORMANCE_FIELDS = [
  'offPoints',
  'offYards',
  'offPlays',
  'offTurnovers',
  'offFumbles',
  'offFirstDowns',
  'passCompletions',
  'passAttempts',
  'passYards',
  'passTouchdowns',
  'rushAttempts',
  'rushYards',
  'rushTouchdowns',
  'penalties',
  'penaltyYards',
  'defPoints',
  'defYards',
  'defPlays',
  'defTurnovers',
  'defFumbles',
  'defFirstDowns',
  'defPassCompletions',
  'defPassAttempts',
  'defPassYards',
  'defPassTouchdowns',
  'defRushAttempts',
  'defRushYards',
  'defRushTouchdowns',
  'oppPenalties',
  'oppPenaltyYards',
] as const;

// ----------------------------------------------------------------------------
// Seasonal splits
// ----------------------------------------------------------------------------

export const SEASON_GAMES_FIELDS = ['gamesPlayed', 'gamesStarted'] as const;
