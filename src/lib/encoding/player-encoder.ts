// ============================================================================
// Player Feature Encoder
// ============================================================================
// Maps one player record to a fixed-width Float32Array:
//
//   RosterInfo      9   identity, position, tier, draft team/year/pick,
//                       roster season, current team, age
//   Combine        13   year, position, 8 measurements, 3 reserved
//   CollegeCareer  64   tenure, passing, rushing, receiving, defense,
//                       kicking, team totals, opponent totals
//   NFLCareer     116   basic, passing, rushing, receiving, defense,
//                       kicking, team performance, zero fill
//   Last/Worst/Best
//   Season    3 x 117   team code, games played, games started, zero fill
//   AverageSeason 116   games played, games started, zero fill
//
// The sections cover 669 slots of the declared 670. The trailing slot is
// reserved and always zero, which keeps the layout identical to vectors
// already in storage.
//
// Per-season detail beyond the game counts is not encoded: the rest of
// each season block is zero fill, kept as an extension point.
// ============================================================================

import { createLogger } from '@/lib/utils/logger';
import { FieldReader } from './coercion';
import { DEFAULT_ENCODER_CONFIG, type EncoderConfig } from './config';
import { PLAYER_DEFAULTS } from './constants';
import { describeError, structuralFailure } from './errors';
import {
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
import { playerSections, type TensorRange } from './layout';
import { listIssues, PlayerRecordShape } from './schemas';
import { SectionWriter } from './section-writer';
import type { EncodeResult, PlayerRecord, SeasonBlock } from './types';

const logger = createLogger('encoding:player');

const SECTIONS = playerSections();

/** Plain object or undefined; anything else is treated as absent. */
function asSection<T extends object>(value: T | null | undefined): T | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? value : undefined;
}

// ============================================================================
// Sections
// ============================================================================

function writeRosterInfo(
  out: Float32Array,
  reader: FieldReader,
  record: PlayerRecord,
  config: EncoderConfig,
): void {
  // A draftInfo that is not an object is ignored rather than failing the record.
  const draft = asSection(record.draftInfo);

  new SectionWriter(out, SECTIONS.rosterInfo, reader, 'rosterInfo')
    .code(record.identity, config.identityModulus)
    .position(record.position)
    .float(record.rosterTier, PLAYER_DEFAULTS.rosterTier)
    .code(draft?.team, config.teamModulus)
    .float(draft?.year)
    .float(draft?.pick)
    .float(record.rosterSeason, PLAYER_DEFAULTS.rosterSeason)
    .code(record.currentTeam, config.teamModulus)
    .float(record.age, PLAYER_DEFAULTS.age);
}

function writeCombine(out: Float32Array, reader: FieldReader, record: PlayerRecord): void {
  const combine = asSection(record.combine);

  new SectionWriter(out, SECTIONS.combine, reader, 'combine')
    .float(combine?.year)
    .position(combine?.position)
    .fields(combine, COMBINE_MEASUREMENT_FIELDS);
}

function writeCollegeCareer(out: Float32Array, reader: FieldReader, record: PlayerRecord): void {
  const college = asSection(record.college);

  new SectionWriter(out, SECTIONS.collegeCareer, reader, 'collegeCareer')
    .fields(college, COLLEGE_TENURE_FIELDS)
    .fields(college?.passing, COLLEGE_PASSING_FIELDS)
    .fields(college?.rushing, COLLEGE_RUSHING_FIELDS)
    .fields(college?.receiving, COLLEGE_RECEIVING_FIELDS)
    .fields(college?.defense, COLLEGE_DEFENSE_FIELDS)
    .fields(college?.kicking, COLLEGE_KICKING_FIELDS)
    .fields(college?.team, TEAM_TOTALS_FIELDS)
    .fields(college?.opp, TEAM_TOTALS_FIELDS);
}

function writeNflCareer(out: Float32Array, reader: FieldReader, record: PlayerRecord): void {
  const nfl = asSection(record.nflCareer);

  new SectionWriter(out, SECTIONS.nflCareer, reader, 'nflCareer')
    .fields(nfl, NFL_BASIC_FIELDS)
    .fields(nfl?.passing, NFL_PASSING_FIELDS)
    .fields(nfl?.rushing, NFL_RUSHING_FIELDS)
    .fields(nfl?.receiving, NFL_RECEIVING_FIELDS)
    .fields(nfl?.defense, NFL_DEFENSE_FIELDS)
    .fields(nfl?.kicking, NFL_KICKING_FIELDS)
    .fields(nfl?.teamPerformance, NFL_TEAM_PERFORMANCE_FIELDS);
}

function writeSeason(
  out: Float32Array,
  reader: FieldReader,
  section: TensorRange,
  name: string,
  season: SeasonBlock | null | undefined,
  config: EncoderConfig,
  includeTeam: boolean,
): void {
  const block = asSection(season);
  const writer = new SectionWriter(out, section, reader, name);

  if (includeTeam) {
    writer.code(block?.team, config.teamModulus);
  }
  writer.fields(block, SEASON_GAMES_FIELDS);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Encode one player record, reporting how it went.
 *
 * Missing and unconvertible values are defaulted and counted in
 * `defaults`. A record that is not an object, or whose nested sections
 * are not objects, yields `{ ok: false }` with an all-zero vector.
 */
export function encodePlayerResult(
  record: PlayerRecord,
  config: EncoderConfig = DEFAULT_ENCODER_CONFIG,
): EncodeResult {
  const width = config.playerFeatureWidth;

  const shape = PlayerRecordShape.safeParse(record);
  if (!shape.success) {
    return structuralFailure(width, 'Player record is malformed', listIssues(shape.error));
  }

  const vector = new Float32Array(width);
  const reader = new FieldReader();

  try {
    writeRosterInfo(vector, reader, record, config);
    writeCombine(vector, reader, record);
    writeCollegeCareer(vector, reader, record);
    writeNflCareer(vector, reader, record);

    const seasonal = asSection(record.seasonal);
    writeSeason(vector, reader, SECTIONS.lastSeason, 'lastSeason', seasonal?.last, config, true);
    writeSeason(vector, reader, SECTIONS.worstSeason, 'worstSeason', seasonal?.worst, config, true);
    writeSeason(vector, reader, SECTIONS.bestSeason, 'bestSeason', seasonal?.best, config, true);
    writeSeason(
      vector,
      reader,
      SECTIONS.averageSeason,
      'averageSeason',
      seasonal?.average,
      config,
      false,
    );
  } catch (error) {
    return structuralFailure(width, `Player encoding failed: ${describeError(error)}`);
  }

  return { ok: true, vector, defaults: reader.tally() };
}

/**
 * Encode one player record. Never throws: a structural failure is logged
 * and comes back as the all-zero vector of the configured width.
 */
export function encodePlayer(
  record: PlayerRecord,
  config: EncoderConfig = DEFAULT_ENCODER_CONFIG,
): Float32Array {
  const result = encodePlayerResult(record, config);
  if (!result.ok) {
    logger.warn('Player record encoded as zero vector', {
      reason: result.failure.message,
      issues: result.failure.issues,
    });
  }
  return result.vector;
}
