/**
 * Encoder configuration.
 *
 * These values must match between the encoder and every consumer of the
 * stored vectors (including whatever maps categorical codes back to
 * labels), so the defaults are the only values most callers should use.
 */

import { z } from 'zod';
import {
  IDENTITY_MODULUS,
  PLAYER_FEATURE_WIDTH,
  ROSTER_SIZE,
  TEAM_MODULUS,
} from './constants';
import { EncoderConfigError } from './errors';
import { PLAYER_SECTIONS_WIDTH } from './layout';
import { listIssues } from './schemas';

const MAX_MODULUS = 2 ** 32;

export const EncoderConfigSchema = z.object({
  rosterSize: z.number().int().positive(),
  playerFeatureWidth: z
    .number()
    .int()
    .min(PLAYER_SECTIONS_WIDTH, {
      message: `playerFeatureWidth must cover the ${PLAYER_SECTIONS_WIDTH} section slots`,
    }),
  identityModulus: z.number().int().positive().max(MAX_MODULUS),
  teamModulus: z.number().int().positive().max(MAX_MODULUS),
});

export type EncoderConfig = Readonly<z.infer<typeof EncoderConfigSchema>>;

export const DEFAULT_ENCODER_CONFIG: EncoderConfig = Object.freeze({
  rosterSize: ROSTER_SIZE,
  playerFeatureWidth: PLAYER_FEATURE_WIDTH,
  identityModulus: IDENTITY_MODULUS,
  teamModulus: TEAM_MODULUS,
});

/**
 * Merge overrides onto the defaults and validate.
 * @throws EncoderConfigError listing every invalid field
 */
export function resolveEncoderConfig(overrides: Partial<EncoderConfig> = {}): EncoderConfig {
  const parsed = EncoderConfigSchema.safeParse({ ...DEFAULT_ENCODER_CONFIG, ...overrides });
  if (!parsed.success) {
    throw new EncoderConfigError(listIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

const envInteger = z.coerce.number().int();

const EncoderEnvSchema = z.object({
  TENSOR_ROSTER_SIZE: envInteger.optional(),
  TENSOR_PLAYER_WIDTH: envInteger.optional(),
  TENSOR_IDENTITY_MODULUS: envInteger.optional(),
  TENSOR_TEAM_MODULUS: envInteger.optional(),
});

/**
 * Read the configuration from environment variables. Unset or empty
 * variables keep their defaults.
 */
export function loadEncoderConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): EncoderConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('TENSOR_') && value !== undefined && value.trim() !== '',
    ),
  );

  const parsed = EncoderEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new EncoderConfigError(listIssues(parsed.error));
  }

  const vars = parsed.data;
  const overrides: Partial<z.infer<typeof EncoderConfigSchema>> = {};
  if (vars.TENSOR_ROSTER_SIZE !== undefined) overrides.rosterSize = vars.TENSOR_ROSTER_SIZE;
  if (vars.TENSOR_PLAYER_WIDTH !== undefined) overrides.playerFeatureWidth = vars.TENSOR_PLAYER_WIDTH;
  if (vars.TENSOR_IDENTITY_MODULUS !== undefined) {
    overrides.identityModulus = vars.TENSOR_IDENTITY_MODULUS;
  }
  if (vars.TENSOR_TEAM_MODULUS !== undefined) overrides.teamModulus = vars.TENSOR_TEAM_MODULUS;

  return resolveEncoderConfig(overrides);
}
