import { describe, it, expect } from 'vitest';
import {
  createTensorEncoder,
  DEFAULT_ENCODER_CONFIG,
  EncoderConfigError,
  loadEncoderConfig,
  resolveEncoderConfig,
} from '@/lib/encoding';
import { createTestGameContext, createTestRoster } from '../../helpers/test-utils';

function configError(run: () => unknown): EncoderConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof EncoderConfigError) return error;
    throw error;
  }
  throw new Error('expected an EncoderConfigError');
}

describe('Encoder Configuration', () => {
  describe('resolveEncoderConfig', () => {
    it('returns the defaults when nothing is overridden', () => {
      expect(resolveEncoderConfig()).toEqual({
        rosterSize: 64,
        playerFeatureWidth: 670,
        identityModulus: 1_000_000,
        teamModulus: 100,
      });
      expect(DEFAULT_ENCODER_CONFIG.rosterSize).toBe(64);
    });

    it('merges overrides onto the defaults', () => {
      const config = resolveEncoderConfig({ rosterSize: 53 });
      expect(config.rosterSize).toBe(53);
      expect(config.playerFeatureWidth).toBe(670);
    });

    it('returns a frozen object', () => {
      expect(Object.isFrozen(resolveEncoderConfig({ teamModulus: 32 }))).toBe(true);
    });

    it('rejects a non-positive roster size', () => {
      const error = configError(() => resolveEncoderConfig({ rosterSize: 0 }));
      expect(error.issues).toEqual(['rosterSize: Number must be greater than 0']);
      expect(error.message).toBe(
        'Invalid encoder configuration: rosterSize: Number must be greater than 0',
      );
    });

    it('rejects a player width narrower than the sections', () => {
      const error = configError(() => resolveEncoderConfig({ playerFeatureWidth: 600 }));
      expect(error.issues).toEqual([
        'playerFeatureWidth: playerFeatureWidth must cover the 669 section slots',
      ]);
    });

    it('reports every invalid field at once', () => {
      const error = configError(() =>
        resolveEncoderConfig({ identityModulus: 0, teamModulus: 1.5 }),
      );
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^identityModulus: /);
      expect(error.issues[1]).toMatch(/^teamModulus: /);
    });
  });

  describe('loadEncoderConfig', () => {
    it('uses the defaults for an empty environment', () => {
      expect(loadEncoderConfig({})).toEqual(DEFAULT_ENCODER_CONFIG);
    });

    it('reads integer overrides from TENSOR_ variables', () => {
      const config = loadEncoderConfig({
        TENSOR_ROSTER_SIZE: '53',
        TENSOR_PLAYER_WIDTH: '700',
        TENSOR_IDENTITY_MODULUS: '1000',
        TENSOR_TEAM_MODULUS: ' 64 ',
        PATH: '/usr/bin',
      });
      expect(config).toEqual({
        rosterSize: 53,
        playerFeatureWidth: 700,
        identityModulus: 1000,
        teamModulus: 64,
      });
    });

    it('ignores empty variables', () => {
      expect(loadEncoderConfig({ TENSOR_ROSTER_SIZE: '', TENSOR_TEAM_MODULUS: '  ' })).toEqual(
        DEFAULT_ENCODER_CONFIG,
      );
    });

    it('rejects a non-numeric variable', () => {
      const error = configError(() => loadEncoderConfig({ TENSOR_ROSTER_SIZE: 'many' }));
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^TENSOR_ROSTER_SIZE: /);
    });

    it('rejects a fractional variable', () => {
      const error = configError(() => loadEncoderConfig({ TENSOR_PLAYER_WIDTH: '670.5' }));
      expect(error.issues[0]).toMatch(/^TENSOR_PLAYER_WIDTH: /);
    });

    it('validates parsed values against the configuration rules', () => {
      const error = configError(() => loadEncoderConfig({ TENSOR_PLAYER_WIDTH: '10' }));
      expect(error.issues).toEqual([
        'playerFeatureWidth: playerFeatureWidth must cover the 669 section slots',
      ]);
    });
  });

  describe('createTensorEncoder', () => {
    it('binds every operation to the resolved configuration', () => {
      const encoder = createTensorEncoder({ rosterSize: 4 });

      expect(encoder.config.rosterSize).toBe(4);
      expect(encoder.layout.game.width).toBe(2 * 4 * 670 + 50);
      expect(encoder.encodeRoster(createTestRoster(6))).toHaveLength(4 * 670);
      expect(encoder.encodeGame([], [], createTestGameContext())).toHaveLength(5410);
      expect(encoder.encodePlayer({})).toHaveLength(670);
    });

    it('uses the default layout without overrides', () => {
      const encoder = createTensorEncoder();
      expect(encoder.layout.play.width).toBe(85_830);
      expect(encoder.encodeGameContext({})).toHaveLength(50);
      expect(encoder.encodePlayState({})).toHaveLength(20);
    });

    it('throws on an invalid configuration', () => {
      expect(() => createTensorEncoder({ teamModulus: -1 })).toThrow(EncoderConfigError);
    });
  });
});
