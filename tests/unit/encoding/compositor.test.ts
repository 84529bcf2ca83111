import { describe, it, expect } from 'vitest';
import {
  composeGame,
  composePlay,
  encodeGame,
  encodeGameContext,
  encodePlay,
  encodePlayState,
  encodeRoster,
  gameWidth,
  playWidth,
  resolveEncoderConfig,
  ShapeMismatchError,
} from '@/lib/encoding';
import {
  createTestGameContext,
  createTestPlayState,
  createTestRoster,
} from '../../helpers/test-utils';

const ROSTER = 42_880;

function filled(length: number, value: number): Float32Array {
  return new Float32Array(length).fill(value);
}

describe('Compositors', () => {
  it('reports the composed widths', () => {
    expect(gameWidth()).toBe(85_810);
    expect(playWidth()).toBe(85_830);
  });

  // -----------------------------------------------------------------------
  // composeGame
  // -----------------------------------------------------------------------
  describe('composeGame', () => {
    it('concatenates home, away and context in order', () => {
      const game = composeGame(filled(ROSTER, 1), filled(ROSTER, 2), filled(50, 3));

      expect(game).toHaveLength(85_810);
      expect(game[0]).toBe(1);
      expect(game[ROSTER - 1]).toBe(1);
      expect(game[ROSTER]).toBe(2);
      expect(game[2 * ROSTER - 1]).toBe(2);
      expect(game[2 * ROSTER]).toBe(3);
      expect(game[85_809]).toBe(3);
    });

    it('accepts plain number arrays', () => {
      const context = Array.from({ length: 50 }, (_, i) => i);
      const game = composeGame(new Array<number>(ROSTER).fill(0), filled(ROSTER, 0), context);
      expect(game[2 * ROSTER + 49]).toBe(49);
    });

    it('throws on a short home roster', () => {
      expect(() => composeGame(filled(100, 0), filled(ROSTER, 0), filled(50, 0))).toThrow(
        'home roster vector has length 100, expected 42880',
      );
    });

    it('throws on a wrong-length context with the part details', () => {
      let caught: unknown;
      try {
        composeGame(filled(ROSTER, 0), filled(ROSTER, 0), filled(49, 0));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ShapeMismatchError);
      if (!(caught instanceof ShapeMismatchError)) return;
      expect(caught.part).toBe('game context');
      expect(caught.expected).toBe(50);
      expect(caught.actual).toBe(49);
    });

    it('throws on an away roster of the wrong length', () => {
      expect(() => composeGame(filled(ROSTER, 0), filled(ROSTER + 1, 0), filled(50, 0))).toThrow(
        ShapeMismatchError,
      );
    });
  });

  // -----------------------------------------------------------------------
  // composePlay
  // -----------------------------------------------------------------------
  describe('composePlay', () => {
    it('appends the play state to the game vector', () => {
      const play = composePlay(filled(85_810, 4), filled(20, 5));

      expect(play).toHaveLength(85_830);
      expect(play[85_809]).toBe(4);
      expect(play[85_810]).toBe(5);
      expect(play[85_829]).toBe(5);
    });

    it('throws on a wrong-length game vector', () => {
      expect(() => composePlay(filled(85_809, 0), filled(20, 0))).toThrow(
        'game vector has length 85809, expected 85810',
      );
    });

    it('throws on a wrong-length play state', () => {
      expect(() => composePlay(filled(85_810, 0), filled(21, 0))).toThrow(
        'play state vector has length 21, expected 20',
      );
    });
  });

  // -----------------------------------------------------------------------
  // End to end
  // -----------------------------------------------------------------------
  describe('encodeGame / encodePlay', () => {
    it('matches composing the individually encoded parts', () => {
      const home = createTestRoster(5, 'home');
      const away = createTestRoster(4, 'away');
      const context = createTestGameContext();

      const game = encodeGame(home, away, context);
      const expected = composeGame(encodeRoster(home), encodeRoster(away), encodeGameContext(context));

      expect(Array.from(game)).toEqual(Array.from(expected));
    });

    it('keeps each slice independent of the other inputs', () => {
      const context = createTestGameContext();
      const a = encodeGame(createTestRoster(3, 'home'), createTestRoster(3, 'away'), context);
      const b = encodeGame(createTestRoster(3, 'home'), createTestRoster(7, 'other'), context);

      expect(Array.from(a.subarray(0, ROSTER))).toEqual(Array.from(b.subarray(0, ROSTER)));
      expect(Array.from(a.subarray(2 * ROSTER))).toEqual(Array.from(b.subarray(2 * ROSTER)));
    });

    it('appends the encoded play state', () => {
      const game = encodeGame([], [], createTestGameContext());
      const state = createTestPlayState();

      const play = encodePlay(game, state);

      expect(play).toHaveLength(85_830);
      expect(Array.from(play.subarray(85_810))).toEqual(Array.from(encodePlayState(state)));
    });

    it('follows a configured roster size', () => {
      const config = resolveEncoderConfig({ rosterSize: 2 });
      const game = encodeGame(createTestRoster(3), [], createTestGameContext(), config);

      expect(game).toHaveLength(2 * 2 * 670 + 50);
      expect(encodePlay(game, createTestPlayState(), config)).toHaveLength(playWidth(config));
    });
  });
});
