import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ENCODER_CONFIG,
  describeLayout,
  encodePlayer,
  PLAYER_SECTION_ORDER,
  PLAYER_SECTIONS_WIDTH,
  sliceRange,
} from '@/lib/encoding';
import { createTestPlayerRecord } from '../../helpers/test-utils';

describe('Tensor Layout', () => {
  const layout = describeLayout(DEFAULT_ENCODER_CONFIG);

  it('places the player sections back to back', () => {
    const starts = PLAYER_SECTION_ORDER.map((name) => layout.player.sections[name].start);
    expect(starts).toEqual([0, 9, 22, 86, 202, 319, 436, 553]);
    expect(layout.player.sections.averageSeason.end).toBe(669);
  });

  it('covers 669 section slots and reserves the last one', () => {
    expect(PLAYER_SECTIONS_WIDTH).toBe(669);
    expect(layout.player.reserved).toEqual({ start: 669, end: 670, width: 1 });
  });

  it('describes roster, game and play parts', () => {
    expect(layout.roster).toEqual({ rows: 64, rowWidth: 670, width: 42_880 });
    expect(layout.game.away).toEqual({ start: 42_880, end: 85_760, width: 42_880 });
    expect(layout.game.context).toEqual({ start: 85_760, end: 85_810, width: 50 });
    expect(layout.play.state).toEqual({ start: 85_810, end: 85_830, width: 20 });
    expect(layout.play.width).toBe(85_830);
  });

  it('grows the reserved range with a wider player width', () => {
    const wide = describeLayout({ rosterSize: 2, playerFeatureWidth: 700 });
    expect(wide.player.reserved).toEqual({ start: 669, end: 700, width: 31 });
    expect(wide.game.width).toBe(2850);
  });

  it('slices a section out of an encoded vector', () => {
    const vector = encodePlayer(createTestPlayerRecord());
    const last = sliceRange(vector, layout.player.sections.lastSeason);

    expect(last).toHaveLength(117);
    expect(Array.from(last.subarray(0, 3))).toEqual([34, 17, 17]);
  });
});
