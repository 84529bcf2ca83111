/**
 * Encode a game bundle from a JSON file.
 *
 * The bundle is `{ home: PlayerRecord[], away: PlayerRecord[],
 * context: GameContext, plays?: PlayState[] }`. Prints the layout and the
 * encoded lengths; with an output path, also writes one JSON array per
 * play vector (or the game vector when there are no plays).
 *
 * Usage: npx tsx scripts/encode-game.ts <bundle.json> [out.json]
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  createTensorEncoder,
  loadEncoderConfig,
  toJsonArray,
  type GameContext,
  type PlayerRecord,
  type PlayState,
} from '@/lib/encoding';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('encode-game');

function isPlainObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const GameBundleSchema = z.object({
  home: z.array(z.custom<PlayerRecord>(isPlainObject)),
  away: z.array(z.custom<PlayerRecord>(isPlainObject)),
  context: z.custom<GameContext>(isPlainObject),
  plays: z.array(z.custom<PlayState>(isPlainObject)).default([]),
});

async function main(): Promise<void> {
  const [inputPath, outputPath] = process.argv.slice(2);
  if (!inputPath) {
    throw new Error('Usage: tsx scripts/encode-game.ts <bundle.json> [out.json]');
  }

  const bundle = GameBundleSchema.parse(JSON.parse(await readFile(inputPath, 'utf8')));
  const encoder = createTensorEncoder(loadEncoderConfig());
  const { layout } = encoder;

  logger.info('Layout', {
    player: layout.player.width,
    roster: layout.roster.width,
    game: layout.game.width,
    play: layout.play.width,
  });

  const game = encoder.encodeGame(bundle.home, bundle.away, bundle.context);
  const plays = bundle.plays.map((state) => encoder.encodePlay(game, state));

  logger.info('Encoded game', {
    homePlayers: Math.min(bundle.home.length, layout.roster.rows),
    awayPlayers: Math.min(bundle.away.length, layout.roster.rows),
    gameLength: game.length,
    plays: plays.length,
  });

  if (outputPath) {
    const vectors = plays.length > 0 ? plays : [game];
    await writeFile(outputPath, `[${vectors.map(toJsonArray).join(',\n')}]\n`, 'utf8');
    logger.info('Wrote vectors', { path: outputPath, count: vectors.length });
  }
}

main().catch((error: unknown) => {
  logger.error('Encoding failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
