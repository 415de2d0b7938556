import { ConfigError, Role, XorShift32, sampleDistinct } from '@tagsim/shared';
import { CELLS_PER_PLAYER, DEFAULT_SEED, MIN_FIELD_SIDE } from '@tagsim/shared';
import type { FieldBounds, PlayerState } from '@tagsim/shared';
import { TagEnvironment } from './environment';

export type InitOpts = {
  playerCount: number;
  /** Defaults to `fieldForPlayers(playerCount)`. */
  field?: FieldBounds;
  seed?: number;
};

export function fieldForPlayers(playerCount: number): FieldBounds {
  const side = Math.max(MIN_FIELD_SIDE, Math.ceil(Math.sqrt(CELLS_PER_PLAYER * playerCount)));
  return { width: side, height: side };
}

/** Builds a fresh game: distinct seeded start cells, player 0 is It. */
export function initGame({ playerCount, field, seed = DEFAULT_SEED }: InitOpts): TagEnvironment {
  if (!Number.isInteger(playerCount) || playerCount < 1) {
    throw new ConfigError(`Player count must be a positive integer, got ${playerCount}`);
  }
  const f = field ?? fieldForPlayers(playerCount);
  const cells = f.width * f.height;
  if (!(cells >= playerCount)) {
    throw new ConfigError(`A ${f.width}x${f.height} field cannot hold ${playerCount} players`);
  }

  const rng = new XorShift32(seed);
  const players: PlayerState[] = sampleDistinct(rng, cells, playerCount).map((cell, i) => ({
    position: { x: cell % f.width, y: Math.floor(cell / f.width) },
    role: i === 0 ? Role.It : Role.Runner,
    taggedBy: null,
  }));
  return new TagEnvironment(f, players);
}
