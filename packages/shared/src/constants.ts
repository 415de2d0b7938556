import type { Move, Position } from './types';

export const DEFAULT_PLAYER_COUNT = 5;
export const DEFAULT_STEP_COUNT = 100;
export const DEFAULT_SEED = 1;

// Default field is square, at least this wide, with ~4 cells per player
export const MIN_FIELD_SIDE = 20;
export const CELLS_PER_PLAYER = 4;

/** Tie-break order for every strategy. */
export const MOVE_ORDER: readonly Move[] = ['UP', 'DOWN', 'LEFT', 'RIGHT', 'STAY'];

export const MOVE_DELTAS: Readonly<Record<Move, Readonly<Position>>> = {
  UP: { x: 0, y: -1 },
  DOWN: { x: 0, y: 1 },
  LEFT: { x: -1, y: 0 },
  RIGHT: { x: 1, y: 0 },
  STAY: { x: 0, y: 0 },
};
