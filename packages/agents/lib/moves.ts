import { MOVE_ORDER, Role, dist2, inBounds, shift } from '@tagsim/shared';
import type { EnvironmentView, Move, Position } from '@tagsim/shared';

export type Candidate = { move: Move; to: Position };
export type Target = { player: number; pos: Position };

/** Moves whose destination stays on the field, in MOVE_ORDER. STAY is always legal. */
export function legalMoves(view: EnvironmentView, self: number): Candidate[] {
  const field = view.fieldBounds();
  const from = view.positionOf(self);
  return MOVE_ORDER
    .map(move => ({ move, to: shift(from, move) }))
    .filter(c => inBounds(c.to, field));
}

/**
 * First candidate whose score beats every earlier one under `better`.
 * Strict comparison keeps the MOVE_ORDER tie-break.
 */
export function pickBest(
  cands: Candidate[],
  score: (to: Position) => number,
  better: (a: number, b: number) => boolean,
): { move: Move; score: number } {
  let best: { move: Move; score: number } = { move: 'STAY', score: NaN };
  for (const c of cands) {
    const s = score(c.to);
    if (Number.isNaN(best.score) || better(s, best.score)) best = { move: c.move, score: s };
  }
  return best;
}

export function playersWithRole(view: EnvironmentView, role: Role, except?: number): Target[] {
  const out: Target[] = [];
  for (let i = 0; i < view.playerCount; i++) {
    if (i === except || view.roleOf(i) !== role) continue;
    out.push({ player: i, pos: view.positionOf(i) });
  }
  return out;
}

export function nearestDist2(from: Position, targets: Target[]): number {
  let min = Infinity;
  for (const t of targets) min = Math.min(min, dist2(from.x, from.y, t.pos.x, t.pos.y));
  return min;
}
