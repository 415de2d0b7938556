import { Role } from '@tagsim/shared';
import type { EnvironmentView, Move } from '@tagsim/shared';
import { legalMoves, nearestDist2, pickBest, playersWithRole } from './lib/moves';

export function act(view: EnvironmentView, self: number): Move {
  const it = playersWithRole(view, Role.It, self);
  if (it.length === 0) return 'STAY';

  const here = nearestDist2(view.positionOf(self), it);
  const best = pickBest(legalMoves(view, self), to => nearestDist2(to, it), (a, b) => a > b);
  // cornered: nothing gets us further away than standing still
  return best.score > here ? best.move : 'STAY';
}

export const meta = { name: 'RunnerBot', version: '0.1.0' };
