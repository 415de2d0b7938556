import { Role } from '@tagsim/shared';
import type { Agent, EnvironmentView, Move } from '@tagsim/shared';
import { legalMoves, nearestDist2, pickBest, playersWithRole } from './lib/moves';
import type { Target } from './lib/moves';

export type ItBotOpts = {
  /** Leave alone whoever just tagged us, unless nobody else is left. */
  noTagBacks?: boolean;
};

export function chaseTargets(view: EnvironmentView, self: number, opts: ItBotOpts = {}): Target[] {
  const runners = playersWithRole(view, Role.Runner, self);
  if (!opts.noTagBacks) return runners;
  const tagger = view.taggedBy(self);
  const others = runners.filter(r => r.player !== tagger);
  return others.length ? others : runners;
}

/** Step toward the nearest Runner: minimise squared distance after the move. */
export function makeItBot(opts: ItBotOpts = {}): Agent {
  return {
    meta,
    act(view: EnvironmentView, self: number): Move {
      const targets = chaseTargets(view, self, opts);
      if (targets.length === 0) return 'STAY';
      return pickBest(legalMoves(view, self), to => nearestDist2(to, targets), (a, b) => a < b).move;
    },
  };
}

export const meta = { name: 'ItBot', version: '0.1.0' };

const defaultBot = makeItBot();
export function act(view: EnvironmentView, self: number): Move { return defaultBot.act(view, self); }
