import { Role } from '@tagsim/shared';
import type { Agent, EnvironmentView, Move } from '@tagsim/shared';
import { makeItBot } from './it-bot';
import type { ItBotOpts } from './it-bot';
import { act as runnerAct } from './runner-bot';

/** Default player agent: reads its own role each step and plays it. */
export function makeTagBot(opts: ItBotOpts = {}): Agent {
  const it = makeItBot(opts);
  return {
    meta,
    act(view: EnvironmentView, self: number): Move {
      return view.roleOf(self) === Role.It ? it.act(view, self) : runnerAct(view, self);
    },
  };
}

export const meta = { name: 'TagBot', version: '0.1.0' };

const defaultBot = makeTagBot();
export function act(view: EnvironmentView, self: number): Move { return defaultBot.act(view, self); }
export default defaultBot;
