import { initGame } from '@tagsim/engine';
import type { TagEnvironment } from '@tagsim/engine';
import { makeTagBot } from '@tagsim/agents/tag-bot';
import { ConfigError } from '@tagsim/shared';
import type { Agent, FieldBounds, Move, PlayerSnapshot, StepFrame } from '@tagsim/shared';

export type SimStatus = 'NotStarted' | 'Running' | 'Finished';

export interface SimOpts {
  environment: TagEnvironment;
  stepCount: number;
  /** One per player, index aligned. Defaults to the tag bot for everyone. */
  agents?: Agent[];
  /** Called after every completed step with the resolved frame (viewer seam). */
  onStep?: (frame: StepFrame) => void;
}

export type SimSummary = {
  steps: number;
  tags: number;
  tagsByPlayer: number[]; // tags made, by tagger index
  it: number;
};

export class Simulation {
  readonly stepCount: number;
  private readonly env: TagEnvironment;
  private readonly agents: Agent[];
  private readonly onStep?: (frame: StepFrame) => void;
  private _status: SimStatus = 'NotStarted';
  private _step = 0;
  private readonly tagsByPlayer: number[];

  constructor({ environment, stepCount, agents, onStep }: SimOpts) {
    if (!Number.isInteger(stepCount) || stepCount < 1) {
      throw new ConfigError(`Step count must be a positive integer, got ${stepCount}`);
    }
    const n = environment.playerCount;
    if (agents && agents.length !== n) {
      throw new Error(`Expected ${n} agents, one per player, got ${agents.length}`);
    }
    const fallback = makeTagBot();
    this.env = environment;
    this.stepCount = stepCount;
    this.agents = agents ?? Array.from({ length: n }, () => fallback);
    this.onStep = onStep;
    this.tagsByPlayer = new Array<number>(n).fill(0);
  }

  get status(): SimStatus { return this._status; }
  get stepIndex(): number { return this._step; }
  get field(): FieldBounds { return this.env.fieldBounds(); }

  snapshot(): readonly PlayerSnapshot[] { return this.env.snapshot(); }

  /**
   * One step:
   * 1. every agent decides against the same pre-step view, in index order
   * 2. moves are applied in that order
   * 3. tags are resolved once
   */
  step(): StepFrame {
    if (this._status === 'Finished') throw new Error(`Simulation already finished after ${this._step} steps`);
    this._status = 'Running';

    const view = this.env.view();
    const moves: Move[] = this.agents.map((agent, p) => agent.act(view, p));
    moves.forEach((move, p) => this.env.applyMove(p, move));
    const tags = this.env.resolveTags();
    for (const t of tags) this.tagsByPlayer[t.tagger] += 1;

    this._step += 1;
    if (this._step === this.stepCount) this._status = 'Finished';

    const frame: StepFrame = { step: this._step, field: this.env.fieldBounds(), players: this.env.snapshot(), moves, tags };
    this.onStep?.(frame);
    return frame;
  }

  /** Runs every remaining step. */
  run(): StepFrame[] {
    const frames: StepFrame[] = [];
    while (this._status !== 'Finished') frames.push(this.step());
    return frames;
  }

  summary(): SimSummary {
    return {
      steps: this._step,
      tags: this.tagsByPlayer.reduce((s, v) => s + v, 0),
      tagsByPlayer: [...this.tagsByPlayer],
      it: this.env.itPlayer(),
    };
  }
}

export type SimSetup = {
  playerCount: number;
  stepCount: number;
  seed?: number;
  field?: FieldBounds;
  noTagBacks?: boolean;
};

/** Seeded game with the tag bot on every player. */
export function createSimulation(cfg: SimSetup, onStep?: (frame: StepFrame) => void): Simulation {
  const environment = initGame({ playerCount: cfg.playerCount, field: cfg.field, seed: cfg.seed });
  const bot = makeTagBot({ noTagBacks: cfg.noTagBacks ?? false });
  const agents = Array.from({ length: environment.playerCount }, () => bot);
  return new Simulation({ environment, stepCount: cfg.stepCount, agents, onStep });
}
