import { ConfigError, DEFAULT_PLAYER_COUNT, DEFAULT_SEED, DEFAULT_STEP_COUNT } from '@tagsim/shared';
import type { FieldBounds } from '@tagsim/shared';

export type SimConfig = {
  playerCount: number;
  stepCount: number;
  seed: number;
  field?: FieldBounds;
  noTagBacks: boolean;
  quiet: boolean;
};

export const USAGE = `Usage:
  tsx src/cli.ts [players] [steps] [--players N] [--steps N] [--seed N]
                 [--width N --height N] [--no-tag-backs] [--quiet]

  players  number of players, player 0 starts as It (default ${DEFAULT_PLAYER_COUNT})
  steps    number of steps to run (default ${DEFAULT_STEP_COUNT})`;

const VALUE_FLAGS = new Set(['players', 'steps', 'seed', 'width', 'height']);
const BOOL_FLAGS = new Set(['no-tag-backs', 'quiet', 'help']);

/* --------------------- CLI helpers --------------------- */
export function getFlag(args: string[], name: string, def?: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  if (i < 0) return def;
  const v = args[i + 1];
  return v === undefined || v.startsWith('--') ? def : v;
}
export function getBool(args: string[], name: string, def = false): boolean {
  return args.includes(`--${name}`) ? true : def;
}

function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith('--')) {
      const name = a.slice(2);
      if (VALUE_FLAGS.has(name)) i++;
      else if (!BOOL_FLAGS.has(name)) throw new ConfigError(`Unknown flag ${a}`);
      continue;
    }
    out.push(a);
  }
  return out;
}

function positiveInt(raw: string, what: string): number {
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(n) || n < 1) {
    throw new ConfigError(`${what} must be a positive integer up to ${Number.MAX_SAFE_INTEGER}, got "${raw}"`);
  }
  return Number(raw);
}

/** argv without the node/script prefix. Positionals first, flags win. */
export function parseSimArgs(args: string[]): SimConfig {
  const pos = positionals(args);
  if (pos.length > 2) throw new ConfigError(`Unexpected argument "${pos[2]}"`);
  for (const name of VALUE_FLAGS) {
    if (args.includes(`--${name}`) && getFlag(args, name) === undefined) {
      throw new ConfigError(`--${name} needs a value`);
    }
  }

  const players = getFlag(args, 'players', pos[0]);
  const steps = getFlag(args, 'steps', pos[1]);
  const seedRaw = getFlag(args, 'seed');
  if (seedRaw !== undefined && (!/^-?\d+$/.test(seedRaw) || !Number.isSafeInteger(Number(seedRaw)))) {
    throw new ConfigError(`Seed must be an integer, got "${seedRaw}"`);
  }

  const width = getFlag(args, 'width');
  const height = getFlag(args, 'height');
  if ((width === undefined) !== (height === undefined)) {
    throw new ConfigError('--width and --height must be given together');
  }

  return {
    playerCount: players === undefined ? DEFAULT_PLAYER_COUNT : positiveInt(players, 'Player count'),
    stepCount: steps === undefined ? DEFAULT_STEP_COUNT : positiveInt(steps, 'Step count'),
    seed: seedRaw === undefined ? DEFAULT_SEED : Number(seedRaw),
    field: width !== undefined && height !== undefined
      ? { width: positiveInt(width, 'Width'), height: positiveInt(height, 'Height') }
      : undefined,
    noTagBacks: getBool(args, 'no-tag-backs'),
    quiet: getBool(args, 'quiet'),
  };
}
