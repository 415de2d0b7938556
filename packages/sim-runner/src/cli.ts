// packages/sim-runner/src/cli.ts
import { fileURLToPath } from 'node:url';
import { ConfigError, Role } from '@tagsim/shared';
import type { StepFrame } from '@tagsim/shared';
import { renderFrame } from '@tagsim/viewer';
import { USAGE, getBool, parseSimArgs } from './config';
import { createSimulation } from './simulation';
import type { Simulation } from './simulation';

function logFrame(frame: StepFrame, quiet: boolean) {
  if (!quiet) {
    console.log(`step ${frame.step}`);
    console.log(renderFrame(frame).toString());
  }
  for (const t of frame.tags) {
    console.log(`step ${frame.step}: ${t.tagger} tagged ${t.tagged} at (${t.at.x},${t.at.y})`);
  }
}

export function setup(argv: string[]): Simulation | null {
  try {
    const cfg = parseSimArgs(argv);
    const sim = createSimulation(cfg, frame => logFrame(frame, cfg.quiet));
    const { width, height } = sim.field;
    console.log(`Tag: players=${cfg.playerCount} steps=${cfg.stepCount} field=${width}x${height} seed=${cfg.seed}${cfg.noTagBacks ? ' [no tag-backs]' : ''}`);
    return sim;
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(e.message);
    console.error(USAGE);
    process.exitCode = 2;
    return null;
  }
}

export function main(argv: string[]) {
  if (getBool(argv, 'help')) {
    console.log(USAGE);
    return;
  }
  const sim = setup(argv);
  if (!sim) return;

  sim.run();

  const summary = sim.summary();
  console.log('\n=== Final state (player, position, role, tags made) ===');
  for (const p of sim.snapshot()) {
    const role = p.role === Role.It ? 'It' : 'Runner';
    console.log(`${String(p.player).padStart(3)}  (${p.position.x},${p.position.y})`.padEnd(16) + `${role.padEnd(7)}  ${summary.tagsByPlayer[p.player]}`);
  }
  console.log(`\nSteps: ${summary.steps}  Tags: ${summary.tags}  It: ${summary.it}`);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2));
}
