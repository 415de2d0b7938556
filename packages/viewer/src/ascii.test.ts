import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Role } from '@tagsim/shared';
import type { Move, PlayerSnapshot, StepFrame, TagEvent } from '@tagsim/shared';
import { DrawCell, MAX_CANVAS_HEIGHT, MAX_CANVAS_WIDTH, TagCanvas, canvasFor, renderFrame } from './ascii';

function frameOf(width: number, height: number, players: PlayerSnapshot[], tags: TagEvent[] = []): StepFrame {
  return { step: 1, field: { width, height }, players, moves: players.map((): Move => 'STAY'), tags };
}

test('renders It as * and Runners as .', () => {
  const frame = frameOf(4, 2, [
    { player: 0, position: { x: 0, y: 0 }, role: Role.It },
    { player: 1, position: { x: 2, y: 1 }, role: Role.Runner },
  ]);
  assert.equal(renderFrame(frame).toString(), '====\n*   \n  . ');
});

test('marks the newly tagged player', () => {
  const frame = frameOf(15, 1, [
    { player: 0, position: { x: 3, y: 0 }, role: Role.Runner },
    { player: 1, position: { x: 3, y: 0 }, role: Role.It },
  ], [{ tagger: 0, tagged: 1, at: { x: 3, y: 0 } }]);
  assert.equal(renderFrame(frame).toString(), "===============\n   *-You're It!");
});

test('the tag label overprints cells to its right', () => {
  const frame = frameOf(6, 1, [
    { player: 0, position: { x: 0, y: 0 }, role: Role.It },
    { player: 1, position: { x: 3, y: 0 }, role: Role.Runner },
  ], [{ tagger: 2, tagged: 0, at: { x: 0, y: 0 } }]);
  assert.equal(renderFrame(frame).toString(), "======\n*-You're It!");
});

test('a higher priority cell is never overwritten', () => {
  const canvas = new TagCanvas({ width: 3, height: 1 });
  canvas.set({ x: 1, y: 0 }, DrawCell.It);
  canvas.set({ x: 1, y: 0 }, DrawCell.Runner);
  assert.equal(canvas.cellAt(1, 0), DrawCell.It);
  assert.equal(canvas.toString(), '===\n * ');
});

test('scales field coordinates onto a smaller canvas', () => {
  const canvas = new TagCanvas({ width: 10, height: 10 }, 5, 5);
  canvas.set({ x: 9, y: 9 }, DrawCell.Runner);
  canvas.set({ x: 1, y: 1 }, DrawCell.Runner);
  canvas.set({ x: 0, y: 0 }, DrawCell.It);
  assert.equal(canvas.cellAt(4, 4), DrawCell.Runner);
  assert.equal(canvas.cellAt(0, 0), DrawCell.It);
  assert.equal(canvas.toString(), '=====\n*    \n     \n     \n     \n    .');
});

test('frames of very large fields render on a bounded canvas', () => {
  const frame = frameOf(5_000_000_000, 1, [
    { player: 0, position: { x: 0, y: 0 }, role: Role.It },
    { player: 1, position: { x: 4_999_999_999, y: 0 }, role: Role.Runner },
  ]);
  const canvas = renderFrame(frame);
  assert.equal(canvas.width, MAX_CANVAS_WIDTH);
  assert.equal(canvas.height, 1);
  assert.equal(canvas.cellAt(0, 0), DrawCell.It);
  assert.equal(canvas.cellAt(79, 0), DrawCell.Runner);
  assert.equal(canvas.toString(), '='.repeat(80) + '\n*' + ' '.repeat(78) + '.');
});

test('canvasFor keeps small fields at one character per cell', () => {
  const small = canvasFor({ width: 12, height: 7 });
  assert.equal(small.width, 12);
  assert.equal(small.height, 7);
  const tall = canvasFor({ width: 3, height: 1000 });
  assert.equal(tall.width, 3);
  assert.equal(tall.height, MAX_CANVAS_HEIGHT);
});
