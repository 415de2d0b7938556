import { test } from 'node:test';
import assert from 'node:assert/strict';
import { fieldForPlayers, initGame } from './setup';
import { ConfigError, MIN_FIELD_SIDE, Role } from '@tagsim/shared';

test('fieldForPlayers keeps a minimum side and grows with the player count', () => {
  assert.deepEqual(fieldForPlayers(5), { width: MIN_FIELD_SIDE, height: MIN_FIELD_SIDE });
  // ceil(sqrt(4 * 200)) = ceil(28.28) = 29
  assert.deepEqual(fieldForPlayers(200), { width: 29, height: 29 });
});

test('initGame places distinct in-bounds players with player 0 as It', () => {
  const env = initGame({ playerCount: 12, seed: 3 });
  const snap = env.snapshot();
  assert.equal(snap.length, 12);
  const { width, height } = env.fieldBounds();
  const keys = new Set<string>();
  for (const p of snap) {
    assert.ok(p.position.x >= 0 && p.position.x < width);
    assert.ok(p.position.y >= 0 && p.position.y < height);
    keys.add(`${p.position.x},${p.position.y}`);
  }
  assert.equal(keys.size, 12);
  assert.equal(env.itPlayer(), 0);
  assert.equal(snap.filter(p => p.role === Role.It).length, 1);
  assert.equal(env.taggedBy(0), null);
});

test('initGame is deterministic per seed', () => {
  const a = initGame({ playerCount: 5, seed: 11 }).snapshot();
  const b = initGame({ playerCount: 5, seed: 11 }).snapshot();
  assert.deepEqual(a, b);
});

test('initGame fills a field that fits the players exactly', () => {
  const env = initGame({ playerCount: 4, field: { width: 2, height: 2 } });
  const cells = env.snapshot().map(p => `${p.position.x},${p.position.y}`).sort();
  assert.deepEqual(cells, ['0,0', '0,1', '1,0', '1,1']);
});

test('initGame rejects bad counts and fields that are too small', () => {
  assert.throws(() => initGame({ playerCount: 0 }), ConfigError);
  assert.throws(() => initGame({ playerCount: -2 }), ConfigError);
  assert.throws(() => initGame({ playerCount: 2.5 }), ConfigError);
  assert.throws(() => initGame({ playerCount: 5, field: { width: 2, height: 2 } }), ConfigError);
  assert.throws(() => initGame({ playerCount: 1, field: { width: 0, height: 0 } }), ConfigError);
});
