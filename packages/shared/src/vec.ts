import type { FieldBounds, Move, Position } from './types';
import { MOVE_DELTAS } from './constants';

export function clamp(v: number, lo: number, hi: number) { return Math.max(lo, Math.min(hi, v)); }
export function dist2(ax: number, ay: number, bx: number, by: number) { const dx = ax - bx, dy = ay - by; return dx*dx + dy*dy; }
export function samePos(a: Position, b: Position) { return a.x === b.x && a.y === b.y; }
export function inBounds(p: Position, f: FieldBounds) { return p.x >= 0 && p.x < f.width && p.y >= 0 && p.y < f.height; }
export function isMove(v: unknown): v is Move { return typeof v === 'string' && Object.prototype.hasOwnProperty.call(MOVE_DELTAS, v); }
/** Raw destination of a move, no clamping. */
export function shift(p: Position, move: Move): Position { const d = MOVE_DELTAS[move]; return { x: p.x + d.x, y: p.y + d.y }; }
