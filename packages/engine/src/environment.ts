import {
  ConfigError, UnknownPlayerError, Role, clamp, inBounds, isMove, samePos, shift,
} from '@tagsim/shared';
import type {
  EnvironmentView, FieldBounds, Move, PlayerSnapshot, PlayerState, Position, TagEvent,
} from '@tagsim/shared';

function checkPlayer(player: number, playerCount: number): void {
  if (!Number.isInteger(player) || player < 0 || player >= playerCount) {
    throw new UnknownPlayerError(player, playerCount);
  }
}

/**
 * Decision-time view: a frozen copy of the players taken when `view()` is
 * called. Later mutations of the environment do not show through.
 */
export class FrozenView implements EnvironmentView {
  readonly playerCount: number;
  private readonly field: Readonly<FieldBounds>;
  private readonly players: ReadonlyArray<Readonly<PlayerState>>;

  constructor(field: FieldBounds, players: readonly PlayerState[]) {
    this.field = Object.freeze({ ...field });
    this.players = Object.freeze(players.map(p => Object.freeze({
      position: Object.freeze({ ...p.position }),
      role: p.role,
      taggedBy: p.taggedBy,
    })));
    this.playerCount = this.players.length;
  }

  fieldBounds(): FieldBounds { return { ...this.field }; }
  positionOf(player: number): Position { return { ...this.at(player).position }; }
  roleOf(player: number): Role { return this.at(player).role; }
  taggedBy(player: number): number | null { return this.at(player).taggedBy; }

  private at(player: number): Readonly<PlayerState> {
    checkPlayer(player, this.playerCount);
    return this.players[player];
  }
}

/** Authoritative player state for one game. Only `applyMove` and `resolveTags` mutate it. */
export class TagEnvironment implements EnvironmentView {
  private readonly field: Readonly<FieldBounds>;
  private readonly players: PlayerState[];

  constructor(field: FieldBounds, players: PlayerState[]) {
    if (!Number.isInteger(field.width) || !Number.isInteger(field.height) || field.width < 0 || field.height < 0) {
      throw new ConfigError(`Field size must be non-negative integers, got ${field.width}x${field.height}`);
    }
    if (players.length === 0) throw new ConfigError('At least one player is required');
    players.forEach((p, i) => {
      const { x, y } = p.position;
      if (!Number.isInteger(x) || !Number.isInteger(y) || !inBounds(p.position, field)) {
        throw new ConfigError(`Player ${i} starts at (${x},${y}), outside the ${field.width}x${field.height} field`);
      }
    });
    const its = players.filter(p => p.role === Role.It).length;
    if (its !== 1) throw new ConfigError(`Exactly one player must be It, got ${its}`);

    this.field = Object.freeze({ ...field });
    this.players = players.map(p => ({ position: { ...p.position }, role: p.role, taggedBy: p.taggedBy }));
  }

  get playerCount(): number { return this.players.length; }

  fieldBounds(): FieldBounds { return { ...this.field }; }

  positionOf(player: number): Position {
    checkPlayer(player, this.players.length);
    return { ...this.players[player].position };
  }

  roleOf(player: number): Role {
    checkPlayer(player, this.players.length);
    return this.players[player].role;
  }

  taggedBy(player: number): number | null {
    checkPlayer(player, this.players.length);
    return this.players[player].taggedBy;
  }

  itPlayer(): number {
    return this.players.findIndex(p => p.role === Role.It);
  }

  /** Moves one player, clamping to the field edge. Returns the new position. */
  applyMove(player: number, move: Move): Position {
    checkPlayer(player, this.players.length);
    if (!isMove(move)) throw new Error(`Invalid move ${String(move)} for player ${player}`);
    const p = this.players[player];
    const to = shift(p.position, move);
    p.position = {
      x: clamp(to.x, 0, this.field.width - 1),
      y: clamp(to.y, 0, this.field.height - 1),
    };
    return { ...p.position };
  }

  /**
   * Swaps roles when a Runner shares It's cell. With several Runners on that
   * cell the lowest index takes over; the rest stay Runners.
   */
  resolveTags(): TagEvent[] {
    const itIdx = this.itPlayer();
    const it = this.players[itIdx];
    const taggedIdx = this.players.findIndex(p => p.role === Role.Runner && samePos(p.position, it.position));
    if (taggedIdx < 0) return [];

    const tagged = this.players[taggedIdx];
    it.role = Role.Runner;
    it.taggedBy = null;
    tagged.role = Role.It;
    tagged.taggedBy = itIdx;
    return [{ tagger: itIdx, tagged: taggedIdx, at: { ...tagged.position } }];
  }

  snapshot(): readonly PlayerSnapshot[] {
    return Object.freeze(this.players.map((p, player) => Object.freeze({
      player,
      position: Object.freeze({ ...p.position }),
      role: p.role,
    })));
  }

  view(): EnvironmentView {
    return new FrozenView(this.field, this.players);
  }
}
