export enum Role {
  Runner = 0,
  It = 1,
}

export type Move = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT' | 'STAY';

export type Position = { x: number; y: number };

export type FieldBounds = { width: number; height: number };

export type PlayerState = {
  position: Position;
  role: Role;
  taggedBy: number | null; // who made this player It; null for the starting It or any Runner
};

export type PlayerSnapshot = {
  readonly player: number;
  readonly position: Readonly<Position>;
  readonly role: Role;
};

export type TagEvent = {
  tagger: number; // previous It
  tagged: number; // new It
  at: Position;
};

/** Read-only window onto the environment, the only thing agents get to see. */
export interface EnvironmentView {
  readonly playerCount: number;
  fieldBounds(): FieldBounds;
  positionOf(player: number): Position;
  roleOf(player: number): Role;
  taggedBy(player: number): number | null;
}

export type Agent = {
  meta?: { name: string; version?: string };
  act: (view: EnvironmentView, self: number) => Move;
};

export type StepFrame = {
  step: number; // 1-based, the step that just completed
  field: FieldBounds;
  players: readonly PlayerSnapshot[];
  moves: Move[]; // index aligned with players
  tags: TagEvent[];
};
