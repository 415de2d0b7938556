export class UnknownPlayerError extends Error {
  constructor(
    public readonly player: number,
    public readonly playerCount: number,
  ) {
    super(`Unknown player ${player} (expected an index in 0..${playerCount - 1})`);
    this.name = 'UnknownPlayerError';
  }
}

/** Rejected construction input: the simulation never starts in this state. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
