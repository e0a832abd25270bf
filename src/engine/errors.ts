export class InvalidGridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGridError";
  }
}

/** Structurally malformed step input; the game state is left untouched */
export class InvalidActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidActionError";
  }
}

export class ReplayCorruptionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReplayCorruptionError";
  }
}
