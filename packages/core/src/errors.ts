export type ErrorCode = "OUT_OF_BOUNDS" | "ILLEGAL_MOVE" | "INVALID_DEPTH";

/** Base class for every error raised by the game and search packages */
export class OthelloError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A coordinate outside the board. Unreachable from validated input. */
export class OutOfBoundsError extends OthelloError {
  constructor(row: number, col: number) {
    super("OUT_OF_BOUNDS", `Coordinate (${row}, ${col}) is outside the board`);
  }
}

/** A move that is not legal for the current state and player */
export class IllegalMoveError extends OthelloError {
  constructor(message: string) {
    super("ILLEGAL_MOVE", message);
  }
}

export class InvalidDepthError extends OthelloError {
  constructor(depth: number, min: number, max: number) {
    super(
      "INVALID_DEPTH",
      `Search depth must be an integer in [${min}, ${max}], got ${depth}`
    );
  }
}

export function isOthelloError(err: unknown): err is OthelloError {
  return err instanceof OthelloError;
}
