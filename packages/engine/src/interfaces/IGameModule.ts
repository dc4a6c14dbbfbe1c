import type { Action, Outcome } from "@othello-lab/core";

// ---------------------------------------------------------------------------
// Game UI Specification — shipped by each game module for console rendering
// ---------------------------------------------------------------------------

/**
 * UI specification that a game module provides so that the CLI can render
 * and read moves without per-game logic.
 */
export interface GameUISpec<TState, TPlayer extends string, TRequest> {
  /** Display label per player (e.g. { B: "Black", W: "White" }) */
  playerLabels: Record<TPlayer, string>;

  /** Hint text shown to the human player (e.g. "Enter position (e.g. d3) or pass") */
  inputHint: string;

  /** Render the board as an ASCII string. */
  renderBoard(state: TState): string;

  /** Render a one-line status string (e.g. the score), or null if nothing special. */
  renderStatus(state: TState): string | null;

  /** Parse raw user input into an action, or return null if it cannot be read. */
  parseInput(raw: string): Action<TRequest> | null;

  /** Format a move as a human-readable string for move history (e.g. "d3"). */
  formatMove(move: TRequest): string;
}

// ---------------------------------------------------------------------------
// Game module: the functions the searches and the orchestrator rely on
// ---------------------------------------------------------------------------

/**
 * A two-player, perfect-information, turn-based game.
 *
 * Every function must be pure: states are values, and a transition returns a
 * new state without touching its input. `TMove` is what move generation
 * yields; `TRequest` is what a caller may submit (a move is always a valid
 * request).
 */
export interface IGameModule<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
> {
  /** Unique identifier for this game (e.g., "othello"), used in log lines */
  readonly gameId: string;

  /** How the console front end draws states and reads moves */
  readonly ui: GameUISpec<TState, TPlayer, TRequest>;

  /** Initialize a new game state */
  init(): TState;

  /** The player to move */
  currentPlayer(state: TState): TPlayer;

  /** Legal moves for the player to move, in a fixed deterministic order */
  getLegalMoves(state: TState): TMove[];

  /** Apply a move for the player to move; throws IllegalMoveError */
  applyMove(state: TState, move: TRequest): TState;

  /** Record a pass for the player to move; throws IllegalMoveError if a move exists */
  pass(state: TState): TState;

  /** Check if the game has ended */
  isTerminal(state: TState): boolean;

  /** Get the outcome of a state */
  getOutcome(state: TState): Outcome<TPlayer>;
}

/**
 * Scores a state from `perspective`'s point of view. Higher is better for
 * `perspective`; the value must be a finite integer and must not depend on
 * anything but the state.
 */
export type Evaluator<TState, TPlayer extends string> = (
  state: TState,
  perspective: TPlayer
) => number;
