import { IllegalMoveError } from "@othello-lab/core";
import type { Outcome } from "@othello-lab/core";
import type { IGameModule } from "@othello-lab/engine";
import { OthelloUI } from "./ui";
import {
  Board,
  Color,
  Coord,
  countPieces,
  initialBoard,
  isBoardFull,
  isOnBoard,
  opponentOf,
} from "./state";
import {
  OthelloMove,
  applyMoveToBoard,
  getLegalMoves,
  hasLegalMove,
} from "./moves";

export type TerminalStatus = null | "board_full" | "double_pass";

/** Full game state. States are immutable values. */
export interface OthelloState {
  readonly board: Board;
  /** The color of the player whose turn it is */
  readonly activeColor: Color;
  /** Number of consecutive passes (game ends at 2) */
  readonly consecutivePasses: number;
  /** The last move played, or null if pass/start */
  readonly lastMove: Coord | null;
  /** Moves and passes played so far */
  readonly turnNumber: number;
  /** Terminal status: null if game in progress */
  readonly terminalStatus: TerminalStatus;
  /** The winning color, or null if draw/in-progress */
  readonly winnerColor: Color | null;
}

function winnerOf(board: Board): Color | null {
  const pieces = countPieces(board);
  if (pieces.B > pieces.W) return "B";
  if (pieces.W > pieces.B) return "W";
  return null;
}

/**
 * Assemble a state, deriving terminal status and winner from the board and
 * the pass counter.
 */
function settle(
  board: Board,
  activeColor: Color,
  consecutivePasses: number,
  lastMove: Coord | null,
  turnNumber: number
): OthelloState {
  let terminalStatus: TerminalStatus = null;
  if (consecutivePasses >= 2) {
    terminalStatus = "double_pass";
  } else if (isBoardFull(board)) {
    terminalStatus = "board_full";
  }

  return {
    board,
    activeColor,
    consecutivePasses,
    lastMove,
    turnNumber,
    terminalStatus,
    winnerColor: terminalStatus === null ? null : winnerOf(board),
  };
}

/**
 * Build a state from an arbitrary board, e.g. a test fixture or a
 * position to analyse. A full board is terminal straight away.
 */
export function stateFromBoard(
  board: Board,
  activeColor: Color,
  consecutivePasses = 0
): OthelloState {
  return settle(board, activeColor, consecutivePasses, null, 0);
}

export const OthelloModule: IGameModule<OthelloState, Color, OthelloMove, Coord> = {
  gameId: "othello",
  ui: OthelloUI,

  init(): OthelloState {
    return settle(initialBoard(), "B", 0, null, 0);
  },

  currentPlayer(state: OthelloState): Color {
    return state.activeColor;
  },

  getLegalMoves(state: OthelloState): OthelloMove[] {
    if (state.terminalStatus !== null) return [];
    return getLegalMoves(state.board, state.activeColor);
  },

  applyMove(state: OthelloState, move: Coord): OthelloState {
    if (state.terminalStatus !== null) {
      throw new IllegalMoveError("Game is already over");
    }

    const { row, col } = move;
    if (!isOnBoard(row, col)) {
      throw new IllegalMoveError(`Position (${row}, ${col}) is off the board`);
    }

    // throws IllegalMoveError when nothing would be flipped
    const board = applyMoveToBoard(state.board, move, state.activeColor);

    return settle(
      board,
      opponentOf(state.activeColor),
      0,
      { row, col },
      state.turnNumber + 1
    );
  },

  pass(state: OthelloState): OthelloState {
    if (state.terminalStatus !== null) {
      throw new IllegalMoveError("Game is already over");
    }
    if (hasLegalMove(state.board, state.activeColor)) {
      throw new IllegalMoveError(
        `${state.activeColor} has a legal move and cannot pass`
      );
    }

    return settle(
      state.board,
      opponentOf(state.activeColor),
      state.consecutivePasses + 1,
      null,
      state.turnNumber + 1
    );
  },

  isTerminal(state: OthelloState): boolean {
    return state.terminalStatus !== null;
  },

  getOutcome(state: OthelloState): Outcome<Color> {
    if (state.terminalStatus === null) {
      return { status: "in_progress" };
    }

    return {
      status: "terminal",
      winner: state.winnerColor ?? "draw",
      reason: state.terminalStatus,
      scores: countPieces(state.board),
    };
  },
};

/**
 * Record a pass when the side to move has no legal placement; otherwise
 * return the state unchanged.
 */
export function advance(state: OthelloState): OthelloState {
  if (
    state.terminalStatus === null &&
    !hasLegalMove(state.board, state.activeColor)
  ) {
    return OthelloModule.pass(state);
  }
  return state;
}
