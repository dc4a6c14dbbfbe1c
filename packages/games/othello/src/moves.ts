import { IllegalMoveError, OutOfBoundsError } from "@othello-lab/core";
import {
  ALL_DIRECTIONS,
  BOARD_SIZE,
  Board,
  Color,
  Coord,
  Direction,
  cellAt,
  cloneBoard,
  isOnBoard,
  opponentOf,
  scan,
  setCell,
} from "./state";

/** A legal placement together with the discs it would flip */
export interface OthelloMove extends Coord {
  flips: Coord[];
}

function compareCoords(a: Coord, b: Coord): number {
  return a.row - b.row || a.col - b.col;
}

/**
 * Get all opponent pieces that would be flipped by placing `color` at (row, col).
 * Returns an empty array if the cell is occupied or no flips occur.
 *
 * The result is the union over `directions`, sorted row-major, so it is the
 * same whatever order the directions are scanned in.
 */
export function getFlips(
  board: Board,
  row: number,
  col: number,
  color: Color,
  directions: readonly Direction[] = ALL_DIRECTIONS
): Coord[] {
  if (cellAt(board, row, col) !== "") return [];
  const opponent = opponentOf(color);
  const allFlips: Coord[] = [];

  for (const [dr, dc] of directions) {
    // a run has to start right next to the placed disc
    const nr = row + dr;
    const nc = col + dc;
    if (!isOnBoard(nr, nc) || board[nr][nc] !== opponent) continue;

    const lineFlips: Coord[] = [];
    for (const cell of scan(board, row, col, dr, dc)) {
      if (cell.value === opponent) {
        lineFlips.push({ row: cell.row, col: cell.col });
        continue;
      }
      // bracketed only when the run ends on one of our own discs
      if (cell.value === color && lineFlips.length > 0) {
        allFlips.push(...lineFlips);
      }
      break;
    }
  }

  return allFlips.sort(compareCoords);
}

/** All legal moves for `color`, in row-major board order */
export function getLegalMoves(board: Board, color: Color): OthelloMove[] {
  const moves: OthelloMove[] = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const flips = getFlips(board, r, c, color);
      if (flips.length > 0) moves.push({ row: r, col: c, flips });
    }
  }
  return moves;
}

/** Check if the given color has at least one legal move on the board */
export function hasLegalMove(board: Board, color: Color): boolean {
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      if (getFlips(board, r, c, color).length > 0) return true;
    }
  }
  return false;
}

/**
 * Place `color` at `coord` and flip every bracketed disc.
 * Returns a new board; the input board is left as it was.
 */
export function applyMoveToBoard(
  board: Board,
  coord: Coord,
  color: Color
): Board {
  const { row, col } = coord;
  if (!isOnBoard(row, col)) throw new OutOfBoundsError(row, col);

  const flips = getFlips(board, row, col, color);
  if (flips.length === 0) {
    throw new IllegalMoveError(
      `Illegal move for ${color} at (${row}, ${col}): no discs to flip`
    );
  }

  const next = cloneBoard(board);
  setCell(next, row, col, color);
  for (const flip of flips) {
    setCell(next, flip.row, flip.col, color);
  }
  return next;
}
