import { OutOfBoundsError } from "@othello-lab/core";

/** Disc colors: "B" (Black) or "W" (White) */
export type Color = "B" | "W";

/** Cell values: a disc color, or "" (empty) */
export type CellValue = Color | "";

/** 8x8 board represented as a 2D array, addressed board[row][col] */
export type Board = readonly (readonly CellValue[])[];

/** A board under construction; only ever a private clone */
export type MutableBoard = CellValue[][];

/** Row/column coordinate on the board */
export interface Coord {
  row: number;
  col: number;
}

/** A cell visited while scanning along a direction */
export interface ScannedCell extends Coord {
  value: CellValue;
}

/** Board dimension */
export const BOARD_SIZE = 8;

export type Direction = readonly [number, number];

/** All 8 compass directions */
export const ALL_DIRECTIONS: readonly Direction[] = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1],           [0, 1],
  [1, -1],  [1, 0],  [1, 1],
];

export function opponentOf(color: Color): Color {
  return color === "B" ? "W" : "B";
}

export function isOnBoard(row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < BOARD_SIZE &&
    col >= 0 &&
    col < BOARD_SIZE
  );
}

/** Create an empty 8x8 board */
export function emptyBoard(): MutableBoard {
  const board: MutableBoard = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    board.push(new Array<CellValue>(BOARD_SIZE).fill(""));
  }
  return board;
}

/** Create the initial board with the standard center 4 pieces */
export function initialBoard(): MutableBoard {
  const board = emptyBoard();
  board[3][3] = "W";
  board[3][4] = "B";
  board[4][3] = "B";
  board[4][4] = "W";
  return board;
}

/** Deep-clone a board into a fresh mutable copy */
export function cloneBoard(board: Board): MutableBoard {
  return board.map((r) => [...r]);
}

/**
 * Build a board from eight rows of "B", "W" and "." characters,
 * e.g. `"...WB..."`. Whitespace inside a row is ignored.
 */
export function boardFromRows(rows: readonly string[]): MutableBoard {
  if (rows.length !== BOARD_SIZE) {
    throw new Error(`Expected ${BOARD_SIZE} rows, got ${rows.length}`);
  }
  const board = emptyBoard();
  rows.forEach((raw, r) => {
    const row = raw.replace(/\s+/g, "");
    if (row.length !== BOARD_SIZE) {
      throw new Error(`Row ${r} must have ${BOARD_SIZE} cells: "${raw}"`);
    }
    for (let c = 0; c < BOARD_SIZE; c++) {
      const ch = row[c];
      if (ch === "B" || ch === "W") board[r][c] = ch;
      else if (ch !== ".") {
        throw new Error(`Unexpected cell "${ch}" at row ${r}, col ${c}`);
      }
    }
  });
  return board;
}

export function cellAt(board: Board, row: number, col: number): CellValue {
  if (!isOnBoard(row, col)) throw new OutOfBoundsError(row, col);
  return board[row][col];
}

/** Place a disc, overwriting whatever the cell held */
export function setCell(
  board: MutableBoard,
  row: number,
  col: number,
  color: Color
): void {
  if (!isOnBoard(row, col)) throw new OutOfBoundsError(row, col);
  board[row][col] = color;
}

/**
 * Walk from the neighbour of (row, col) in direction (dr, dc) up to the
 * board edge. The starting cell itself is not yielded.
 */
export function* scan(
  board: Board,
  row: number,
  col: number,
  dr: number,
  dc: number
): Generator<ScannedCell> {
  let r = row + dr;
  let c = col + dc;
  while (isOnBoard(r, c)) {
    yield { row: r, col: c, value: board[r][c] };
    r += dr;
    c += dc;
  }
}

export function countDiscs(board: Board, color: Color): number {
  let n = 0;
  for (const row of board) {
    for (const cell of row) {
      if (cell === color) n++;
    }
  }
  return n;
}

/** Count pieces of each color on the board */
export function countPieces(board: Board): { B: number; W: number } {
  return { B: countDiscs(board, "B"), W: countDiscs(board, "W") };
}

/** Check if every cell on the board is occupied */
export function isBoardFull(board: Board): boolean {
  return board.every((row) => row.every((cell) => cell !== ""));
}
