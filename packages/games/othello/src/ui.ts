import { placeAction, passAction } from "@othello-lab/core";
import type { Action } from "@othello-lab/core";
import type { GameUISpec } from "@othello-lab/engine";
import type { OthelloState } from "./rules";
import { BOARD_SIZE, CellValue, Color, Coord, countPieces } from "./state";

const COL_LETTERS = "abcdefgh";

export const PIECE_SYMBOLS: Record<CellValue, string> = {
  B: "X",
  W: "O",
  "": ".",
};

const PLAYER_LABELS: Record<Color, string> = {
  B: "Black",
  W: "White",
};

export const OthelloUI: GameUISpec<OthelloState, Color, Coord> = {
  playerLabels: PLAYER_LABELS,

  inputHint: "Enter position (e.g. d3) or pass",

  renderBoard(state: OthelloState): string {
    const lines: string[] = [];

    // Column header
    lines.push("    " + COL_LETTERS.split("").join("   "));
    // Top border
    lines.push("  ┌" + "───┬".repeat(BOARD_SIZE - 1) + "───┐");

    for (let r = 0; r < BOARD_SIZE; r++) {
      const cells = state.board[r].map((v) => ` ${PIECE_SYMBOLS[v]} `);
      lines.push(`${r + 1} │${cells.join("│")}│`);

      if (r < BOARD_SIZE - 1) {
        lines.push("  ├" + "───┼".repeat(BOARD_SIZE - 1) + "───┤");
      }
    }

    // Bottom border
    lines.push("  └" + "───┴".repeat(BOARD_SIZE - 1) + "───┘");

    return lines.join("\n");
  },

  renderStatus(state: OthelloState): string | null {
    const { B, W } = countPieces(state.board);
    const score = `Black (X): ${B}  White (O): ${W}`;

    if (state.terminalStatus === null) {
      return `${score}  ${PLAYER_LABELS[state.activeColor]} to move`;
    }
    if (state.winnerColor === null) {
      return `${score}  Draw`;
    }
    return `${score}  ${PLAYER_LABELS[state.winnerColor]} wins`;
  },

  parseInput(raw: string): Action<Coord> | null {
    const trimmed = raw.trim().toLowerCase();

    if (trimmed === "pass") {
      return passAction();
    }

    // Parse coordinate like "d3" → col 3, row 2
    if (trimmed.length === 2) {
      const col = COL_LETTERS.indexOf(trimmed[0]);
      const row = Number(trimmed[1]) - 1;

      if (col >= 0 && Number.isInteger(row) && row >= 0 && row < BOARD_SIZE) {
        return placeAction({ row, col });
      }
    }

    return null;
  },

  formatMove(move: Coord): string {
    return `${COL_LETTERS[move.col]}${move.row + 1}`;
  },
};
