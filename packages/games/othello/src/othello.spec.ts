import { strict as assert } from "assert";
import { IllegalMoveError, OutOfBoundsError } from "@othello-lab/core";
import { playoutPositions } from "@othello-lab/engine";
import { OthelloModule, advance, stateFromBoard } from "./rules";
import { OthelloUI } from "./ui";
import { applyMoveToBoard, getFlips, getLegalMoves, hasLegalMove } from "./moves";
import {
  ALL_DIRECTIONS,
  BOARD_SIZE,
  Direction,
  boardFromRows,
  cellAt,
  cloneBoard,
  countPieces,
  emptyBoard,
  initialBoard,
  isBoardFull,
  scan,
} from "./state";

function coords(moves: { row: number; col: number }[]) {
  return moves.map(({ row, col }) => ({ row, col }));
}

const FULL_BLACK_BUT_ONE = [
  "BBBBBBBB",
  "BBBBBBBB",
  "BBBBBBBB",
  "BBBBBBBB",
  "BBBBBBBB",
  "BBBBBBBB",
  "BBBBBBBB",
  "BBBBBBW.",
];

// Black's only disc is hemmed in at a1; White can capture at c1
const BLACK_STUCK = [
  "WB......",
  "........",
  "........",
  "........",
  "........",
  "........",
  "........",
  "........",
];

describe("board model", () => {
  it("starts with the standard center four", () => {
    const board = initialBoard();
    assert.equal(board[3][3], "W");
    assert.equal(board[3][4], "B");
    assert.equal(board[4][3], "B");
    assert.equal(board[4][4], "W");
    assert.deepEqual(countPieces(board), { B: 2, W: 2 });
  });

  it("creates an empty board of the right size", () => {
    const board = emptyBoard();
    assert.equal(board.length, BOARD_SIZE);
    for (const row of board) {
      assert.equal(row.length, BOARD_SIZE);
      assert.ok(row.every((cell) => cell === ""));
    }
  });

  it("clones without sharing rows", () => {
    const board = initialBoard();
    const copy = cloneBoard(board);
    copy[0][0] = "B";
    assert.equal(board[0][0], "");
  });

  it("rejects reads outside the board", () => {
    const board = initialBoard();
    assert.throws(() => cellAt(board, -1, 0), OutOfBoundsError);
    assert.throws(() => cellAt(board, 0, 8), OutOfBoundsError);
    assert.throws(() => cellAt(board, 8, 8), OutOfBoundsError);
  });

  it("parses boards from rows", () => {
    const board = boardFromRows(BLACK_STUCK);
    assert.equal(board[0][0], "W");
    assert.equal(board[0][1], "B");
    assert.deepEqual(countPieces(board), { B: 1, W: 1 });
    assert.throws(() => boardFromRows(["BW"]), /Expected 8 rows/);
  });

  it("scans from the neighbour cell to the edge", () => {
    const cells = [...scan(initialBoard(), 3, 5, 0, -1)];
    assert.deepEqual(
      cells.map((c) => [c.col, c.value]),
      [
        [4, "B"],
        [3, "W"],
        [2, ""],
        [1, ""],
        [0, ""],
      ]
    );
  });

  it("detects a full board", () => {
    assert.equal(isBoardFull(initialBoard()), false);
    assert.equal(isBoardFull(boardFromRows(FULL_BLACK_BUT_ONE)), false);
    const full = boardFromRows(FULL_BLACK_BUT_ONE);
    full[7][7] = "W";
    assert.equal(isBoardFull(full), true);
  });
});

describe("move generator", () => {
  it("finds exactly four opening moves for Black in row-major order", () => {
    const moves = getLegalMoves(initialBoard(), "B");
    assert.deepEqual(coords(moves), [
      { row: 2, col: 3 },
      { row: 3, col: 2 },
      { row: 4, col: 5 },
      { row: 5, col: 4 },
    ]);
    assert.deepEqual(moves[0].flips, [{ row: 3, col: 3 }]);
    assert.deepEqual(moves[2].flips, [{ row: 4, col: 4 }]);
  });

  it("finds the mirrored opening moves for White", () => {
    const moves = getLegalMoves(initialBoard(), "W");
    assert.deepEqual(coords(moves), [
      { row: 2, col: 4 },
      { row: 3, col: 5 },
      { row: 4, col: 2 },
      { row: 5, col: 3 },
    ]);
  });

  it("collects flips from several directions at once", () => {
    const board = boardFromRows([
      "........",
      "........",
      "........",
      "....WB..",
      "...WW...",
      "...B....",
      "........",
      "........",
    ]);
    // the diagonal run (4,4) is not closed by a black disc
    assert.deepEqual(getFlips(board, 3, 3, "B"), [
      { row: 3, col: 4 },
      { row: 4, col: 3 },
    ]);
  });

  it("returns no flips for an occupied cell", () => {
    assert.deepEqual(getFlips(initialBoard(), 3, 3, "B"), []);
  });

  it("needs at least one opponent disc before the closing disc", () => {
    const board = boardFromRows([
      "........",
      "........",
      "........",
      "...BB...",
      "........",
      "........",
      "........",
      "........",
    ]);
    assert.deepEqual(getFlips(board, 3, 2, "B"), []);
    assert.equal(hasLegalMove(board, "B"), false);
  });

  it("does not depend on the order directions are scanned in", () => {
    const orders: Direction[][] = [
      [...ALL_DIRECTIONS].reverse(),
      [...ALL_DIRECTIONS.slice(3), ...ALL_DIRECTIONS.slice(0, 3)],
    ];
    const positions = playoutPositions(OthelloModule, "direction-order", 6, 40);

    for (const state of positions) {
      for (let r = 0; r < BOARD_SIZE; r++) {
        for (let c = 0; c < BOARD_SIZE; c++) {
          const expected = getFlips(state.board, r, c, state.activeColor);
          for (const order of orders) {
            assert.deepEqual(
              getFlips(state.board, r, c, state.activeColor, order),
              expected
            );
          }
        }
      }
    }
  });

  it("applies a move to a new board and leaves the input alone", () => {
    const board = initialBoard();
    const before = cloneBoard(board);
    const next = applyMoveToBoard(board, { row: 2, col: 3 }, "B");

    assert.deepEqual(board, before);
    assert.equal(next[2][3], "B");
    assert.equal(next[3][3], "B");
    assert.deepEqual(countPieces(next), { B: 4, W: 1 });
  });

  it("rejects a placement that flips nothing", () => {
    assert.throws(
      () => applyMoveToBoard(initialBoard(), { row: 0, col: 0 }, "B"),
      (err: unknown) =>
        err instanceof IllegalMoveError &&
        err.message === "Illegal move for B at (0, 0): no discs to flip"
    );
  });

  it("rejects a placement off the board", () => {
    assert.throws(
      () => applyMoveToBoard(initialBoard(), { row: 8, col: 0 }, "B"),
      OutOfBoundsError
    );
  });

  it("grows the mover's count by one plus the flips", () => {
    const positions = playoutPositions(OthelloModule, "disc-count", 6, 40);
    for (const state of positions) {
      const color = state.activeColor;
      const before = countPieces(state.board);
      for (const move of getLegalMoves(state.board, color)) {
        const after = countPieces(applyMoveToBoard(state.board, move, color));
        assert.equal(after[color], before[color] + 1 + move.flips.length);
      }
    }
  });
});

describe("OthelloModule", () => {
  describe("init", () => {
    it("has Black to move in a game in progress", () => {
      const state = OthelloModule.init();
      assert.equal(OthelloModule.currentPlayer(state), "B");
      assert.equal(state.consecutivePasses, 0);
      assert.equal(state.turnNumber, 0);
      assert.equal(OthelloModule.isTerminal(state), false);
      assert.deepEqual(OthelloModule.getOutcome(state), { status: "in_progress" });
    });
  });

  describe("applyMove", () => {
    it("flips the bracketed disc and hands the turn over", () => {
      const state = OthelloModule.init();
      const next = OthelloModule.applyMove(state, { row: 2, col: 3 });

      assert.deepEqual(countPieces(next.board), { B: 4, W: 1 });
      assert.equal(next.activeColor, "W");
      assert.equal(next.turnNumber, 1);
      assert.deepEqual(next.lastMove, { row: 2, col: 3 });
      // input state is untouched
      assert.deepEqual(countPieces(state.board), { B: 2, W: 2 });
      assert.equal(state.activeColor, "B");
    });

    it("rejects an illegal placement", () => {
      const state = OthelloModule.init();
      assert.throws(
        () => OthelloModule.applyMove(state, { row: 0, col: 0 }),
        IllegalMoveError
      );
      assert.deepEqual(state.board, initialBoard());
    });

    it("rejects an off-board coordinate as an illegal move", () => {
      assert.throws(
        () => OthelloModule.applyMove(OthelloModule.init(), { row: 3, col: 9 }),
        (err: unknown) =>
          err instanceof IllegalMoveError &&
          err.message === "Position (3, 9) is off the board"
      );
    });

    it("resets the pass counter", () => {
      const state = stateFromBoard(initialBoard(), "B", 1);
      const next = OthelloModule.applyMove(state, { row: 2, col: 3 });
      assert.equal(next.consecutivePasses, 0);
    });

    it("ends the game when the last empty cell is filled", () => {
      const state = stateFromBoard(boardFromRows(FULL_BLACK_BUT_ONE), "B");
      const next = OthelloModule.applyMove(state, { row: 7, col: 7 });

      assert.equal(next.terminalStatus, "board_full");
      assert.deepEqual(OthelloModule.getOutcome(next), {
        status: "terminal",
        winner: "B",
        reason: "board_full",
        scores: { B: 64, W: 0 },
      });
    });

    it("refuses moves once the game is over", () => {
      const full = boardFromRows(FULL_BLACK_BUT_ONE);
      full[7][7] = "W";
      const state = stateFromBoard(full, "B");
      assert.throws(
        () => OthelloModule.applyMove(state, { row: 0, col: 0 }),
        /Game is already over/
      );
    });
  });

  describe("pass", () => {
    it("is refused while a legal move exists", () => {
      assert.throws(
        () => OthelloModule.pass(OthelloModule.init()),
        (err: unknown) =>
          err instanceof IllegalMoveError &&
          err.message === "B has a legal move and cannot pass"
      );
    });

    it("hands the turn to the opponent when no move exists", () => {
      const state = stateFromBoard(boardFromRows(BLACK_STUCK), "B");
      assert.deepEqual(OthelloModule.getLegalMoves(state), []);

      const next = advance(state);
      assert.equal(next.activeColor, "W");
      assert.equal(next.consecutivePasses, 1);
      assert.equal(next.terminalStatus, null);
      assert.deepEqual(next.board, state.board);
      assert.deepEqual(coords(OthelloModule.getLegalMoves(next)), [{ row: 0, col: 2 }]);
    });

    it("leaves a state with a legal move alone in advance", () => {
      const state = OthelloModule.init();
      assert.equal(advance(state), state);
    });

    it("ends the game after two consecutive passes", () => {
      const board = emptyBoard();
      board[0][0] = "B";
      board[7][7] = "W";
      const first = OthelloModule.pass(stateFromBoard(board, "B"));
      assert.equal(first.terminalStatus, null);

      const second = OthelloModule.pass(first);
      assert.equal(second.terminalStatus, "double_pass");
      assert.equal(second.winnerColor, null);
      assert.deepEqual(OthelloModule.getOutcome(second), {
        status: "terminal",
        winner: "draw",
        reason: "double_pass",
        scores: { B: 1, W: 1 },
      });
      assert.deepEqual(OthelloModule.getLegalMoves(second), []);
    });
  });

  describe("terminal states", () => {
    it("treats a full board as terminal regardless of the pass counter", () => {
      const rows: string[] = [];
      for (let r = 0; r < BOARD_SIZE; r++) {
        rows.push(r % 2 === 0 ? "BWBWBWBW" : "WBWBWBWB");
      }
      const board = boardFromRows(rows);

      for (const passes of [0, 1]) {
        const state = stateFromBoard(board, "W", passes);
        assert.equal(OthelloModule.isTerminal(state), true);
        assert.equal(state.terminalStatus, "board_full");
        assert.deepEqual(OthelloModule.getOutcome(state), {
          status: "terminal",
          winner: "draw",
          reason: "board_full",
          scores: { B: 32, W: 32 },
        });
      }
    });

    it("reports the side with more discs as the winner", () => {
      const full = boardFromRows(FULL_BLACK_BUT_ONE);
      full[7][7] = "W";
      const state = stateFromBoard(full, "B");
      assert.equal(state.winnerColor, "B");
      const outcome = OthelloModule.getOutcome(state);
      assert.equal(outcome.status, "terminal");
      if (outcome.status === "terminal") {
        assert.equal(outcome.winner, "B");
        assert.deepEqual(outcome.scores, { B: 62, W: 2 });
      }
    });
  });
});

describe("OthelloUI", () => {
  it("parses coordinates and pass", () => {
    assert.deepEqual(OthelloUI.parseInput("d3"), {
      type: "place",
      data: { row: 2, col: 3 },
    });
    assert.deepEqual(OthelloUI.parseInput("  H8 "), {
      type: "place",
      data: { row: 7, col: 7 },
    });
    assert.deepEqual(OthelloUI.parseInput("pass"), { type: "pass", data: {} });
  });

  it("returns null for input it cannot read", () => {
    for (const raw of ["", "i1", "a9", "a0", "d", "d33", "hello"]) {
      assert.equal(OthelloUI.parseInput(raw), null, raw);
    }
  });

  it("formats moves as column letter and row number", () => {
    assert.equal(OthelloUI.formatMove({ row: 2, col: 3 }), "d3");
    assert.equal(OthelloUI.formatMove({ row: 7, col: 0 }), "a8");
  });

  it("renders the board with a header and one line per row", () => {
    const lines = OthelloUI.renderBoard(OthelloModule.init()).split("\n");
    assert.equal(lines.length, 18);
    assert.equal(lines[0], "    a   b   c   d   e   f   g   h");
    assert.equal(lines[1], "  ┌───┬───┬───┬───┬───┬───┬───┬───┐");
    assert.equal(lines[8], "4 │ . │ . │ . │ O │ X │ . │ . │ . │");
    assert.equal(lines[10], "5 │ . │ . │ . │ X │ O │ . │ . │ . │");
    assert.equal(lines[17], "  └───┴───┴───┴───┴───┴───┴───┴───┘");
  });

  it("renders the score and whose turn it is", () => {
    assert.equal(
      OthelloUI.renderStatus(OthelloModule.init()),
      "Black (X): 2  White (O): 2  Black to move"
    );
    const full = boardFromRows(FULL_BLACK_BUT_ONE);
    full[7][7] = "W";
    assert.equal(
      OthelloUI.renderStatus(stateFromBoard(full, "B")),
      "Black (X): 62  White (O): 2  Black wins"
    );
  });
});
