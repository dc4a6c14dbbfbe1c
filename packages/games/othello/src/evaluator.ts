import type { Evaluator } from "@othello-lab/engine";
import { hasLegalMove } from "./moves";
import type { OthelloState } from "./rules";
import { BOARD_SIZE, Board, Color, countDiscs, opponentOf } from "./state";

/** Scores a board for `maximizing` against `minimizing` */
export type BoardEvaluator = (
  board: Board,
  maximizing: Color,
  minimizing: Color
) => number;

/** Disc count difference */
export const discDifferential: BoardEvaluator = (board, maximizing, minimizing) =>
  countDiscs(board, maximizing) - countDiscs(board, minimizing);

// Per-disc weights by position
const SCORE_CORNER = 8;
const SCORE_EDGE = 4;
const SCORE_INSIDE = 1;
// Leaving the opponent without a move
const SCORE_OPPONENT_BLOCKED = 4;

/** A finished game; above any sum of position weights */
export const SCORE_WIN = 10_000;

function positionWeight(row: number, col: number): number {
  const rowEdge = row === 0 || row === BOARD_SIZE - 1;
  const colEdge = col === 0 || col === BOARD_SIZE - 1;
  if (rowEdge && colEdge) return SCORE_CORNER;
  if (rowEdge || colEdge) return SCORE_EDGE;
  return SCORE_INSIDE;
}

/**
 * Disc difference weighted so corners and edges count more, with a bonus
 * for blocking the opponent. A board where neither side can move scores
 * +/-SCORE_WIN for the side with more discs, 0 for a draw.
 */
export const positionalScore: BoardEvaluator = (board, maximizing, minimizing) => {
  const maximizingCanMove = hasLegalMove(board, maximizing);
  const minimizingCanMove = hasLegalMove(board, minimizing);
  if (!maximizingCanMove && !minimizingCanMove) {
    return Math.sign(discDifferential(board, maximizing, minimizing)) * SCORE_WIN;
  }

  let score = 0;
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const cell = board[r][c];
      if (cell === maximizing) score += positionWeight(r, c);
      else if (cell === minimizing) score -= positionWeight(r, c);
    }
  }
  if (!minimizingCanMove) score += SCORE_OPPONENT_BLOCKED;
  if (!maximizingCanMove) score -= SCORE_OPPONENT_BLOCKED;
  return score;
};

export const EVALUATORS = {
  discs: discDifferential,
  positional: positionalScore,
} satisfies Record<string, BoardEvaluator>;

export type EvaluatorName = keyof typeof EVALUATORS;

export const EVALUATOR_NAMES: EvaluatorName[] = ["discs", "positional"];

export function isEvaluatorName(value: string): value is EvaluatorName {
  return EVALUATOR_NAMES.some((name) => name === value);
}

/** Adapt a board evaluator to the search engine's state-based signature */
export function createEvaluator(
  name: EvaluatorName = "discs"
): Evaluator<OthelloState, Color> {
  const evaluate: BoardEvaluator = EVALUATORS[name];
  return (state, perspective) =>
    evaluate(state.board, perspective, opponentOf(perspective));
}
