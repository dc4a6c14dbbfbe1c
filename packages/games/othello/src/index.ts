export { OthelloModule, advance, stateFromBoard } from "./rules";
export type { OthelloState, TerminalStatus } from "./rules";
export { OthelloUI, PIECE_SYMBOLS } from "./ui";
export {
  getFlips,
  getLegalMoves,
  hasLegalMove,
  applyMoveToBoard,
} from "./moves";
export type { OthelloMove } from "./moves";
export {
  BOARD_SIZE,
  ALL_DIRECTIONS,
  opponentOf,
  isOnBoard,
  emptyBoard,
  initialBoard,
  cloneBoard,
  boardFromRows,
  cellAt,
  setCell,
  scan,
  countDiscs,
  countPieces,
  isBoardFull,
} from "./state";
export type {
  Color,
  CellValue,
  Board,
  MutableBoard,
  Coord,
  Direction,
  ScannedCell,
} from "./state";
export {
  discDifferential,
  positionalScore,
  SCORE_WIN,
  EVALUATORS,
  EVALUATOR_NAMES,
  isEvaluatorName,
  createEvaluator,
} from "./evaluator";
export type { BoardEvaluator, EvaluatorName } from "./evaluator";
