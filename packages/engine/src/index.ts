export { MatchOrchestrator } from "./MatchOrchestrator";
export type { MatchOrchestratorOptions, MachineMove } from "./MatchOrchestrator";
export type {
  IGameModule,
  GameUISpec,
  Evaluator,
} from "./interfaces/IGameModule";
export type {
  ISearchAlgorithm,
  SearchOptions,
  SearchResult,
} from "./interfaces/ISearchAlgorithm";

// Search
export { Minimax } from "./search/Minimax";
export { AlphaBeta } from "./search/AlphaBeta";
export {
  SearchAlgorithm,
  assertSearchDepth,
  MIN_SEARCH_DEPTH,
  MAX_SEARCH_DEPTH,
} from "./search/SearchAlgorithm";

// Diagnostics
export {
  compareSearches,
  summarizeComparison,
  playoutPositions,
  nodeRatio,
} from "./SearchComparison";
export type {
  ComparisonOptions,
  ComparisonRow,
  ComparisonSummary,
} from "./SearchComparison";
export { PlayoutRng } from "./libs/playoutRng";
