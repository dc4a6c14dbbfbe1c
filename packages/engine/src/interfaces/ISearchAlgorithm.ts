import type { Evaluator, IGameModule } from "./IGameModule";

export interface SearchResult<TMove> {
  /** The chosen move, or null when the side to move has to pass */
  move: TMove | null;
  /** Score of the chosen line, from the searching player's point of view */
  score: number;
  /** Nodes entered during the search, root included */
  nodesVisited: number;
}

/** A fixed-depth adversarial search */
export interface ISearchAlgorithm<TState, TMove> {
  readonly name: string;

  /** Find the best move for the player to move in `state`, looking `depth` plies ahead */
  search(state: TState, depth: number): SearchResult<TMove>;
}

export interface SearchOptions<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
> {
  game: IGameModule<TState, TPlayer, TMove, TRequest>;
  evaluate: Evaluator<TState, TPlayer>;
}
