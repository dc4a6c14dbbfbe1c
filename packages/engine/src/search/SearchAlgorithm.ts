import { InvalidDepthError, log } from "@othello-lab/core";
import type { Evaluator, IGameModule } from "../interfaces/IGameModule";
import type {
  ISearchAlgorithm,
  SearchOptions,
  SearchResult,
} from "../interfaces/ISearchAlgorithm";

export const MIN_SEARCH_DEPTH = 1;
export const MAX_SEARCH_DEPTH = 10;

export function assertSearchDepth(depth: number): void {
  if (
    !Number.isInteger(depth) ||
    depth < MIN_SEARCH_DEPTH ||
    depth > MAX_SEARCH_DEPTH
  ) {
    throw new InvalidDepthError(depth, MIN_SEARCH_DEPTH, MAX_SEARCH_DEPTH);
  }
}

export interface RootChoice<TMove> {
  move: TMove | null;
  score: number;
}

/**
 * Shared plumbing for the depth-limited searches: depth validation, node
 * counting and logging. Subclasses implement the tree walk.
 *
 * Scores are always taken from the root player's point of view: the root
 * player maximizes, the opponent minimizes. States are immutable, so every
 * child is a fresh value and sibling branches never share a board.
 */
export abstract class SearchAlgorithm<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
> implements ISearchAlgorithm<TState, TMove>
{
  abstract readonly name: string;

  protected readonly game: IGameModule<TState, TPlayer, TMove, TRequest>;
  protected readonly evaluate: Evaluator<TState, TPlayer>;
  private nodesVisited = 0;

  constructor(opts: SearchOptions<TState, TPlayer, TMove, TRequest>) {
    this.game = opts.game;
    this.evaluate = opts.evaluate;
  }

  search(state: TState, depth: number): SearchResult<TMove> {
    assertSearchDepth(depth);

    const started = Date.now();
    this.nodesVisited = 0;
    const root = this.game.currentPlayer(state);
    const { move, score } = this.searchRoot(state, depth, root);
    const result: SearchResult<TMove> = {
      move,
      score,
      nodesVisited: this.nodesVisited,
    };

    log.child({ component: this.name }).debug(
      {
        game: this.game.gameId,
        depth,
        score,
        nodesVisited: result.nodesVisited,
        pass: move === null,
        elapsedMs: Date.now() - started,
      },
      "search complete"
    );

    return result;
  }

  protected abstract searchRoot(
    state: TState,
    depth: number,
    root: TPlayer
  ): RootChoice<TMove>;

  /** Count a node as entered */
  protected visit(): void {
    this.nodesVisited++;
  }

  /** Depth exhausted or game over: score the position statically */
  protected isLeaf(state: TState, depth: number): boolean {
    return depth === 0 || this.game.isTerminal(state);
  }
}
