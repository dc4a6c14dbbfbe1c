import { isDeepStrictEqual } from "node:util";
import type { IGameModule } from "./interfaces/IGameModule";
import type { SearchOptions, SearchResult } from "./interfaces/ISearchAlgorithm";
import { PlayoutRng } from "./libs/playoutRng";
import { AlphaBeta } from "./search/AlphaBeta";
import { Minimax } from "./search/Minimax";

export interface ComparisonOptions<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
> extends SearchOptions<TState, TPlayer, TMove, TRequest> {
  positions: readonly TState[];
  depths: readonly number[];
}

export interface ComparisonRow<TMove> {
  /** Index into the compared positions */
  position: number;
  depth: number;
  minimax: SearchResult<TMove>;
  alphaBeta: SearchResult<TMove>;
  /** Same move and same score */
  agrees: boolean;
  /** alphaBeta.nodesVisited / minimax.nodesVisited */
  nodeRatio: number;
}

export interface ComparisonSummary {
  searches: number;
  agreements: number;
  minimaxNodes: number;
  alphaBetaNodes: number;
  nodeRatio: number;
}

/**
 * Run minimax and alpha-beta from identical positions at every requested
 * depth and record both results side by side.
 */
export function compareSearches<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
>(opts: ComparisonOptions<TState, TPlayer, TMove, TRequest>): ComparisonRow<TMove>[] {
  const minimax = new Minimax<TState, TPlayer, TMove, TRequest>(opts);
  const alphaBeta = new AlphaBeta<TState, TPlayer, TMove, TRequest>(opts);
  const rows: ComparisonRow<TMove>[] = [];

  opts.positions.forEach((state, position) => {
    for (const depth of opts.depths) {
      const mm = minimax.search(state, depth);
      const ab = alphaBeta.search(state, depth);
      rows.push({
        position,
        depth,
        minimax: mm,
        alphaBeta: ab,
        agrees: mm.score === ab.score && isDeepStrictEqual(mm.move, ab.move),
        nodeRatio: nodeRatio(ab.nodesVisited, mm.nodesVisited),
      });
    }
  });

  return rows;
}

/** Alpha-beta nodes per minimax node; 1 when neither search visited anything */
export function nodeRatio(alphaBetaNodes: number, minimaxNodes: number): number {
  return minimaxNodes === 0 ? 1 : alphaBetaNodes / minimaxNodes;
}

export function summarizeComparison<TMove>(
  rows: readonly ComparisonRow<TMove>[]
): ComparisonSummary {
  let agreements = 0;
  let minimaxNodes = 0;
  let alphaBetaNodes = 0;
  for (const row of rows) {
    if (row.agrees) agreements++;
    minimaxNodes += row.minimax.nodesVisited;
    alphaBetaNodes += row.alphaBeta.nodesVisited;
  }

  return {
    searches: rows.length,
    agreements,
    minimaxNodes,
    alphaBetaNodes,
    nodeRatio: nodeRatio(alphaBetaNodes, minimaxNodes),
  };
}

/**
 * Reach `count` positions by seeded random playouts of up to `maxPlies`
 * plies each. Playouts stop early at the end of the game; a side without a
 * legal move passes. The same seed always gives the same positions.
 */
export function playoutPositions<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
>(
  game: IGameModule<TState, TPlayer, TMove, TRequest>,
  seed: string,
  count: number,
  maxPlies: number
): TState[] {
  const rng = new PlayoutRng(seed);
  const positions: TState[] = [];

  for (let i = 0; i < count; i++) {
    let state = game.init();
    const plies = rng.playoutLength(maxPlies);
    for (let p = 0; p < plies && !game.isTerminal(state); p++) {
      const moves = game.getLegalMoves(state);
      state = moves.length === 0 ? game.pass(state) : game.applyMove(state, rng.pick(moves));
    }
    positions.push(state);
  }

  return positions;
}
