import { RootChoice, SearchAlgorithm } from "./SearchAlgorithm";

/**
 * Minimax with alpha-beta pruning. Children are visited in the same order as
 * {@link Minimax} and the root keeps the first of equally scored moves, so
 * both searches pick the same move with the same score; this one just skips
 * subtrees that cannot change the result.
 */
export class AlphaBeta<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
> extends SearchAlgorithm<TState, TPlayer, TMove, TRequest> {
  readonly name = "alphabeta";

  protected searchRoot(
    state: TState,
    depth: number,
    root: TPlayer
  ): RootChoice<TMove> {
    this.visit();

    if (this.game.isTerminal(state)) {
      return { move: null, score: this.evaluate(state, root) };
    }

    const moves = this.game.getLegalMoves(state);
    if (moves.length === 0) {
      return {
        move: null,
        score: this.value(this.game.pass(state), depth - 1, -Infinity, Infinity, root),
      };
    }

    let best: RootChoice<TMove> | null = null;
    let alpha = -Infinity;
    for (const move of moves) {
      const child = this.game.applyMove(state, move);
      const score = this.value(child, depth - 1, alpha, Infinity, root);
      // a child that fails low returns at most alpha, never more than the
      // current best, so it cannot displace it
      if (best === null || score > best.score) {
        best = { move, score };
      }
      alpha = Math.max(alpha, score);
    }
    return best ?? { move: null, score: this.evaluate(state, root) };
  }

  private value(
    state: TState,
    depth: number,
    alpha: number,
    beta: number,
    root: TPlayer
  ): number {
    this.visit();

    if (this.isLeaf(state, depth)) {
      return this.evaluate(state, root);
    }

    const moves = this.game.getLegalMoves(state);
    if (moves.length === 0) {
      return this.value(this.game.pass(state), depth - 1, alpha, beta, root);
    }

    if (this.game.currentPlayer(state) === root) {
      let best = -Infinity;
      for (const move of moves) {
        const score = this.value(this.game.applyMove(state, move), depth - 1, alpha, beta, root);
        best = Math.max(best, score);
        if (best >= beta) break; // beta cutoff
        alpha = Math.max(alpha, best);
      }
      return best;
    }

    let best = Infinity;
    for (const move of moves) {
      const score = this.value(this.game.applyMove(state, move), depth - 1, alpha, beta, root);
      best = Math.min(best, score);
      if (best <= alpha) break; // alpha cutoff
      beta = Math.min(beta, best);
    }
    return best;
  }
}
