import { RootChoice, SearchAlgorithm } from "./SearchAlgorithm";

/**
 * Plain depth-limited minimax. Explores every line to the requested depth;
 * kept as the reference the pruned search is checked against.
 */
export class Minimax<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
> extends SearchAlgorithm<TState, TPlayer, TMove, TRequest> {
  readonly name = "minimax";

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
        score: this.value(this.game.pass(state), depth - 1, root),
      };
    }

    let best: RootChoice<TMove> | null = null;
    for (const move of moves) {
      const score = this.value(this.game.applyMove(state, move), depth - 1, root);
      // strict comparison: the first of equal moves wins
      if (best === null || score > best.score) {
        best = { move, score };
      }
    }
    return best ?? { move: null, score: this.evaluate(state, root) };
  }

  private value(state: TState, depth: number, root: TPlayer): number {
    this.visit();

    if (this.isLeaf(state, depth)) {
      return this.evaluate(state, root);
    }

    const moves = this.game.getLegalMoves(state);
    if (moves.length === 0) {
      return this.value(this.game.pass(state), depth - 1, root);
    }

    const maximizing = this.game.currentPlayer(state) === root;
    let best = maximizing ? -Infinity : Infinity;
    for (const move of moves) {
      const score = this.value(this.game.applyMove(state, move), depth - 1, root);
      best = maximizing ? Math.max(best, score) : Math.min(best, score);
    }
    return best;
  }
}
