import {
  IllegalMoveError,
  TranscriptBuilder,
  log,
  passAction,
  placeAction,
} from "@othello-lab/core";
import type { Outcome, TranscriptEntry } from "@othello-lab/core";
import type { Evaluator, GameUISpec, IGameModule } from "./interfaces/IGameModule";
import type { ISearchAlgorithm } from "./interfaces/ISearchAlgorithm";
import { AlphaBeta } from "./search/AlphaBeta";
import { assertSearchDepth } from "./search/SearchAlgorithm";

export interface MatchOrchestratorOptions<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
> {
  game: IGameModule<TState, TPlayer, TMove, TRequest>;
  /** The side the engine plays */
  machinePlayer: TPlayer;
  /** Search depth for machine moves, 1 to 10 */
  depth: number;
  evaluate: Evaluator<TState, TPlayer>;
  /** Defaults to alpha-beta */
  searcher?: ISearchAlgorithm<TState, TMove>;
  /** Start from this state instead of game.init() */
  initialState?: TState;
}

/** The engine's answer to a move request */
export type MachineMove<TMove> =
  | { type: "place"; move: TMove; score: number; nodesVisited: number }
  | { type: "pass" };

/**
 * Orchestrates a human-vs-machine match: holds the current state, applies
 * human moves, asks the search for machine moves and keeps the transcript.
 *
 * Every transition computes the next state first and only then replaces the
 * current one, so a rejected move leaves the match as it was.
 */
export class MatchOrchestrator<
  TState,
  TPlayer extends string,
  TMove extends TRequest,
  TRequest = TMove,
> {
  private game: IGameModule<TState, TPlayer, TMove, TRequest>;
  private state: TState;
  private machinePlayer: TPlayer;
  private depth: number;
  private searcher: ISearchAlgorithm<TState, TMove>;
  private transcript = new TranscriptBuilder<TPlayer, TRequest>();
  private logger = log.child({ component: "match" });

  constructor(opts: MatchOrchestratorOptions<TState, TPlayer, TMove, TRequest>) {
    assertSearchDepth(opts.depth);

    this.game = opts.game;
    this.machinePlayer = opts.machinePlayer;
    this.depth = opts.depth;
    this.searcher =
      opts.searcher ??
      new AlphaBeta<TState, TPlayer, TMove, TRequest>({
        game: opts.game,
        evaluate: opts.evaluate,
      });
    this.state = opts.initialState ?? opts.game.init();
  }

  getState(): TState {
    return this.state;
  }

  getCurrentPlayer(): TPlayer {
    return this.game.currentPlayer(this.state);
  }

  /** Rendering and input parsing for the game being played */
  getUI(): GameUISpec<TState, TPlayer, TRequest> {
    return this.game.ui;
  }

  getMachinePlayer(): TPlayer {
    return this.machinePlayer;
  }

  isMachineTurn(): boolean {
    return !this.isTerminal() && this.getCurrentPlayer() === this.machinePlayer;
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.state);
  }

  getOutcome(): Outcome<TPlayer> {
    return this.game.getOutcome(this.state);
  }

  getLegalMoves(): TMove[] {
    return this.game.getLegalMoves(this.state);
  }

  getTranscript(): TranscriptEntry<TPlayer, TRequest>[] {
    return this.transcript.getEntries();
  }

  /**
   * Submit a human move for the side to move. Throws IllegalMoveError and
   * keeps the current state if the move is not legal.
   */
  submitMove(move: TRequest): TState {
    if (this.isMachineTurn()) {
      throw new IllegalMoveError("It is the machine's turn");
    }
    const player = this.getCurrentPlayer();
    this.state = this.game.applyMove(this.state, move);
    this.transcript.addEntry(player, placeAction(move));
    this.logIfOver();
    return this.state;
  }

  /** Record a pass for the side to move; throws IllegalMoveError if it has a move */
  passTurn(): TState {
    const player = this.getCurrentPlayer();
    this.state = this.game.pass(this.state);
    this.transcript.addEntry(player, passAction());
    this.logIfOver();
    return this.state;
  }

  /** Ask the search for the move to play, without playing it */
  requestMachineMove(): MachineMove<TMove> {
    if (this.isTerminal()) {
      throw new IllegalMoveError("Game is already over");
    }

    const result = this.searcher.search(this.state, this.depth);
    if (result.move === null) {
      return { type: "pass" };
    }
    return {
      type: "place",
      move: result.move,
      score: result.score,
      nodesVisited: result.nodesVisited,
    };
  }

  /** Search for the machine's move and apply it (or pass) */
  playMachineTurn(): MachineMove<TMove> {
    if (!this.isMachineTurn()) {
      throw new IllegalMoveError("It is not the machine's turn");
    }

    const choice = this.requestMachineMove();
    if (choice.type === "pass") {
      this.passTurn();
      return choice;
    }

    this.state = this.game.applyMove(this.state, choice.move);
    this.transcript.addEntry(
      this.machinePlayer,
      placeAction<TRequest>(choice.move),
      choice.score
    );
    this.logger.debug(
      { score: choice.score, nodesVisited: choice.nodesVisited },
      "machine moved"
    );
    this.logIfOver();
    return choice;
  }

  private logIfOver(): void {
    const outcome = this.getOutcome();
    if (outcome.status === "terminal") {
      this.logger.info(
        { winner: outcome.winner, reason: outcome.reason, scores: outcome.scores },
        "game over"
      );
    }
  }
}
