import { Command } from "commander";
import { IllegalMoveError } from "@othello-lab/core";
import type { Outcome } from "@othello-lab/core";
import { MatchOrchestrator } from "@othello-lab/engine";
import {
  OthelloModule,
  OthelloUI,
  createEvaluator,
  opponentOf,
} from "@othello-lab/game-othello";
import type {
  Color,
  Coord,
  OthelloMove,
  OthelloState,
} from "@othello-lab/game-othello";
import { loadRuntimeConfig, setCliOverride } from "../config";
import type { PlaySettings } from "../config";
import { createPrompter } from "../prompter";
import type { Prompter } from "../prompter";
import { errorMessage } from "./errors";

export type OthelloMatch = MatchOrchestrator<OthelloState, Color, OthelloMove, Coord>;

export type PlayResult = Outcome<Color> | { status: "abandoned" };

export interface PlayLoopOptions {
  match: OthelloMatch;
  prompter: Prompter;
  write: (text: string) => void;
}

const QUIT_WORDS = ["quit", "exit", "q"];

export function createMatch(
  settings: PlaySettings,
  initialState?: OthelloState,
): OthelloMatch {
  return new MatchOrchestrator({
    game: OthelloModule,
    machinePlayer: opponentOf(settings.humanColor),
    depth: settings.depth,
    evaluate: createEvaluator(settings.evaluator),
    initialState,
  });
}

function renderState(match: OthelloMatch): string {
  const ui = match.getUI();
  const state = match.getState();
  const status = ui.renderStatus(state);
  const board = ui.renderBoard(state);
  return status === null ? board : `${board}\n${status}`;
}

export function formatOutcome(outcome: Outcome<Color>): string {
  if (outcome.status === "in_progress") return "Game in progress.";
  const { B, W } = outcome.scores;
  const result =
    outcome.winner === "draw"
      ? "Draw."
      : `${OthelloUI.playerLabels[outcome.winner]} wins.`;
  return `Final score: Black ${B}, White ${W}. ${result}`;
}

/**
 * Alternate human and machine turns until the game ends or the human quits.
 * A side without a legal move passes automatically.
 */
export async function runPlayLoop(opts: PlayLoopOptions): Promise<PlayResult> {
  const { match, prompter, write } = opts;
  const ui = match.getUI();
  const labels = ui.playerLabels;

  write(renderState(match));

  while (!match.isTerminal()) {
    const player = match.getCurrentPlayer();

    if (match.isMachineTurn()) {
      const choice = match.playMachineTurn();
      if (choice.type === "pass") {
        write(`${labels[player]} has no legal move and passes.`);
        continue;
      }
      write(
        `${labels[player]} plays ${ui.formatMove(choice.move)} ` +
          `(score ${choice.score}, ${choice.nodesVisited} nodes)`,
      );
      write(renderState(match));
      continue;
    }

    if (match.getLegalMoves().length === 0) {
      write(`${labels[player]} has no legal move and passes.`);
      match.passTurn();
      continue;
    }

    const raw = await prompter.ask(`${labels[player]} - ${ui.inputHint}: `);
    const input = raw.trim().toLowerCase();
    if (prompter.closed || QUIT_WORDS.includes(input)) {
      write("Game abandoned.");
      return { status: "abandoned" };
    }

    const action = ui.parseInput(input);
    if (action === null) {
      write(`Could not read "${raw.trim()}". ${ui.inputHint}.`);
      continue;
    }

    try {
      if (action.type === "pass") {
        match.passTurn();
      } else {
        match.submitMove(action.data);
      }
    } catch (err: unknown) {
      if (err instanceof IllegalMoveError) {
        write(`Illegal move: ${err.message}`);
        continue;
      }
      throw err;
    }
    write(renderState(match));
  }

  const outcome = match.getOutcome();
  write(formatOutcome(outcome));
  return outcome;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play a game of Othello against the computer")
    .option("-c, --color <color>", "Your color: black or white")
    .option("-d, --depth <n>", "Search depth for the computer (1-10)")
    .option("-e, --eval <name>", "Evaluator: discs or positional")
    .action(async (opts: { color?: string; depth?: string; eval?: string }) => {
      if (opts.color) setCliOverride("color", opts.color);
      if (opts.depth) setCliOverride("depth", opts.depth);
      if (opts.eval) setCliOverride("evaluator", opts.eval);

      const prompter = createPrompter();
      try {
        const { play: settings } = await loadRuntimeConfig();

        console.log(
          `You play ${OthelloUI.playerLabels[settings.humanColor]} ` +
            `(${settings.humanColor === "B" ? "X" : "O"}). ` +
            `Computer searches ${settings.depth} plies with the ${settings.evaluator} evaluator.`,
        );
        console.log('Type "quit" to leave.\n');

        await runPlayLoop({
          match: createMatch(settings),
          prompter,
          write: (text) => console.log(text),
        });
      } catch (err: unknown) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
      } finally {
        prompter.close();
      }
    });
}
