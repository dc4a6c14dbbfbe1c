import { Command } from "commander";
import {
  compareSearches,
  playoutPositions,
  summarizeComparison,
} from "@othello-lab/engine";
import type { ComparisonRow } from "@othello-lab/engine";
import { OthelloModule, createEvaluator } from "@othello-lab/game-othello";
import type { EvaluatorName, OthelloMove } from "@othello-lab/game-othello";
import { parseDepth, parseEvaluatorName } from "../config";
import { errorMessage } from "./errors";

export interface CompareOptions {
  maxDepth: number;
  positions: number;
  plies: number;
  seed: string;
  evaluator: EvaluatorName;
}

function parseCount(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid ${name} "${value}". Use a positive integer`);
  }
  return n;
}

function pct(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/** One line per depth: node totals for both searches and how many agreed */
export function formatComparison(rows: readonly ComparisonRow<OthelloMove>[]): string[] {
  const depths = [...new Set(rows.map((r) => r.depth))].sort((a, b) => a - b);
  const lines = ["depth  minimax  alphabeta  ratio   agree"];

  for (const depth of depths) {
    const s = summarizeComparison(rows.filter((r) => r.depth === depth));
    lines.push(
      [
        String(depth).padStart(5),
        String(s.minimaxNodes).padStart(8),
        String(s.alphaBetaNodes).padStart(10),
        pct(s.nodeRatio).padStart(6),
        `${s.agreements}/${s.searches}`.padStart(7),
      ].join(" "),
    );
  }

  const total = summarizeComparison(rows);
  lines.push(
    `total  ${total.minimaxNodes} vs ${total.alphaBetaNodes} nodes ` +
      `(${pct(total.nodeRatio)}), ${total.agreements}/${total.searches} agree`,
  );
  return lines;
}

/** Returns false when the two searches disagreed anywhere */
export function runComparison(
  opts: CompareOptions,
  write: (text: string) => void,
): boolean {
  const positions = playoutPositions(OthelloModule, opts.seed, opts.positions, opts.plies);
  const depths = Array.from({ length: opts.maxDepth }, (_, i) => i + 1);
  const rows = compareSearches({
    game: OthelloModule,
    evaluate: createEvaluator(opts.evaluator),
    positions,
    depths,
  });

  for (const line of formatComparison(rows)) write(line);
  return rows.every((r) => r.agrees);
}

export function registerCompareCommand(program: Command): void {
  program
    .command("compare")
    .description("Check that minimax and alpha-beta agree and compare node counts")
    .option("--max-depth <n>", "Deepest search to run", "4")
    .option("--positions <n>", "Number of random positions", "5")
    .option("--plies <n>", "Longest random playout per position", "20")
    .option("--seed <seed>", "Seed for the random playouts", "compare")
    .option("-e, --eval <name>", "Evaluator: discs or positional", "discs")
    .action(
      (opts: {
        maxDepth: string;
        positions: string;
        plies: string;
        seed: string;
        eval: string;
      }) => {
        try {
          const agreed = runComparison(
            {
              maxDepth: parseDepth(opts.maxDepth),
              positions: parseCount(opts.positions, "position count"),
              plies: parseCount(opts.plies, "ply count"),
              seed: opts.seed,
              evaluator: parseEvaluatorName(opts.eval),
            },
            (text) => console.log(text),
          );
          if (!agreed) {
            console.error("Minimax and alpha-beta disagreed");
            process.exitCode = 1;
          }
        } catch (err: unknown) {
          console.error(`Error: ${errorMessage(err)}`);
          process.exitCode = 1;
        }
      },
    );
}
