import { isLogLevel } from "@othello-lab/core";
import type { LogLevel } from "@othello-lab/core";
import { MAX_SEARCH_DEPTH, MIN_SEARCH_DEPTH } from "@othello-lab/engine";
import {
  EVALUATOR_NAMES,
  isEvaluatorName,
} from "@othello-lab/game-othello";
import type { Color, EvaluatorName } from "@othello-lab/game-othello";
import { ConfigData } from "./defaults";

/** Validated settings for a game against the machine */
export interface PlaySettings {
  humanColor: Color;
  depth: number;
  evaluator: EvaluatorName;
}

export function parseDepth(value: string): number {
  const trimmed = value.trim();
  const depth = Number(trimmed);
  if (
    !/^\d+$/.test(trimmed) ||
    depth < MIN_SEARCH_DEPTH ||
    depth > MAX_SEARCH_DEPTH
  ) {
    throw new Error(
      `Invalid depth "${value}". Use an integer from ${MIN_SEARCH_DEPTH} to ${MAX_SEARCH_DEPTH}`,
    );
  }
  return depth;
}

export function parseColor(value: string): Color {
  const v = value.trim().toLowerCase();
  if (v === "black" || v === "b") return "B";
  if (v === "white" || v === "w") return "W";
  throw new Error(`Invalid color "${value}". Use black or white`);
}

export function parseEvaluatorName(value: string): EvaluatorName {
  const v = value.trim().toLowerCase();
  if (isEvaluatorName(v)) return v;
  throw new Error(
    `Invalid evaluator "${value}". Use one of: ${EVALUATOR_NAMES.join(", ")}`,
  );
}

export function parseLogLevel(value: string): LogLevel {
  const v = value.trim().toLowerCase();
  if (isLogLevel(v)) return v;
  throw new Error(`Invalid log level "${value}"`);
}

/** Per-key validation, applied before a value is written to the config file */
export const VALIDATORS: Record<keyof ConfigData, (value: string) => unknown> = {
  depth: parseDepth,
  color: parseColor,
  evaluator: parseEvaluatorName,
  logLevel: parseLogLevel,
};

export function toPlaySettings(config: ConfigData): PlaySettings {
  return {
    humanColor: parseColor(config.color),
    depth: parseDepth(config.depth),
    evaluator: parseEvaluatorName(config.evaluator),
  };
}
