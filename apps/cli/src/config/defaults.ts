export interface ConfigData {
  /** Search depth for the machine player, 1 to 10 */
  depth: string;
  /** The human player's color: "black" or "white" */
  color: string;
  /** Position evaluator used by the search: "discs" or "positional" */
  evaluator: string;
  /** bunyan log level */
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "depth",
  "color",
  "evaluator",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  depth: "4",
  color: "black",
  evaluator: "discs",
  logLevel: "warn",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  depth: "OTHELLO_DEPTH",
  color: "OTHELLO_COLOR",
  evaluator: "OTHELLO_EVALUATOR",
  logLevel: "LOG_LEVEL",
};
