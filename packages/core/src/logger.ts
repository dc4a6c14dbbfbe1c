import bunyan from "bunyan";

export type LogLevel = bunyan.LogLevelString;

const LEVELS: LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL || "info";

// stderr keeps stdout free for the rendered board
const log = bunyan.createLogger({
  name: "othello-lab",
  level: isLogLevel(envLevel) ? envLevel : "info",
  stream: process.stderr,
});

export default log;
