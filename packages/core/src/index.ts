export * from "./types/game";
export * from "./types/match";
export { TranscriptBuilder } from "./libs/TranscriptBuilder";

export {
  OthelloError,
  OutOfBoundsError,
  IllegalMoveError,
  InvalidDepthError,
  isOthelloError,
} from "./errors";
export type { ErrorCode } from "./errors";

export { default as log, isLogLevel } from "./logger";
export type { LogLevel } from "./logger";
