import type { Action } from "./game";

export interface TranscriptEntry<TPlayer extends string, TMove> {
  sequence: number;
  player: TPlayer;
  action: Action<TMove>;
  /** Search score behind a machine move, null for human moves and passes */
  score: number | null;
  timestamp: number;
}
