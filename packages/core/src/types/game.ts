/** A placement of a piece, carrying the game's own move payload */
export interface PlaceAction<TMove> {
  type: "place";
  data: TMove;
}

/** A pass (when the side to move has no legal placement) */
export interface PassAction {
  type: "pass";
  data: Record<string, never>;
}

export type Action<TMove> = PlaceAction<TMove> | PassAction;

export function isPlaceAction<TMove>(
  action: Action<TMove>
): action is PlaceAction<TMove> {
  return action.type === "place";
}

export function isPassAction<TMove>(action: Action<TMove>): action is PassAction {
  return action.type === "pass";
}

export function placeAction<TMove>(data: TMove): PlaceAction<TMove> {
  return { type: "place", data };
}

export function passAction(): PassAction {
  return { type: "pass", data: {} };
}

export interface InProgressOutcome {
  status: "in_progress";
}

export interface TerminalOutcome<TPlayer extends string> {
  status: "terminal";
  /** The winning player, or "draw" on equal scores */
  winner: TPlayer | "draw";
  /** Why the game ended (e.g. "board_full", "double_pass") */
  reason: string;
  scores: Record<TPlayer, number>;
}

export type Outcome<TPlayer extends string> =
  | InProgressOutcome
  | TerminalOutcome<TPlayer>;
