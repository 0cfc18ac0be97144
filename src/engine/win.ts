import { isDemon } from "./characters";
import { announce, record } from "./context";
import type { GameContext } from "./context";
import type { EndReason, Player, Winner } from "./types";
import { countAlive } from "./utils";

export interface WinResult {
  winner: Winner;
  reason: EndReason;
}

/**
 * Ordinary win check over the roster.
 * - Good wins once no living Demon remains (checked first).
 * - Evil wins when two or fewer players are alive.
 * Instant wins (Saint executed, Mayor stalemate) are raised where they happen.
 */
export function evaluateWithReason(players: Player[]): WinResult | null {
  if (!players.some(p => p.alive && isDemon(p))) return { winner: "GOOD", reason: "DEMON_DEAD" };
  if (countAlive(players) <= 2) return { winner: "EVIL", reason: "TWO_ALIVE" };
  return null;
}

export function evaluate(players: Player[]): Winner | null {
  return evaluateWithReason(players)?.winner ?? null;
}

/** Ends the game once; later calls keep the first winner. */
export function declareWinner(ctx: GameContext, winner: Winner, reason: EndReason): void {
  const { state } = ctx;
  if (state.winner) return;
  state.winner = winner;
  state.endReason = reason;
  state.phase = "GAME_OVER";
  state.nominationsOpen = false;
  announce(ctx, `Storyteller: The game is over. ${winner === "GOOD" ? "Good" : "Evil"} wins.`);
  record(ctx, {
    kind: "GAME_END",
    description: `${winner} wins (${reason})`,
    metadata: { winner, reason, round: state.round }
  });
}

/** Runs the ordinary check against the live roster; true when the game is (now) over. */
export function checkWin(ctx: GameContext): boolean {
  if (ctx.state.winner) return true;
  const result = evaluateWithReason(ctx.state.players);
  if (result) declareWinner(ctx, result.winner, result.reason);
  return ctx.state.winner !== null;
}
