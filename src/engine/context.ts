import { GameRuleError } from "./types";
import type { GameOptions, GameState, Player } from "./types";
import type { DecisionProvider } from "./decisions";
import type { EventInput, EventLog } from "./events";
import type { Script } from "./script";
import type { RandomFn } from "./utils";

/** Everything a running game needs; threaded through every engine call. */
export interface GameContext {
  state: GameState;
  script: Script;
  options: GameOptions;
  random: RandomFn;
  providers: Record<string, DecisionProvider>;
  log: EventLog;
}

export function providerFor(ctx: GameContext, player: Player): DecisionProvider {
  const provider = ctx.providers[player.name];
  if (!provider) {
    throw new GameRuleError("NO_PROVIDER", `No decision provider seated for ${player.name}`);
  }
  return provider;
}

/** Delivers a private note to one player. */
export function tell(ctx: GameContext, player: Player, text: string): void {
  const inbox = ctx.state.inbox[player.name] ?? [];
  inbox.push(text);
  ctx.state.inbox[player.name] = inbox;
  providerFor(ctx, player).inform({ round: ctx.state.round, phase: ctx.state.phase, text });
}

/** Delivers a note to every seated player and records it publicly. */
export function announce(
  ctx: GameContext,
  text: string,
  event: Partial<Omit<EventInput, "description" | "visibility">> = {}
): void {
  for (const player of ctx.state.players) {
    tell(ctx, player, text);
  }
  ctx.log.record(ctx.state, { kind: "INFO_BROADCAST", ...event, description: text, visibility: "PUBLIC" });
}

export function record(ctx: GameContext, input: EventInput): void {
  ctx.log.record(ctx.state, input);
}
