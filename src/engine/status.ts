import { getPlayer } from "./utils";
import type { GameState, Player } from "./types";

/**
 * Whether a player's ability is currently impaired (drunk or poisoned).
 *
 * The Drunk is always impaired. Anyone else is impaired when a living poisoner in
 * their PoisonGraph entry is not impaired itself. `path` holds the players whose
 * impairment is being decided further up the traversal. If any poisoner in the
 * entry is on the path (or is the player), the check short-circuits: the player
 * resolves as not impaired and the entry's other poisoners are not consulted.
 * This keeps 2-cycles and self-loops finite.
 */
export function isImpaired(state: GameState, player: Player, path: Set<string> = new Set()): boolean {
  if (player.character === "DRUNK") return true;

  const poisoners = (state.poison[player.name] ?? [])
    .map(name => getPlayer(state.players, name))
    .filter((p): p is Player => p !== null && p.alive);

  if (poisoners.some(p => path.has(p.name) || p.name === player.name)) return false;

  const nextPath = new Set(path).add(player.name);
  return poisoners.some(p => !isImpaired(state, p, nextPath));
}

/** Clears every edge the poisoner holds, then poisons `target`. */
export function poison(state: GameState, poisoner: string, target: string): void {
  clearPoisoner(state, poisoner);
  state.poison[target] = [...(state.poison[target] ?? []), poisoner];
}

export function clearPoisoner(state: GameState, poisoner: string): void {
  for (const [victim, sources] of Object.entries(state.poison)) {
    const remaining = sources.filter(name => name !== poisoner);
    if (remaining.length === 0) delete state.poison[victim];
    else state.poison[victim] = remaining;
  }
}
