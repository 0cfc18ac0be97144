import { believedCharacter, categoryOf, displayName, isDemon } from "./characters";
import { record, tell } from "./context";
import type { GameContext } from "./context";
import { placeReminder } from "./reminders";
import { clearPoisoner, isImpaired } from "./status";
import { countAlive, livingPlayers, seatsFrom } from "./utils";
import type { Player } from "./types";

export type DeathCause = "EXECUTION" | "DEMON" | "SLAYER";

/**
 * Kills a player and resolves everything a death sets off: death-tracking
 * reminders first, then the Scarlet Woman taking over a dead Demon.
 * Returns false when the player was already dead.
 */
export function killPlayer(ctx: GameContext, player: Player, cause: DeathCause): boolean {
  if (!player.alive) return false;
  const { state } = ctx;

  if (cause === "EXECUTION") {
    const undertaker = state.players.find(p => believedCharacter(p) === "UNDERTAKER");
    if (undertaker) placeReminder(state, "UNDERTAKER_EXECUTED", undertaker.name, player.name);
  }
  if (cause === "DEMON" && believedCharacter(player) === "RAVENKEEPER") {
    placeReminder(state, "RAVENKEEPER_WOKEN", player.name, player.name);
  }

  player.alive = false;
  record(ctx, {
    kind: "PLAYER_DEATH",
    description: `${player.name} died (${cause.toLowerCase()})`,
    participants: [player.name],
    metadata: { cause, character: player.character },
    visibility: cause === "DEMON" ? "PRIVATE" : "PUBLIC"
  });

  if (isDemon(player)) scarletWomanTakeover(ctx, player);
  return true;
}

/**
 * When the Demon dies while enough players live, a single unimpaired Scarlet Woman
 * becomes the Demon.
 */
export function scarletWomanTakeover(ctx: GameContext, deadDemon: Player): boolean {
  const { state } = ctx;
  const candidates = livingPlayers(state.players).filter(
    p => p.character === "SCARLET_WOMAN" && !isImpaired(state, p)
  );
  if (candidates.length !== 1) return false;
  if (countAlive(state.players) < ctx.options.scarletWomanMinAlive) return false;

  const [woman] = candidates;
  woman.character = deadDemon.character;
  clearPoisoner(state, woman.name);
  tell(ctx, woman, `The Demon has died and you have become the new Demon. Your character is now ${displayName(woman.character)}.`);
  record(ctx, {
    kind: "SCARLET_WOMAN_TRANSFORM",
    description: `${woman.name} became the ${displayName(woman.character)}`,
    participants: [woman.name, deadDemon.name],
    visibility: "PRIVATE"
  });
  return true;
}

/**
 * After the Demon killed itself: if nobody took over yet, the first living Minion in
 * seating order (after the old Demon) becomes the new Demon. Any poison the heir
 * held is lifted with its old character.
 */
export function passDemonhood(ctx: GameContext, oldDemon: Player): Player | null {
  const { state } = ctx;
  if (livingPlayers(state.players).some(isDemon)) return null;

  const heir = seatsFrom(state.players, oldDemon).find(p => p.alive && categoryOf(p.character) === "MINION");
  if (!heir) return null;

  heir.character = oldDemon.character;
  // a Poisoner turned Demon never wakes to lift its poison again
  clearPoisoner(state, heir.name);
  tell(ctx, heir, `The Demon has passed their power to you. Your character is now ${displayName(heir.character)}.`);
  record(ctx, {
    kind: "DEMON_SUCCESSION",
    description: `${heir.name} became the ${displayName(heir.character)}`,
    participants: [heir.name, oldDemon.name],
    visibility: "PRIVATE"
  });
  return heir;
}
