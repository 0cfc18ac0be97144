import type { GameState, ReminderEntry, ReminderToken } from "./types";

/**
 * How long a reminder survives once placed.
 * - GAME: never cleared.
 * - NIGHT: cleared at dawn.
 * - DAY: cleared at dusk, so it covers the whole following day.
 * - UNTIL_CONSUMED: removed by the handler that reads it.
 */
export type ReminderLifetime = "GAME" | "NIGHT" | "DAY" | "UNTIL_CONSUMED";

export const REMINDER_LIFETIMES: Record<ReminderToken, ReminderLifetime> = {
  RED_HERRING: "GAME",
  WASHERWOMAN_TOWNSFOLK: "GAME",
  WASHERWOMAN_OTHER: "GAME",
  LIBRARIAN_OUTSIDER: "GAME",
  LIBRARIAN_OTHER: "GAME",
  INVESTIGATOR_MINION: "GAME",
  INVESTIGATOR_OTHER: "GAME",
  IS_THE_DRUNK: "GAME",
  VIRGIN_POWER_USED: "GAME",
  SLAYER_POWER_USED: "GAME",
  MONK_PROTECTED: "NIGHT",
  BUTLER_MASTER: "DAY",
  RAVENKEEPER_WOKEN: "UNTIL_CONSUMED",
  UNDERTAKER_EXECUTED: "UNTIL_CONSUMED"
};

export const REMINDER_TOKENS: ReminderToken[] = [
  "RED_HERRING",
  "WASHERWOMAN_TOWNSFOLK",
  "WASHERWOMAN_OTHER",
  "LIBRARIAN_OUTSIDER",
  "LIBRARIAN_OTHER",
  "INVESTIGATOR_MINION",
  "INVESTIGATOR_OTHER",
  "MONK_PROTECTED",
  "RAVENKEEPER_WOKEN",
  "UNDERTAKER_EXECUTED",
  "BUTLER_MASTER",
  "IS_THE_DRUNK",
  "VIRGIN_POWER_USED",
  "SLAYER_POWER_USED"
];

export function placeReminder(state: GameState, token: ReminderToken, holder: string, target: string): void {
  state.reminders[token] = { holder, target };
}

export function getReminder(state: GameState, token: ReminderToken): ReminderEntry | null {
  return state.reminders[token] ?? null;
}

/** Reads and removes a reminder in one step. */
export function consumeReminder(state: GameState, token: ReminderToken): ReminderEntry | null {
  const entry = getReminder(state, token);
  delete state.reminders[token];
  return entry;
}

/** Drops every reminder with the given lifetime. */
export function clearReminders(state: GameState, lifetime: ReminderLifetime): void {
  for (const token of REMINDER_TOKENS) {
    if (REMINDER_LIFETIMES[token] === lifetime) delete state.reminders[token];
  }
}
