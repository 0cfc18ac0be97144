import { displayName } from "./characters";
import { REMINDER_TOKENS } from "./reminders";
import { isImpaired } from "./status";
import type { Alignment, Character, GameState, ReminderEntry, ReminderToken } from "./types";

export interface GrimoireSeat {
  name: string;
  character: Character;
  drunkCharacter: Character | null;
  alignment: Alignment;
  alive: boolean;
  impaired: boolean;
  poisonedBy: string[];
}

/** The storyteller's full picture of the game: nothing is redacted or fabricated. */
export interface Grimoire {
  round: number;
  phase: GameState["phase"];
  seats: GrimoireSeat[];
  reminders: Array<{ token: ReminderToken } & ReminderEntry>;
  choppingBlock: GameState["choppingBlock"];
}

export function buildGrimoire(state: GameState): Grimoire {
  const reminders = REMINDER_TOKENS.flatMap(token => {
    const entry = state.reminders[token];
    return entry ? [{ token, ...entry }] : [];
  });

  return {
    round: state.round,
    phase: state.phase,
    seats: state.players.map(p => ({
      name: p.name,
      character: p.character,
      drunkCharacter: p.drunkCharacter,
      alignment: p.alignment,
      alive: p.alive,
      impaired: isImpaired(state, p),
      poisonedBy: [...(state.poison[p.name] ?? [])]
    })),
    reminders,
    choppingBlock: state.choppingBlock ? { ...state.choppingBlock } : null
  };
}

/** Text rendering of the grimoire, as the Spy receives it. */
export function describeGrimoire(grimoire: Grimoire): string {
  const lines = ["Grimoire:"];
  for (const seat of grimoire.seats) {
    const believed = seat.drunkCharacter ? ` (believes ${displayName(seat.drunkCharacter)})` : "";
    const status = seat.alive ? "alive" : "dead";
    const poisoned = seat.poisonedBy.length > 0 ? `, poisoned by ${seat.poisonedBy.join(", ")}` : "";
    lines.push(`- ${seat.name}: ${displayName(seat.character)}${believed}, ${status}${poisoned}`);
  }
  if (grimoire.reminders.length > 0) {
    lines.push("Reminders:");
    for (const reminder of grimoire.reminders) {
      lines.push(`- ${reminder.token} on ${reminder.target} (from ${reminder.holder})`);
    }
  }
  return lines.join("\n");
}
