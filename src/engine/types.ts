/**
 * Core domain types for the grimoire engine.
 * Keep this file dependency-free so it can be shared across layers.
 */

/** Team a player wins or loses with. */
export type Alignment = "GOOD" | "EVIL";

/** Character categories; a category is always derived from the character. */
export type Category = "TOWNSFOLK" | "OUTSIDER" | "MINION" | "DEMON";

export type Character =
  | "WASHERWOMAN"
  | "LIBRARIAN"
  | "INVESTIGATOR"
  | "CHEF"
  | "EMPATH"
  | "FORTUNE_TELLER"
  | "UNDERTAKER"
  | "MONK"
  | "RAVENKEEPER"
  | "VIRGIN"
  | "SLAYER"
  | "SOLDIER"
  | "MAYOR"
  | "BUTLER"
  | "DRUNK"
  | "RECLUSE"
  | "SAINT"
  | "POISONER"
  | "SPY"
  | "SCARLET_WOMAN"
  | "BARON"
  | "IMP";

/** Lifecycle phases of the state machine. */
export type Phase = "SETUP" | "NIGHT" | "DAY" | "GAME_OVER";

/** Outcome that permanently ends the game. */
export type Winner = Alignment;

export type EndReason = "DEMON_DEAD" | "TWO_ALIVE" | "SAINT_EXECUTED" | "MAYOR_WIN" | "MAX_ROUNDS";

export type Vote = "YES" | "NO" | "CANT_VOTE";

/**
 * Seated player. Players are never removed; `alive` flips and `character` may be
 * reassigned when a Minion takes over the Demon.
 */
export interface Player {
  name: string;
  character: Character;
  alignment: Alignment;
  alive: boolean;
  /** Townsfolk character a Drunk believes they are. */
  drunkCharacter: Character | null;
  nominatedToday: boolean;
  usedNomination: boolean;
  /** Set once, when a dead player votes YES. */
  usedGhostVote: boolean;
  /** Any player may publicly attempt the Slayer shot once per game. */
  usedCounterAbility: boolean;
  messagesLeft: number;
}

/** Every kind of reminder the storyteller keeps; the kind implies the owning character. */
export type ReminderToken =
  | "RED_HERRING"
  | "WASHERWOMAN_TOWNSFOLK"
  | "WASHERWOMAN_OTHER"
  | "LIBRARIAN_OUTSIDER"
  | "LIBRARIAN_OTHER"
  | "INVESTIGATOR_MINION"
  | "INVESTIGATOR_OTHER"
  | "MONK_PROTECTED"
  | "RAVENKEEPER_WOKEN"
  | "UNDERTAKER_EXECUTED"
  | "BUTLER_MASTER"
  | "IS_THE_DRUNK"
  | "VIRGIN_POWER_USED"
  | "SLAYER_POWER_USED";

export interface ReminderEntry {
  /** Player whose ability placed the token. */
  holder: string;
  /** Player the token sits on. */
  target: string;
}

export type ReminderTable = Partial<Record<ReminderToken, ReminderEntry>>;

/** poisoned player name -> names of players currently poisoning them */
export type PoisonGraph = Record<string, string[]>;

export interface ChoppingBlock {
  votes: number;
  nominee: string;
}

/** Tunable knobs for balancing and play-testing. */
export interface GameOptions {
  maxRounds: number;
  dayActionRounds: number;
  /** 1-based action round at which nominations open. */
  nominationsOpenRound: number;
  /** Extra attempts after a failed decision. */
  maxRetries: number;
  messagesPerDay: number;
  demonBluffCount: number;
  /** Players that must still be alive after the Demon dies for the Scarlet Woman to take over. */
  scarletWomanMinAlive: number;
}

/**
 * Mutable snapshot of the entire game world.
 * Key invariants:
 * - exactly one DEMON-category character exists at setup.
 * - `winner !== null` implies `phase === "GAME_OVER"`.
 * - `choppingBlock` holds at most one nominee.
 */
export interface GameState {
  gameId: string;
  round: number;
  phase: Phase;
  /** Seating order. */
  players: Player[];
  reminders: ReminderTable;
  poison: PoisonGraph;
  choppingBlock: ChoppingBlock | null;
  nominationsOpen: boolean;
  winner: Winner | null;
  endReason: EndReason | null;
  /** Private notes delivered to each player, oldest first. */
  inbox: Record<string, string[]>;
}

/** Application-level error for invalid transitions and broken setup invariants. */
export class GameRuleError extends Error {
  constructor(public code: string, message: string) {
    super(message);
    this.name = "GameRuleError";
  }
}

/** A decision provider threw, timed out, or answered with the wrong shape. */
export class DecisionError extends Error {
  constructor(public player: string, message: string) {
    super(message);
    this.name = "DecisionError";
  }
}
