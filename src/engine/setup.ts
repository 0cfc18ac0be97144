import { randomUUID } from "crypto";
import { alignmentOf, categoryOf, isCharacter } from "./characters";
import type { GameContext } from "./context";
import type { DecisionProvider } from "./decisions";
import { EventLog } from "./events";
import { placeReminder } from "./reminders";
import { TROUBLE_BREWING, charactersInCategory, scriptCharacters } from "./script";
import type { Script } from "./script";
import { GameRuleError } from "./types";
import type { Category, Character, GameOptions, GameState, Player, ReminderToken } from "./types";
import { createRandom, randomItem, sample, shuffle } from "./utils";
import type { RandomFn } from "./utils";

/** Default balance for a table of five to fifteen. */
export const DEFAULT_GAME_OPTIONS: GameOptions = {
  maxRounds: 6,
  dayActionRounds: 4,
  nominationsOpenRound: 3,
  maxRetries: 2,
  messagesPerDay: 2,
  demonBluffCount: 3,
  scarletWomanMinAlive: 4
};

export type GameOptionsOverrides = Partial<GameOptions>;

/** Merges supplied overrides with the default options. */
export function mergeOptions(overrides?: GameOptionsOverrides): GameOptions {
  return { ...DEFAULT_GAME_OPTIONS, ...overrides };
}

export const DEFAULT_PLAYER_NAMES = [
  "Susan",
  "John",
  "Emma",
  "Michael",
  "Olivia",
  "James",
  "Sophia",
  "William",
  "Ava",
  "Steve",
  "Emily",
  "Daniel",
  "Isabella",
  "David",
  "Mia"
];

export const MIN_PLAYERS = 3;

/** Category sizes before the Baron's adjustment. */
export interface CategoryCounts {
  townsfolk: number;
  outsiders: number;
  minions: number;
}

export interface GameSetup {
  script?: Script;
  /** Exact characters to deal; mutually exclusive with `counts`. */
  characters?: Character[];
  counts?: CategoryCounts;
  /** Seat names; defaults to a shuffled pick from the built-in list. */
  names?: string[];
  seed?: number;
  options?: GameOptionsOverrides;
  gameId?: string;
  providers?: Record<string, DecisionProvider>;
  log?: EventLog;
}

/** Pair abilities whose real player and decoy are fixed when the game is dealt. */
const PAIR_TOKENS: Array<{ character: Character; category: Category; real: ReminderToken; decoy: ReminderToken }> = [
  { character: "WASHERWOMAN", category: "TOWNSFOLK", real: "WASHERWOMAN_TOWNSFOLK", decoy: "WASHERWOMAN_OTHER" },
  { character: "LIBRARIAN", category: "OUTSIDER", real: "LIBRARIAN_OUTSIDER", decoy: "LIBRARIAN_OTHER" },
  { character: "INVESTIGATOR", category: "MINION", real: "INVESTIGATOR_MINION", decoy: "INVESTIGATOR_OTHER" }
];

function assertValidCharacters(script: Script, characters: Character[]): void {
  const known = new Set(scriptCharacters(script));
  for (const character of characters) {
    if (!known.has(character)) {
      throw new GameRuleError("NOT_IN_SCRIPT", `${character} is not part of ${script.name}`);
    }
  }
  if (new Set(characters).size !== characters.length) {
    throw new GameRuleError("DUPLICATE_CHARACTER", "Each character may only be dealt once");
  }
  const demons = characters.filter(c => categoryOf(c) === "DEMON").length;
  if (demons !== 1) {
    throw new GameRuleError("DEMON_COUNT", `Exactly one Demon is required, got ${demons}`);
  }
  if (characters.length < MIN_PLAYERS) {
    throw new GameRuleError("TOO_FEW_PLAYERS", `At least ${MIN_PLAYERS} players are required`);
  }
}

function pick(script: Script, category: Category, count: number, random: RandomFn): Character[] {
  const pool = charactersInCategory(script, category);
  if (count > pool.length) {
    throw new GameRuleError("BAD_COUNTS", `${script.name} only has ${pool.length} ${category.toLowerCase()} characters`);
  }
  return sample(pool, count, random);
}

/** Deals characters from category counts; a Baron swaps two Townsfolk for two Outsiders. */
export function dealFromCounts(script: Script, counts: CategoryCounts, random: RandomFn): Character[] {
  const { minions } = counts;
  let { townsfolk, outsiders } = counts;
  for (const value of [townsfolk, outsiders, minions]) {
    if (!Number.isInteger(value) || value < 0) {
      throw new GameRuleError("BAD_COUNTS", "Category counts must be non-negative integers");
    }
  }

  const dealtMinions = pick(script, "MINION", minions, random);
  if (dealtMinions.includes("BARON")) {
    if (townsfolk < 2) {
      throw new GameRuleError("BAD_COUNTS", "The Baron needs two Townsfolk to turn into Outsiders");
    }
    townsfolk -= 2;
    outsiders += 2;
  }

  return [
    ...pick(script, "TOWNSFOLK", townsfolk, random),
    ...pick(script, "OUTSIDER", outsiders, random),
    ...dealtMinions,
    ...pick(script, "DEMON", 1, random)
  ];
}

function createPlayer(name: string, character: Character, messagesLeft: number): Player {
  return {
    name,
    character,
    alignment: alignmentOf(categoryOf(character)),
    alive: true,
    drunkCharacter: null,
    nominatedToday: false,
    usedNomination: false,
    usedGhostVote: false,
    usedCounterAbility: false,
    messagesLeft
  };
}

function placeSetupTokens(state: GameState, script: Script, random: RandomFn): void {
  const { players } = state;

  const drunk = players.find(p => p.character === "DRUNK");
  if (drunk) {
    const inPlay = new Set(players.map(p => p.character));
    const cover = script.townsfolk.filter(c => !inPlay.has(c));
    drunk.drunkCharacter = randomItem(cover, random);
    placeReminder(state, "IS_THE_DRUNK", drunk.name, drunk.name);
  }

  const good = players.filter(p => p.alignment === "GOOD");
  if (players.some(p => p.character === "FORTUNE_TELLER" || p.drunkCharacter === "FORTUNE_TELLER") && good.length > 0) {
    const herring = randomItem(good, random);
    placeReminder(state, "RED_HERRING", herring.name, herring.name);
  }

  for (const { character, category, real, decoy } of PAIR_TOKENS) {
    const actor = players.find(p => p.character === character || p.drunkCharacter === character);
    if (!actor) continue;
    const holders = players.filter(p => p !== actor && categoryOf(p.character) === category);
    if (holders.length === 0) continue;
    const realPlayer = randomItem(holders, random);
    const decoyPlayer = randomItem(players.filter(p => p !== actor && p !== realPlayer), random);
    placeReminder(state, real, actor.name, realPlayer.name);
    placeReminder(state, decoy, actor.name, decoyPlayer.name);
  }
}

/**
 * Deals a new game: validates the character list, seats everyone in random order,
 * assigns the Drunk's cover and places every token fixed at setup. Broken setups
 * throw GameRuleError; nothing is patched silently.
 */
export function createGame(setup: GameSetup = {}): GameContext {
  const script = setup.script ?? TROUBLE_BREWING;
  const options = mergeOptions(setup.options);
  const seed = setup.seed ?? Math.floor(Math.random() * 0x100000000);
  const random = createRandom(seed);

  if (setup.characters && setup.counts) {
    throw new GameRuleError("BAD_SETUP", "Pass either characters or counts, not both");
  }
  let characters: Character[];
  if (setup.characters) {
    const unknown = setup.characters.find(c => !isCharacter(c));
    if (unknown !== undefined) throw new GameRuleError("UNKNOWN_CHARACTER", `Unknown character ${unknown}`);
    characters = [...setup.characters];
  } else if (setup.counts) {
    characters = dealFromCounts(script, setup.counts, random);
  } else {
    throw new GameRuleError("BAD_SETUP", "Pass a character list or category counts");
  }
  assertValidCharacters(script, characters);

  const pool = setup.names ? [...setup.names] : shuffle(DEFAULT_PLAYER_NAMES, random);
  if (new Set(pool).size !== pool.length) {
    throw new GameRuleError("DUPLICATE_NAME", "Player names must be unique");
  }
  if (pool.length < characters.length) {
    throw new GameRuleError("TOO_FEW_NAMES", `${characters.length} players need ${characters.length} names`);
  }
  const names = pool.slice(0, characters.length);
  const dealt = shuffle(characters, random);
  const players = shuffle(
    names.map((name, i) => createPlayer(name, dealt[i], options.messagesPerDay)),
    random
  );

  const state: GameState = {
    gameId: setup.gameId ?? randomUUID(),
    round: 1,
    phase: "SETUP",
    players,
    reminders: {},
    poison: {},
    choppingBlock: null,
    nominationsOpen: false,
    winner: null,
    endReason: null,
    inbox: Object.fromEntries(players.map(p => [p.name, []]))
  };
  placeSetupTokens(state, script, random);

  const log = setup.log ?? new EventLog();
  log.record(state, {
    kind: "GAME_SETUP",
    description: `${players.length} players seated for ${script.name}`,
    participants: players.map(p => p.name),
    metadata: { seed, script: script.name, options },
    visibility: "PRIVATE"
  });
  for (const player of players) {
    log.record(state, {
      kind: "PLAYER_SETUP",
      description: `${player.name} is the ${player.character}`,
      participants: [player.name],
      metadata: { character: player.character, alignment: player.alignment, drunkCharacter: player.drunkCharacter },
      visibility: "PRIVATE"
    });
  }

  return { state, script, options, random, providers: { ...setup.providers }, log };
}
