import { alignmentOf, categoryOf } from "../src/engine/characters";
import type { GameContext } from "../src/engine/context";
import { EventLog } from "../src/engine/events";
import { ScriptedProvider } from "../src/engine/providers";
import { TROUBLE_BREWING } from "../src/engine/script";
import { DEFAULT_GAME_OPTIONS } from "../src/engine/setup";
import type { Character, GameOptions, GameState, Phase, Player } from "../src/engine/types";
import type { RandomFn } from "../src/engine/utils";

export const FIXED_TIME = "2024-01-01T00:00:00.000Z";

export function makePlayer(name: string, character: Character, overrides: Partial<Player> = {}): Player {
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
    messagesLeft: 2,
    ...overrides
  };
}

export interface TestGame {
  ctx: GameContext;
  state: GameState;
  providers: Record<string, ScriptedProvider>;
  /** Looks a seat up by name, failing the test when it is missing. */
  seat(name: string): Player;
}

export interface TestGameOptions {
  round?: number;
  phase?: Phase;
  options?: Partial<GameOptions>;
  /** Defaults to always 0: shuffles rotate left by one, random picks take the first item. */
  random?: RandomFn;
}

/** A game seated exactly as given, every seat played by a ScriptedProvider. */
export function makeGame(players: Player[], overrides: TestGameOptions = {}): TestGame {
  const state: GameState = {
    gameId: "game",
    round: overrides.round ?? 1,
    phase: overrides.phase ?? "NIGHT",
    players,
    reminders: {},
    poison: {},
    choppingBlock: null,
    nominationsOpen: false,
    winner: null,
    endReason: null,
    inbox: {}
  };
  const providers: Record<string, ScriptedProvider> = {};
  for (const player of players) providers[player.name] = new ScriptedProvider();

  const ctx: GameContext = {
    state,
    script: TROUBLE_BREWING,
    options: { ...DEFAULT_GAME_OPTIONS, ...overrides.options },
    random: overrides.random ?? (() => 0),
    providers: { ...providers },
    log: new EventLog(() => FIXED_TIME)
  };

  return {
    ctx,
    state,
    providers,
    seat(name: string): Player {
      const player = players.find(p => p.name === name);
      if (!player) throw new Error(`No seat ${name}`);
      return player;
    }
  };
}

export function targets(...names: string[]) {
  return { type: "CHOOSE_NIGHT_TARGETS" as const, targets: names, privateReasoning: "" };
}

export function vote(value: "YES" | "NO", publicReasoning = "") {
  return { type: "CAST_VOTE" as const, vote: value, privateReasoning: "", publicReasoning };
}

export function nominate(nominee: string, publicReasoning = "suspicious") {
  return { type: "NOMINATE" as const, nominee, privateReasoning: "", publicReasoning };
}

export function pass() {
  return { type: "PASS" as const, privateReasoning: "" };
}
