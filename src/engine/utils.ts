/** Utility helpers shared across engine modules. */
import { GameRuleError } from "./types";
import type { Player } from "./types";

export type RandomFn = () => number;

/**
 * Seeded mulberry32 generator. Every random draw of a game comes from the one
 * instance created at setup so a seed plus recorded decisions replays the game.
 */
export function createRandom(seed: number): RandomFn {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/** Wall-clock helper for event timestamps. */
export const nowIso = () => new Date().toISOString();

/** Fisher-Yates shuffle (pure). */
export function shuffle<T>(items: readonly T[], random: RandomFn): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/** Picks a random element, throwing on empty lists. */
export function randomItem<T>(items: readonly T[], random: RandomFn): T {
  if (items.length === 0) {
    throw new GameRuleError("EMPTY_SELECTION", "Cannot select from empty list");
  }
  return items[Math.floor(random() * items.length)];
}

/** Draws `count` distinct elements (fewer when the list is shorter). */
export function sample<T>(items: readonly T[], count: number, random: RandomFn): T[] {
  return shuffle(items, random).slice(0, count);
}

/** Counts alive players. */
export function countAlive(players: Player[]): number {
  return players.filter(p => p.alive).length;
}

/** Returns only the living players. */
export function livingPlayers(players: Player[]): Player[] {
  return players.filter(p => p.alive);
}

/** Votes needed to put someone on an empty block: half the living, rounded up. */
export function majorityThreshold(aliveCount: number): number {
  return Math.ceil(aliveCount / 2);
}

/** Safe player lookup, null when missing. */
export function getPlayer(players: Player[], name: string): Player | null {
  return players.find(p => p.name === name) ?? null;
}

/** Players in seating order starting at `start` and wrapping around. */
export function seatsFrom(players: Player[], start: Player): Player[] {
  const index = players.indexOf(start);
  if (index < 0) return [...players];
  return [...players.slice(index), ...players.slice(0, index)];
}
