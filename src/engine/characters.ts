import type { Alignment, Category, Character, Player } from "./types";

const CATEGORIES: Record<Character, Category> = {
  WASHERWOMAN: "TOWNSFOLK",
  LIBRARIAN: "TOWNSFOLK",
  INVESTIGATOR: "TOWNSFOLK",
  CHEF: "TOWNSFOLK",
  EMPATH: "TOWNSFOLK",
  FORTUNE_TELLER: "TOWNSFOLK",
  UNDERTAKER: "TOWNSFOLK",
  MONK: "TOWNSFOLK",
  RAVENKEEPER: "TOWNSFOLK",
  VIRGIN: "TOWNSFOLK",
  SLAYER: "TOWNSFOLK",
  SOLDIER: "TOWNSFOLK",
  MAYOR: "TOWNSFOLK",
  BUTLER: "OUTSIDER",
  DRUNK: "OUTSIDER",
  RECLUSE: "OUTSIDER",
  SAINT: "OUTSIDER",
  POISONER: "MINION",
  SPY: "MINION",
  SCARLET_WOMAN: "MINION",
  BARON: "MINION",
  IMP: "DEMON"
};

const DISPLAY_NAMES: Partial<Record<Character, string>> = {
  FORTUNE_TELLER: "Fortune Teller",
  SCARLET_WOMAN: "Scarlet Woman"
};

/** Narrows untrusted input (HTTP bodies, wire payloads) to a known character. */
export function isCharacter(value: unknown): value is Character {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(CATEGORIES, value);
}

export function categoryOf(character: Character): Category {
  return CATEGORIES[character];
}

export function alignmentOf(category: Category): Alignment {
  return category === "MINION" || category === "DEMON" ? "EVIL" : "GOOD";
}

/** Human readable name used in private notes and public announcements. */
export function displayName(character: Character): string {
  const special = DISPLAY_NAMES[character];
  if (special) return special;
  return character.charAt(0) + character.slice(1).toLowerCase();
}

/** How a player appears to other players' abilities. */
export interface Registration {
  alignment: Alignment;
  category: Category;
}

/**
 * Recluse always registers as an evil Demon and the Spy as a good Townsfolk.
 * Win conditions and the Slayer look at the true character instead.
 */
export function registrationOf(player: Player): Registration {
  switch (player.character) {
    case "RECLUSE":
      return { alignment: "EVIL", category: "DEMON" };
    case "SPY":
      return { alignment: "GOOD", category: "TOWNSFOLK" };
    default:
      return { alignment: player.alignment, category: categoryOf(player.character) };
  }
}

export function isDemon(player: Player): boolean {
  return categoryOf(player.character) === "DEMON";
}

/** Character the player has been told they are. */
export function believedCharacter(player: Player): Character {
  return player.drunkCharacter ?? player.character;
}
