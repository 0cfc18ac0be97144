import { categoryOf } from "./characters";
import type { Category, Character } from "./types";

/** Static declaration of a variant: who exists and in which order they wake. */
export interface Script {
  name: string;
  townsfolk: Character[];
  outsiders: Character[];
  minions: Character[];
  demons: Character[];
  firstNightOrder: Character[];
  otherNightOrder: Character[];
}

export const TROUBLE_BREWING: Script = {
  name: "Trouble Brewing",
  townsfolk: [
    "WASHERWOMAN",
    "LIBRARIAN",
    "INVESTIGATOR",
    "CHEF",
    "EMPATH",
    "FORTUNE_TELLER",
    "UNDERTAKER",
    "MONK",
    "RAVENKEEPER",
    "VIRGIN",
    "SLAYER",
    "SOLDIER",
    "MAYOR"
  ],
  outsiders: ["BUTLER", "SAINT", "RECLUSE", "DRUNK"],
  minions: ["POISONER", "SPY", "BARON", "SCARLET_WOMAN"],
  demons: ["IMP"],
  firstNightOrder: [
    "POISONER",
    "SPY",
    "WASHERWOMAN",
    "LIBRARIAN",
    "INVESTIGATOR",
    "CHEF",
    "EMPATH",
    "FORTUNE_TELLER",
    "BUTLER"
  ],
  otherNightOrder: [
    "POISONER",
    "MONK",
    "SPY",
    "IMP",
    "RAVENKEEPER",
    "UNDERTAKER",
    "EMPATH",
    "FORTUNE_TELLER",
    "BUTLER"
  ]
};

/** Every character of the script, in category order. */
export function scriptCharacters(script: Script): Character[] {
  return [...script.townsfolk, ...script.outsiders, ...script.minions, ...script.demons];
}

export function charactersInCategory(script: Script, category: Category): Character[] {
  return scriptCharacters(script).filter(c => categoryOf(c) === category);
}

/** Night order for the given round; round 1 is the first night. */
export function nightOrder(script: Script, round: number): Character[] {
  return round === 1 ? script.firstNightOrder : script.otherNightOrder;
}
