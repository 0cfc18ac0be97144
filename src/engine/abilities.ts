import { categoryOf, displayName, isDemon, registrationOf } from "./characters";
import { record, tell } from "./context";
import type { GameContext } from "./context";
import { passDemonhood, killPlayer } from "./deaths";
import { collectDecision } from "./decisions";
import { buildGrimoire, describeGrimoire } from "./grimoire";
import { consumeReminder, getReminder, placeReminder } from "./reminders";
import { charactersInCategory, scriptCharacters } from "./script";
import { clearPoisoner, isImpaired, poison } from "./status";
import { getPlayer, livingPlayers, randomItem, sample, seatsFrom } from "./utils";
import { DecisionError, GameRuleError } from "./types";
import type { Category, Character, Player, ReminderToken } from "./types";
import { buildPlayerView } from "../shared/messages";

/**
 * One handler per character. A handler receives the acting player (the Drunk when
 * their believed character is called) and resolves the whole night action:
 * asking for targets, computing the true or fabricated result, and delivering it.
 */
export type AbilityHandler = (ctx: GameContext, actor: Player) => Promise<void>;

/** Impaired count abilities shift the truth by one, wrapping below this bound. */
const FABRICATED_COUNT_BOUND = 3;

export function fabricateCount(trueCount: number): number {
  return (trueCount + 1) % FABRICATED_COUNT_BOUND;
}

/** Private result for the actor, mirrored into the event log for the storyteller view. */
function deliver(
  ctx: GameContext,
  actor: Player,
  character: Character,
  text: string,
  metadata: Record<string, unknown> = {}
): void {
  tell(ctx, actor, text);
  record(ctx, {
    kind: "CHARACTER_POWER",
    description: `${actor.name} (${displayName(character)}): ${text}`,
    participants: [actor.name],
    metadata: { character, impaired: isImpaired(ctx.state, actor), ...metadata },
    visibility: "PRIVATE"
  });
}

/** Resolves chosen names against the roster; throws GameRuleError so the choice is retried. */
export function resolveTargets(ctx: GameContext, names: string[], count: number): Player[] {
  if (names.length !== count) {
    throw new GameRuleError("WRONG_TARGET_COUNT", `Choose exactly ${count} player(s)`);
  }
  if (new Set(names).size !== names.length) {
    throw new GameRuleError("DUPLICATE_TARGET", "Choose different players");
  }
  return names.map(name => {
    const player = getPlayer(ctx.state.players, name);
    if (!player) {
      throw new GameRuleError("PLAYER_NOT_FOUND", `Player ${name} not found`);
    }
    return player;
  });
}

/**
 * Asks the actor for night targets. Returns null when no valid choice could be
 * collected; a failing provider only costs the actor their ability tonight.
 */
async function chooseTargets(
  ctx: GameContext,
  actor: Player,
  prompt: string,
  count: number,
  check: (targets: Player[]) => void = () => {}
): Promise<Player[] | null> {
  try {
    const decision = await collectDecision(
      ctx,
      actor,
      ["CHOOSE_NIGHT_TARGETS"],
      feedback => ({ kind: "NIGHT_TARGETS", view: buildPlayerView(ctx.state, actor.name), prompt, count, feedback }),
      d => check(resolveTargets(ctx, d.targets, count))
    );
    return decision ? resolveTargets(ctx, decision.targets, count) : null;
  } catch (err) {
    if (!(err instanceof DecisionError)) throw err;
    record(ctx, {
      kind: "DECISION_ERROR",
      description: `${actor.name} lost their night action: ${err.message}`,
      participants: [actor.name],
      visibility: "PRIVATE"
    });
    return null;
  }
}

function notSelf(actor: Player, message: string): (targets: Player[]) => void {
  return targets => {
    if (targets.some(t => t === actor)) throw new GameRuleError("INVALID_TARGET", message);
  };
}

function othersThan(ctx: GameContext, actor: Player): Player[] {
  return ctx.state.players.filter(p => p !== actor);
}

function bySeat(ctx: GameContext, players: Player[]): Player[] {
  return [...players].sort((a, b) => ctx.state.players.indexOf(a) - ctx.state.players.indexOf(b));
}

interface PairAbility {
  character: Character;
  category: Category;
  realToken: ReminderToken;
  decoyToken: ReminderToken;
}

/**
 * "One of these two is the X". The true pair was fixed at setup; an impaired actor
 * gets two random players and a random character of the category, rolled now.
 */
function revealPair({ character, category, realToken, decoyToken }: PairAbility): AbilityHandler {
  return async (ctx, actor) => {
    const label = category.charAt(0) + category.slice(1).toLowerCase();

    if (isImpaired(ctx.state, actor)) {
      const pair = sample(othersThan(ctx, actor), 2, ctx.random);
      const shown = randomItem(charactersInCategory(ctx.script, category), ctx.random);
      const [a, b] = bySeat(ctx, pair);
      deliver(ctx, actor, character, `One of ${a.name} and ${b.name} is the ${displayName(shown)}.`, {
        fabricated: true
      });
      return;
    }

    const real = getReminder(ctx.state, realToken);
    const decoy = getReminder(ctx.state, decoyToken);
    const realPlayer = real ? getPlayer(ctx.state.players, real.target) : null;
    const decoyPlayer = decoy ? getPlayer(ctx.state.players, decoy.target) : null;
    if (!realPlayer || !decoyPlayer) {
      deliver(ctx, actor, character, `There are zero ${label}s in play.`);
      return;
    }

    const [a, b] = bySeat(ctx, [realPlayer, decoyPlayer]);
    deliver(ctx, actor, character, `One of ${a.name} and ${b.name} is the ${displayName(realPlayer.character)}.`, {
      real: realPlayer.name,
      decoy: decoyPlayer.name
    });
  };
}

/** Adjacent pairs of evil-registering players around the circular seating. */
export function countEvilPairs(players: Player[]): number {
  if (players.length < 2) return 0;
  let pairs = 0;
  for (let i = 0; i < players.length; i++) {
    const left = players[i];
    const right = players[(i + 1) % players.length];
    if (players.length === 2 && i === 1) break;
    if (registrationOf(left).alignment === "EVIL" && registrationOf(right).alignment === "EVIL") pairs++;
  }
  return pairs;
}

/** Nearest living neighbour on each side of `player`, skipping the dead and wrapping around. */
export function livingNeighbours(players: Player[], player: Player): Player[] {
  const seats = seatsFrom(players, player).slice(1);
  const clockwise = seats.find(p => p.alive);
  const counter = [...seats].reverse().find(p => p.alive);
  const neighbours: Player[] = [];
  if (clockwise) neighbours.push(clockwise);
  if (counter && counter !== clockwise) neighbours.push(counter);
  return neighbours;
}

const chef: AbilityHandler = async (ctx, actor) => {
  const truth = countEvilPairs(ctx.state.players);
  const impaired = isImpaired(ctx.state, actor);
  const shown = impaired ? fabricateCount(truth) : truth;
  deliver(ctx, actor, "CHEF", `There are ${shown} pairs of evil players sitting next to each other.`, {
    truth,
    fabricated: impaired
  });
};

const empath: AbilityHandler = async (ctx, actor) => {
  const truth = livingNeighbours(ctx.state.players, actor).filter(p => registrationOf(p).alignment === "EVIL").length;
  const impaired = isImpaired(ctx.state, actor);
  const shown = impaired ? fabricateCount(truth) : truth;
  deliver(ctx, actor, "EMPATH", `${shown} of your living neighbours are evil.`, { truth, fabricated: impaired });
};

const fortuneTeller: AbilityHandler = async (ctx, actor) => {
  const targets = await chooseTargets(ctx, actor, "Choose 2 players and learn if either is the Demon.", 2);
  if (!targets) return;

  const herring = getReminder(ctx.state, "RED_HERRING");
  const truth = targets.some(t => registrationOf(t).category === "DEMON" || herring?.target === t.name);
  const impaired = isImpaired(ctx.state, actor);
  const shown = impaired ? !truth : truth;
  const [a, b] = targets;
  deliver(ctx, actor, "FORTUNE_TELLER", `${shown ? "Yes" : "No"}, ${shown ? "one" : "neither"} of ${a.name} and ${b.name} is the Demon.`, {
    targets: targets.map(t => t.name),
    truth,
    fabricated: impaired
  });
};

/** Wrong-but-plausible character for impaired information abilities. */
function fabricateCharacter(ctx: GameContext, truth: Character): Character {
  const options = scriptCharacters(ctx.script).filter(c => c !== truth);
  return randomItem(options, ctx.random);
}

/** Only wakes when someone was executed since it last woke; otherwise says nothing at all. */
const undertaker: AbilityHandler = async (ctx, actor) => {
  const executed = consumeReminder(ctx.state, "UNDERTAKER_EXECUTED");
  if (!executed) return;
  const player = getPlayer(ctx.state.players, executed.target);
  if (!player) return;

  const impaired = isImpaired(ctx.state, actor);
  const shown = impaired ? fabricateCharacter(ctx, player.character) : player.character;
  deliver(ctx, actor, "UNDERTAKER", `The player executed today, ${player.name}, was the ${displayName(shown)}.`, {
    executed: player.name,
    fabricated: impaired
  });
};

const ravenkeeper: AbilityHandler = async (ctx, actor) => {
  const woken = getReminder(ctx.state, "RAVENKEEPER_WOKEN");
  if (!woken || woken.target !== actor.name) return;
  consumeReminder(ctx.state, "RAVENKEEPER_WOKEN");

  const targets = await chooseTargets(ctx, actor, "You died tonight. Choose a player to learn their character.", 1);
  if (!targets) return;
  const [target] = targets;
  const impaired = isImpaired(ctx.state, actor);
  const shown = impaired ? fabricateCharacter(ctx, target.character) : target.character;
  deliver(ctx, actor, "RAVENKEEPER", `${target.name} is the ${displayName(shown)}.`, {
    target: target.name,
    fabricated: impaired
  });
};

/** Protection is checked when the Demon attacks, so only the choice is stored here. */
const monk: AbilityHandler = async (ctx, actor) => {
  const targets = await chooseTargets(
    ctx,
    actor,
    "Choose a player (not yourself) to protect from the Demon tonight.",
    1,
    notSelf(actor, "The Monk cannot protect themselves")
  );
  if (!targets) return;
  const [target] = targets;
  placeReminder(ctx.state, "MONK_PROTECTED", actor.name, target.name);
  deliver(ctx, actor, "MONK", `You are protecting ${target.name} tonight.`, { target: target.name });
};

/** Poisons one player for tonight and tomorrow; an impaired Poisoner spends the choice for nothing. */
const poisoner: AbilityHandler = async (ctx, actor) => {
  const targets = await chooseTargets(ctx, actor, "Choose a player to poison tonight and tomorrow.", 1);
  clearPoisoner(ctx.state, actor.name);
  if (!targets) return;
  const [target] = targets;
  const impaired = isImpaired(ctx.state, actor);
  if (!impaired) poison(ctx.state, actor.name, target.name);
  deliver(ctx, actor, "POISONER", `You poisoned ${target.name}.`, { target: target.name, effective: !impaired });
};

/** Never fabricated. */
const spy: AbilityHandler = async (ctx, actor) => {
  deliver(ctx, actor, "SPY", describeGrimoire(buildGrimoire(ctx.state)));
};

const butler: AbilityHandler = async (ctx, actor) => {
  const targets = await chooseTargets(
    ctx,
    actor,
    "Choose your master (not yourself). Tomorrow you may only vote yes if your master already voted yes.",
    1,
    notSelf(actor, "The Butler cannot choose themselves")
  );
  if (!targets) return;
  const [master] = targets;
  if (!isImpaired(ctx.state, actor)) {
    placeReminder(ctx.state, "BUTLER_MASTER", actor.name, master.name);
  }
  deliver(ctx, actor, "BUTLER", `Your master is ${master.name}.`, { master: master.name });
};

/** Categories tried, in order, when a Mayor deflects the Demon's kill. */
export const MAYOR_BOUNCE_ORDER: Category[] = ["OUTSIDER", "TOWNSFOLK", "MINION"];

export function mayorBounceTarget(ctx: GameContext, mayor: Player): Player | null {
  const candidates = seatsFrom(ctx.state.players, mayor)
    .slice(1)
    .filter(p => p.alive && !isDemon(p));
  for (const category of MAYOR_BOUNCE_ORDER) {
    const found = candidates.find(p => categoryOf(p.character) === category);
    if (found) return found;
  }
  return null;
}

/** Whether the Demon's attack on `victim` is stopped by a Soldier or a working Monk. */
export function isProtectedFromDemon(ctx: GameContext, victim: Player): boolean {
  const { state } = ctx;
  if (victim.character === "SOLDIER" && !isImpaired(state, victim)) return true;

  const protection = getReminder(state, "MONK_PROTECTED");
  if (!protection || protection.target !== victim.name) return false;
  const monkPlayer = getPlayer(state.players, protection.holder);
  return monkPlayer !== null && monkPlayer.alive && monkPlayer.character === "MONK" && !isImpaired(state, monkPlayer);
}

export interface KillResult {
  victim: Player | null;
  successor: Player | null;
}

/**
 * Resolves the Demon's choice: impaired Demons do nothing; a healthy Mayor deflects
 * to the fallback list; protected victims survive; a Demon killing itself hands the
 * role to a Minion.
 */
export function resolveDemonKill(ctx: GameContext, demon: Player, target: Player): KillResult {
  const { state } = ctx;
  if (isImpaired(state, demon) || !target.alive) return { victim: null, successor: null };

  let victim = target;
  if (victim.character === "MAYOR" && victim !== demon && !isImpaired(state, victim)) {
    victim = mayorBounceTarget(ctx, victim) ?? victim;
  }
  if (isProtectedFromDemon(ctx, victim)) return { victim: null, successor: null };

  killPlayer(ctx, victim, "DEMON");
  const successor = victim === demon ? passDemonhood(ctx, demon) : null;
  return { victim, successor };
}

const imp: AbilityHandler = async (ctx, actor) => {
  const targets = await chooseTargets(ctx, actor, "Choose a player to kill tonight. Choosing yourself passes your role to a Minion.", 1, ([t]) => {
    if (!t.alive) throw new GameRuleError("PLAYER_DEAD", `Player ${t.name} is already dead`);
  });
  if (!targets) return;
  const [target] = targets;
  const result = resolveDemonKill(ctx, actor, target);
  const text = result.victim
    ? `You attacked ${target.name}.`
    : `You attacked ${target.name}, but nothing happened.`;
  deliver(ctx, actor, "IMP", text, {
    target: target.name,
    victim: result.victim?.name ?? null,
    successor: result.successor?.name ?? null
  });
};

export const abilityRegistry: Map<Character, AbilityHandler> = new Map([
  ["WASHERWOMAN", revealPair({ character: "WASHERWOMAN", category: "TOWNSFOLK", realToken: "WASHERWOMAN_TOWNSFOLK", decoyToken: "WASHERWOMAN_OTHER" })],
  ["LIBRARIAN", revealPair({ character: "LIBRARIAN", category: "OUTSIDER", realToken: "LIBRARIAN_OUTSIDER", decoyToken: "LIBRARIAN_OTHER" })],
  ["INVESTIGATOR", revealPair({ character: "INVESTIGATOR", category: "MINION", realToken: "INVESTIGATOR_MINION", decoyToken: "INVESTIGATOR_OTHER" })],
  ["CHEF", chef],
  ["EMPATH", empath],
  ["FORTUNE_TELLER", fortuneTeller],
  ["UNDERTAKER", undertaker],
  ["MONK", monk],
  ["RAVENKEEPER", ravenkeeper],
  ["POISONER", poisoner],
  ["SPY", spy],
  ["BUTLER", butler],
  ["IMP", imp]
]);

export function getAbilityHandler(character: Character): AbilityHandler | undefined {
  return abilityRegistry.get(character);
}

/** Living players who hold (or, for the Drunk, believe they hold) a character. */
export function actorsFor(ctx: GameContext, character: Character): Player[] {
  return livingPlayers(ctx.state.players).filter(
    p => (p.character === character && p.drunkCharacter === null) || p.drunkCharacter === character
  );
}
