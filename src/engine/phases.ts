import { actorsFor, getAbilityHandler } from "./abilities";
import { takeDayTurn } from "./actions";
import { believedCharacter, categoryOf, displayName, isDemon } from "./characters";
import { announce, record, tell } from "./context";
import type { GameContext } from "./context";
import { summarizeEvents } from "./events";
import type { GameStatistics } from "./events";
import { eligibleVoters, executePlayer } from "./nomination";
import { clearReminders, getReminder } from "./reminders";
import { nightOrder, scriptCharacters } from "./script";
import { isImpaired } from "./status";
import { DecisionError } from "./types";
import type { Character, EndReason, Player, Winner } from "./types";
import { countAlive, getPlayer, livingPlayers, sample, shuffle } from "./utils";
import { checkWin, declareWinner } from "./win";

export interface GameOutcome {
  winner: Winner | null;
  reason: EndReason | null;
  rounds: number;
  statistics: GameStatistics;
}

function enterPhase(ctx: GameContext, phase: "NIGHT" | "DAY"): void {
  ctx.state.phase = phase;
  record(ctx, {
    kind: "PHASE_CHANGE",
    description: `${phase === "NIGHT" ? "Night" : "Day"} ${ctx.state.round} begins`,
    metadata: { phase, round: ctx.state.round }
  });
}

/** Good characters the Demon may safely claim: not in play and not the Drunk's cover. */
export function demonBluffs(ctx: GameContext): Character[] {
  const inPlay = new Set<Character>();
  for (const p of ctx.state.players) {
    inPlay.add(p.character);
    inPlay.add(believedCharacter(p));
  }
  const candidates = scriptCharacters(ctx.script).filter(
    c => !inPlay.has(c) && c !== "DRUNK" && (categoryOf(c) === "TOWNSFOLK" || categoryOf(c) === "OUTSIDER")
  );
  return sample(candidates, ctx.options.demonBluffCount, ctx.random);
}

/** First-night introductions between the evil team. */
function introduceEvilTeam(ctx: GameContext): void {
  const demon = ctx.state.players.find(isDemon);
  const minions = ctx.state.players.filter(p => categoryOf(p.character) === "MINION");
  if (!demon) return;

  const bluffs = demonBluffs(ctx);
  const minionNames = minions.map(m => m.name).join(", ") || "none";
  tell(
    ctx,
    demon,
    `Storyteller: Your minions are: ${minionNames}. These good characters are not in play: ${bluffs.map(displayName).join(", ")}.`
  );
  for (const minion of minions) {
    const others = minions.filter(m => m !== minion).map(m => m.name);
    const allies = others.length > 0 ? ` Your fellow minions are: ${others.join(", ")}.` : "";
    tell(ctx, minion, `Storyteller: The Demon is ${demon.name}.${allies}`);
  }
  record(ctx, {
    kind: "STORYTELLER_INFO",
    description: `Evil team introduced; Demon bluffs: ${bluffs.join(", ")}`,
    participants: [demon.name, ...minions.map(m => m.name)],
    metadata: { bluffs },
    visibility: "PRIVATE"
  });
}

/** Who wakes for `character`: the living holder or a Drunk who believes it, plus a freshly killed Ravenkeeper. */
export function nightActors(ctx: GameContext, character: Character): Player[] {
  const actors = actorsFor(ctx, character);
  if (character === "RAVENKEEPER") {
    const woken = getReminder(ctx.state, "RAVENKEEPER_WOKEN");
    const holder = woken ? getPlayer(ctx.state.players, woken.holder) : null;
    if (holder && !holder.alive) actors.push(holder);
  }
  return actors;
}

/**
 * One full night: evil introductions on the first night, then every character in
 * script order. Deaths are announced at dawn on every night after the first.
 */
export async function runNight(ctx: GameContext): Promise<void> {
  const { state } = ctx;
  enterPhase(ctx, "NIGHT");
  if (state.round === 1) introduceEvilTeam(ctx);

  const aliveBefore = livingPlayers(state.players);

  for (const character of nightOrder(ctx.script, state.round)) {
    const handler = getAbilityHandler(character);
    if (!handler) continue;
    for (const actor of nightActors(ctx, character)) {
      await handler(ctx, actor);
      if (checkWin(ctx)) return;
    }
  }

  if (state.round > 1) {
    const died = aliveBefore.filter(p => !p.alive).map(p => p.name);
    const text = died.length > 0
      ? `Storyteller: This morning ${died.join(", ")} ${died.length === 1 ? "was" : "were"} found dead.`
      : "Storyteller: Nobody died last night.";
    announce(ctx, text, { participants: died, metadata: { died } });
  }
  checkWin(ctx);
}

function startDay(ctx: GameContext): void {
  const { state } = ctx;
  enterPhase(ctx, "DAY");
  clearReminders(state, "NIGHT");
  state.nominationsOpen = false;
  state.choppingBlock = null;
  for (const player of state.players) {
    player.nominatedToday = false;
    player.usedNomination = false;
    player.messagesLeft = ctx.options.messagesPerDay;
  }
}

/**
 * Whether the rest of the day can no longer change its outcome. Only applies once
 * nominations are open.
 */
export function isDaySettled(ctx: GameContext): boolean {
  const { state } = ctx;
  if (!state.nominationsOpen) return false;

  const living = livingPlayers(state.players);
  const nominators = living.filter(p => !p.usedNomination);
  const nominees = living.filter(p => !p.nominatedToday);
  const productive = nominators.some(nominator =>
    nominees.some(nominee => nominee !== nominator && !(nominator.alignment === "EVIL" && nominee.alignment === "EVIL"))
  );
  if (!productive) return true;

  const block = state.choppingBlock;
  return block !== null && eligibleVoters(state.players).length < block.votes;
}

/** Execution (with the Saint's loss) or, when nobody is executed, the Mayor's stalemate win. */
export function endDay(ctx: GameContext): void {
  const { state } = ctx;
  if (state.winner) return;

  const block = state.choppingBlock;
  const nominee = block ? getPlayer(state.players, block.nominee) : null;
  state.choppingBlock = null;
  state.nominationsOpen = false;

  if (nominee) {
    const saintLoses = nominee.alive && nominee.character === "SAINT" && !isImpaired(state, nominee);
    executePlayer(ctx, nominee, "vote");
    if (saintLoses) {
      record(ctx, {
        kind: "SAINT_EXECUTED",
        description: `${nominee.name} was the Saint`,
        participants: [nominee.name]
      });
      declareWinner(ctx, "EVIL", "SAINT_EXECUTED");
    }
  } else {
    announce(ctx, "Storyteller: Nobody was executed today.");
    const mayor = livingPlayers(state.players).find(p => p.character === "MAYOR");
    if (countAlive(state.players) === 3 && mayor && !isImpaired(state, mayor)) {
      record(ctx, {
        kind: "MAYOR_WIN",
        description: `Three players remain with no execution; the Mayor ${mayor.name} wins for Good`,
        participants: [mayor.name]
      });
      declareWinner(ctx, "GOOD", "MAYOR_WIN");
    }
  }

  clearReminders(state, "DAY");
  checkWin(ctx);
}

/**
 * One full day: action rounds over every seat in a freshly shuffled order, with
 * nominations opening partway through. A provider that keeps failing ends the day
 * at once; the chopping block is still resolved.
 */
export async function runDay(ctx: GameContext): Promise<void> {
  const { state, options } = ctx;
  startDay(ctx);
  announce(ctx, `Storyteller: Day ${state.round} has begun.`);

  dayLoop: for (let actionRound = 1; actionRound <= options.dayActionRounds; actionRound++) {
    if (actionRound === options.nominationsOpenRound) {
      state.nominationsOpen = true;
      announce(ctx, "Storyteller: Nominations are now open.");
    }

    let everyonePassed = true;
    for (const player of shuffle(state.players, ctx.random)) {
      if (isDaySettled(ctx)) break dayLoop;
      try {
        const outcome = await takeDayTurn(ctx, player);
        if (outcome === "DAY_OVER") {
          if (!state.winner) clearReminders(state, "DAY");
          return;
        }
        if (player.alive && outcome !== "PASSED") everyonePassed = false;
      } catch (err) {
        if (!(err instanceof DecisionError)) throw err;
        record(ctx, {
          kind: "DECISION_ERROR",
          description: `Day ${state.round} ended early: ${err.message}`,
          participants: [err.player],
          metadata: { endedDay: true }
        });
        break dayLoop;
      }
    }
    if (actionRound > 1 && everyonePassed) break;
  }

  endDay(ctx);
}

/** Tells every seat the character they believe they hold. */
export function introducePlayers(ctx: GameContext): void {
  for (const player of ctx.state.players) {
    const team = player.alignment === "GOOD" ? "good" : "evil";
    tell(ctx, player, `Storyteller: You are the ${displayName(believedCharacter(player))}. You are on the ${team} team.`);
  }
}

/** Alternates nights and days until a team wins or the round limit is reached. */
export async function runGame(ctx: GameContext): Promise<GameOutcome> {
  const { state, options } = ctx;
  let rounds = 0;
  if (state.phase === "SETUP") introducePlayers(ctx);

  while (state.winner === null && state.round <= options.maxRounds) {
    rounds = state.round;
    record(ctx, { kind: "ROUND_START", description: `Round ${state.round}`, metadata: { round: state.round } });
    await runNight(ctx);
    if (state.winner) break;
    await runDay(ctx);
    if (state.winner) break;
    state.round += 1;
  }

  if (state.winner === null) {
    state.round = rounds;
    state.phase = "GAME_OVER";
    state.endReason = "MAX_ROUNDS";
    record(ctx, {
      kind: "GAME_END",
      description: `No winner after ${rounds} rounds`,
      metadata: { winner: null, reason: "MAX_ROUNDS", round: rounds }
    });
  }

  return {
    winner: state.winner,
    reason: state.endReason,
    rounds,
    statistics: summarizeEvents(ctx.log.list())
  };
}
