import { isDemon } from "./characters";
import { resolveRecipients, sendMessage } from "./chat";
import { announce, record } from "./context";
import type { GameContext } from "./context";
import { killPlayer } from "./deaths";
import { collectDecision } from "./decisions";
import type { DayActionType, DecisionOf } from "./decisions";
import { nominationProblem, runNomination } from "./nomination";
import { placeReminder } from "./reminders";
import { isImpaired } from "./status";
import { GameRuleError } from "./types";
import type { Player } from "./types";
import { getPlayer } from "./utils";
import { checkWin } from "./win";
import { buildPlayerView } from "../shared/messages";

/** How a single day turn ended, from the controller's point of view. */
export type TurnOutcome = "PASSED" | "ACTED" | "DAY_OVER";

const DAY_DECISIONS = ["SEND_MESSAGE", "NOMINATE", "USE_COUNTER_ABILITY", "PASS"] as const;
type DayDecision = DecisionOf<(typeof DAY_DECISIONS)[number]>;

/** Actions the player may take right now, excluding PASS. Empty means the turn is skipped. */
export function availableDayActions(ctx: GameContext, player: Player): DayActionType[] {
  const actions: DayActionType[] = [];
  if (ctx.state.nominationsOpen && player.alive && !player.usedNomination) actions.push("NOMINATE");
  if (player.alive && !player.usedCounterAbility) actions.push("USE_COUNTER_ABILITY");
  if (player.messagesLeft > 0) actions.push("SEND_MESSAGE");
  return actions;
}

/** Throws a GameRuleError describing why the decision cannot be applied. */
export function validateDayAction(
  ctx: GameContext,
  player: Player,
  decision: DayDecision,
  allowed: DayActionType[]
): void {
  if (!allowed.includes(decision.type)) {
    throw new GameRuleError("ACTION_NOT_ALLOWED", `${decision.type} is not available; choose one of ${allowed.join(", ")}`);
  }
  switch (decision.type) {
    case "SEND_MESSAGE":
      resolveRecipients(ctx, player, decision.recipients, decision.text);
      return;
    case "NOMINATE": {
      const problem = nominationProblem(ctx, player, decision.nominee);
      if (problem) throw new GameRuleError("INVALID_NOMINATION", problem);
      return;
    }
    case "USE_COUNTER_ABILITY":
      if (!getPlayer(ctx.state.players, decision.target)) {
        throw new GameRuleError("PLAYER_NOT_FOUND", `Player ${decision.target} not found`);
      }
      return;
    case "PASS":
      return;
  }
}

/**
 * The public Slayer shot. Anyone may claim it once; it only kills when a sober,
 * healthy Slayer aims at the true Demon. Returns whether the target died.
 */
export function useCounterAbility(ctx: GameContext, player: Player, target: Player, publicReasoning: string): boolean {
  player.usedCounterAbility = true;
  if (player.character === "SLAYER") placeReminder(ctx.state, "SLAYER_POWER_USED", player.name, target.name);

  const works = player.character === "SLAYER" && !isImpaired(ctx.state, player) && target.alive && isDemon(target);
  const text = works
    ? `${player.name} has used their slayer power on ${target.name} and killed them.`
    : `${player.name} has used their slayer power on ${target.name} and nothing happened.`;

  announce(ctx, `Storyteller: ${text}`, { participants: [player.name, target.name] });
  record(ctx, {
    kind: "SLAYER_POWER",
    description: text,
    participants: [player.name, target.name],
    metadata: { success: works, publicReasoning }
  });
  if (works) {
    killPlayer(ctx, target, "SLAYER");
    checkWin(ctx);
  }
  return works;
}

function recordPass(ctx: GameContext, player: Player, reason: string): void {
  record(ctx, {
    kind: "PLAYER_PASS",
    description: `${player.name} passed: ${reason}`,
    participants: [player.name],
    visibility: "PRIVATE"
  });
}

async function applyDayAction(ctx: GameContext, player: Player, decision: DayDecision): Promise<TurnOutcome> {
  switch (decision.type) {
    case "SEND_MESSAGE":
      sendMessage(ctx, player, resolveRecipients(ctx, player, decision.recipients, decision.text), decision.text);
      return "ACTED";
    case "NOMINATE": {
      const endsDay = await runNomination(ctx, player, decision.nominee, decision.publicReasoning);
      return endsDay || ctx.state.winner ? "DAY_OVER" : "ACTED";
    }
    case "USE_COUNTER_ABILITY": {
      const target = getPlayer(ctx.state.players, decision.target);
      if (!target) return "PASSED";
      useCounterAbility(ctx, player, target, decision.publicReasoning);
      return ctx.state.winner ? "DAY_OVER" : "ACTED";
    }
    case "PASS":
      recordPass(ctx, player, decision.privateReasoning || "passed on their turn");
      return "PASSED";
  }
}

/**
 * Asks one player for exactly one day action and applies it. Invalid choices are
 * retried and then count as a pass; a failing provider raises DecisionError.
 */
export async function takeDayTurn(ctx: GameContext, player: Player): Promise<TurnOutcome> {
  const actions = availableDayActions(ctx, player);
  if (actions.length === 0) {
    recordPass(ctx, player, "no actions available");
    return "PASSED";
  }
  const allowed: DayActionType[] = [...actions, "PASS"];

  const decision = await collectDecision(
    ctx,
    player,
    DAY_DECISIONS,
    feedback => ({ kind: "DAY_ACTION", view: buildPlayerView(ctx.state, player.name), allowed, feedback }),
    d => validateDayAction(ctx, player, d, allowed)
  );
  if (!decision) {
    recordPass(ctx, player, "no valid action after retries");
    return "PASSED";
  }
  return applyDayAction(ctx, player, decision);
}
