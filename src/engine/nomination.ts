import { believedCharacter, registrationOf } from "./characters";
import { announce, record, tell } from "./context";
import type { GameContext } from "./context";
import { killPlayer } from "./deaths";
import { collectDecision } from "./decisions";
import type { VoteRecord } from "./decisions";
import { getReminder, placeReminder } from "./reminders";
import { isImpaired } from "./status";
import type { Player } from "./types";
import { countAlive, getPlayer, majorityThreshold, seatsFrom } from "./utils";
import { checkWin } from "./win";
import { buildPlayerView } from "../shared/messages";

export interface VoteThresholds {
  /** Yes votes needed to put the nominee on the block. */
  requiredToExecute: number;
  /** Exactly this many clears an occupied block; null while it is empty. */
  requiredToTie: number | null;
}

export function votingThresholds(ctx: GameContext): VoteThresholds {
  const block = ctx.state.choppingBlock;
  if (block) return { requiredToExecute: block.votes + 1, requiredToTie: block.votes };
  return { requiredToExecute: majorityThreshold(countAlive(ctx.state.players)), requiredToTie: null };
}

/** Players who could still cast a YES: the living plus the dead holding their ghost vote. */
export function eligibleVoters(players: Player[]): Player[] {
  return players.filter(p => p.alive || !p.usedGhostVote);
}

/**
 * Why a nomination cannot go ahead, or null when it can. Shared by day-action
 * validation (which retries) and `runNomination` (which logs and ignores).
 */
export function nominationProblem(ctx: GameContext, nominator: Player, nomineeName: string): string | null {
  if (!ctx.state.nominationsOpen) return "Nominations are not open yet";
  if (!nominator.alive) return "Dead players cannot nominate";
  if (nominator.usedNomination) return `${nominator.name} has already nominated today`;
  const nominee = getPlayer(ctx.state.players, nomineeName);
  if (!nominee) return `Player ${nomineeName} not found`;
  if (nominee.nominatedToday) return `${nominee.name} has already been nominated today`;
  return null;
}

export function formatVotes(votes: VoteRecord[]): string {
  if (votes.length === 0) return "no votes";
  return votes.map(v => `${v.voter}: ${v.vote === "CANT_VOTE" ? "can't vote" : v.vote.toLowerCase()}`).join(", ");
}

/** Executes a player during the day, ahead of any win check. */
export function executePlayer(ctx: GameContext, player: Player, reason: string): void {
  announce(ctx, `Storyteller: ${player.name} has been executed.`, { participants: [player.name] });
  record(ctx, {
    kind: "EXECUTION",
    description: `${player.name} was executed (${reason})`,
    participants: [player.name],
    metadata: { character: player.character, reason }
  });
  killPlayer(ctx, player, "EXECUTION");
}

/**
 * First nomination of the Virgin: spends the ability whatever happens. A working
 * Virgin nominated by a Townsfolk-registering player executes the nominator.
 */
function resolveVirgin(ctx: GameContext, nominator: Player, virgin: Player): boolean {
  placeReminder(ctx.state, "VIRGIN_POWER_USED", virgin.name, virgin.name);
  const fires = !isImpaired(ctx.state, virgin) && registrationOf(nominator).category === "TOWNSFOLK";
  record(ctx, {
    kind: "VIRGIN_POWER",
    description: fires
      ? `${nominator.name} nominated the Virgin ${virgin.name} and is executed`
      : `${nominator.name} nominated the Virgin ${virgin.name}; nothing happens`,
    participants: [nominator.name, virgin.name],
    metadata: { fired: fires },
    visibility: fires ? "PUBLIC" : "PRIVATE"
  });
  if (!fires) return false;

  announce(ctx, `Storyteller: ${nominator.name} has nominated ${virgin.name}.`, {
    participants: [nominator.name, virgin.name]
  });
  executePlayer(ctx, nominator, "virgin");
  checkWin(ctx);
  return true;
}

async function collectVote(
  ctx: GameContext,
  voter: Player,
  nominator: Player,
  nominee: Player,
  previousVotes: VoteRecord[],
  thresholds: VoteThresholds
): Promise<VoteRecord> {
  if (!voter.alive && voter.usedGhostVote) {
    return { voter: voter.name, vote: "CANT_VOTE", publicReasoning: "" };
  }

  const butler = getReminder(ctx.state, "BUTLER_MASTER");
  if (butler && butler.holder === voter.name) {
    const masterVotedYes = previousVotes.some(v => v.voter === butler.target && v.vote === "YES");
    if (!masterVotedYes) {
      tell(ctx, voter, `Your master ${butler.target} has not voted yes, so you vote no.`);
      return { voter: voter.name, vote: "NO", publicReasoning: "" };
    }
  }

  const decision = await collectDecision(ctx, voter, ["CAST_VOTE"], feedback => ({
    kind: "VOTE",
    view: buildPlayerView(ctx.state, voter.name),
    nominator: nominator.name,
    nominee: nominee.name,
    previousVotes: previousVotes.map(v => ({ ...v })),
    requiredToExecute: thresholds.requiredToExecute,
    requiredToTie: thresholds.requiredToTie,
    feedback
  }));
  if (!decision) return { voter: voter.name, vote: "NO", publicReasoning: "" };

  if (decision.vote === "YES" && !voter.alive) voter.usedGhostVote = true;
  return { voter: voter.name, vote: decision.vote, publicReasoning: decision.publicReasoning };
}

/**
 * Runs one nomination from the accusation to the tally. Returns true when the day
 * ends on the spot (the Virgin executed the nominator). A provider failure while
 * collecting votes propagates as DecisionError and leaves the block untouched.
 */
export async function runNomination(
  ctx: GameContext,
  nominator: Player,
  nomineeName: string,
  reasoning: string
): Promise<boolean> {
  const { state } = ctx;
  const problem = nominationProblem(ctx, nominator, nomineeName);
  const nominee = getPlayer(state.players, nomineeName);
  if (problem || !nominee) {
    record(ctx, {
      kind: "DECISION_ERROR",
      description: `Nomination by ${nominator.name} ignored: ${problem ?? "unknown nominee"}`,
      participants: [nominator.name],
      visibility: "PRIVATE"
    });
    return false;
  }

  nominator.usedNomination = true;
  nominee.nominatedToday = true;

  if (believedCharacter(nominee) === "VIRGIN" && !getReminder(state, "VIRGIN_POWER_USED")) {
    if (resolveVirgin(ctx, nominator, nominee)) return true;
  }

  const block = state.choppingBlock;
  const blockText = block
    ? `${block.nominee} is on the chopping block with ${block.votes} votes.`
    : "The chopping block is empty.";
  announce(ctx, `Storyteller: ${nominator.name} has nominated ${nominee.name} for execution. Their reason is: ${reasoning} ${blockText}`, {
    participants: [nominator.name, nominee.name]
  });
  record(ctx, {
    kind: "NOMINATION",
    description: `${nominator.name} nominated ${nominee.name}`,
    participants: [nominator.name, nominee.name],
    metadata: { reasoning, choppingBlock: block ? { ...block } : null }
  });

  const thresholds = votingThresholds(ctx);
  const votes: VoteRecord[] = [];
  for (const voter of seatsFrom(state.players, nominee)) {
    const vote = await collectVote(ctx, voter, nominator, nominee, votes, thresholds);
    votes.push(vote);
    record(ctx, {
      kind: "VOTING",
      description: `${vote.voter} voted ${vote.vote} on ${nominee.name}`,
      participants: [vote.voter, nominee.name],
      metadata: { vote: vote.vote, publicReasoning: vote.publicReasoning }
    });
  }

  const yes = votes.filter(v => v.vote === "YES").length;
  let outcome: "ON_BLOCK" | "TIE" | "FAILED";
  let text: string;
  if (yes >= thresholds.requiredToExecute) {
    state.choppingBlock = { votes: yes, nominee: nominee.name };
    outcome = "ON_BLOCK";
    text = `${nominee.name} has been nominated for execution with ${yes} votes. They will die at the end of the day if no one else is nominated.`;
  } else if (thresholds.requiredToTie !== null && yes === thresholds.requiredToTie) {
    state.choppingBlock = null;
    outcome = "TIE";
    text = `${nominee.name} has received ${yes} votes. This ties the previous nominee. The chopping block is now empty.`;
  } else {
    outcome = "FAILED";
    text = `${nominee.name} has received ${yes} votes, which is not enough. The chopping block is unchanged.`;
  }

  announce(ctx, `Storyteller: ${text} Vote record: ${formatVotes(votes)}`, {
    participants: [nominator.name, nominee.name]
  });
  record(ctx, {
    kind: "NOMINATION_RESULT",
    description: text,
    participants: [nominee.name],
    metadata: {
      outcome,
      yes,
      ...thresholds,
      votes: votes.map(v => ({ ...v })),
      choppingBlock: state.choppingBlock ? { ...state.choppingBlock } : null
    }
  });
  return false;
}
