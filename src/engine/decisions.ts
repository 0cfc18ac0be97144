import { DecisionError, GameRuleError } from "./types";
import type { Phase, Player, Vote } from "./types";
import { providerFor, record } from "./context";
import type { GameContext } from "./context";
import type { PlayerView } from "../shared/messages";

/** A private note handed to a player (ability results, storyteller info, messages). */
export interface PrivateNote {
  round: number;
  phase: Phase;
  text: string;
}

/** One ballot already cast in the running nomination, visible to later voters. */
export interface VoteRecord {
  voter: string;
  vote: Vote;
  publicReasoning: string;
}

export type DayActionType = "SEND_MESSAGE" | "NOMINATE" | "USE_COUNTER_ABILITY" | "PASS";

/**
 * What the engine asks a provider. `feedback` carries the reason the previous
 * attempt was rejected, null on the first attempt.
 */
export type DecisionRequest =
  | { kind: "DAY_ACTION"; view: PlayerView; allowed: DayActionType[]; feedback: string | null }
  | {
      kind: "VOTE";
      view: PlayerView;
      nominator: string;
      nominee: string;
      previousVotes: VoteRecord[];
      requiredToExecute: number;
      requiredToTie: number | null;
      feedback: string | null;
    }
  | { kind: "NIGHT_TARGETS"; view: PlayerView; prompt: string; count: number; feedback: string | null };

/** Exactly one of these comes back from every provider call. */
export type Decision =
  | { type: "SEND_MESSAGE"; recipients: string[]; text: string }
  | { type: "NOMINATE"; nominee: string; privateReasoning: string; publicReasoning: string }
  | { type: "USE_COUNTER_ABILITY"; target: string; privateReasoning: string; publicReasoning: string }
  | { type: "CAST_VOTE"; vote: "YES" | "NO"; privateReasoning: string; publicReasoning: string }
  | { type: "CHOOSE_NIGHT_TARGETS"; targets: string[]; privateReasoning: string }
  | { type: "PASS"; privateReasoning: string };

export type DecisionKind = Decision["type"];
export type DecisionOf<K extends DecisionKind> = Extract<Decision, { type: K }>;

/**
 * The seam between the engine and whoever plays a seat: a script, a bot, a remote socket
 * or a language model. `decide` may be slow; the engine awaits it before touching state.
 */
export interface DecisionProvider {
  inform(note: PrivateNote): void;
  decide(request: DecisionRequest): Promise<Decision>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string | null {
  if (value === undefined) return "";
  return typeof value === "string" ? value : null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === "string");
}

/** Validates an untrusted payload (e.g. JSON from a socket). Returns null when malformed. */
export function parseDecision(raw: unknown): Decision | null {
  if (!isRecord(raw)) return null;
  const privateReasoning = optionalText(raw.privateReasoning);
  const publicReasoning = optionalText(raw.publicReasoning);
  if (privateReasoning === null || publicReasoning === null) return null;

  switch (raw.type) {
    case "SEND_MESSAGE":
      if (!isStringArray(raw.recipients) || typeof raw.text !== "string") return null;
      return { type: "SEND_MESSAGE", recipients: raw.recipients, text: raw.text };
    case "NOMINATE":
      if (typeof raw.nominee !== "string") return null;
      return { type: "NOMINATE", nominee: raw.nominee, privateReasoning, publicReasoning };
    case "USE_COUNTER_ABILITY":
      if (typeof raw.target !== "string") return null;
      return { type: "USE_COUNTER_ABILITY", target: raw.target, privateReasoning, publicReasoning };
    case "CAST_VOTE":
      if (raw.vote !== "YES" && raw.vote !== "NO") return null;
      return { type: "CAST_VOTE", vote: raw.vote, privateReasoning, publicReasoning };
    case "CHOOSE_NIGHT_TARGETS":
      if (!isStringArray(raw.targets) || raw.targets.length > 2) return null;
      return { type: "CHOOSE_NIGHT_TARGETS", targets: raw.targets, privateReasoning };
    case "PASS":
      return { type: "PASS", privateReasoning };
    default:
      return null;
  }
}

function isKind<K extends DecisionKind>(decision: Decision, kinds: readonly K[]): decision is DecisionOf<K> {
  return kinds.some(kind => kind === decision.type);
}

/**
 * Asks a player's provider for a decision of one of `kinds`, with a bounded retry budget.
 *
 * Every attempt either fails at the provider (throws, wrong decision type) or at
 * `validate` (a GameRuleError, e.g. an unknown player name). When the budget runs out
 * a provider failure raises DecisionError; a validation failure returns null and the
 * caller treats the turn as a pass.
 */
export async function collectDecision<K extends DecisionKind>(
  ctx: GameContext,
  player: Player,
  kinds: readonly K[],
  buildRequest: (feedback: string | null) => DecisionRequest,
  validate?: (decision: DecisionOf<K>) => void
): Promise<DecisionOf<K> | null> {
  const provider = providerFor(ctx, player);
  let feedback: string | null = null;
  let providerFailed = false;

  for (let attempt = 0; attempt <= ctx.options.maxRetries; attempt++) {
    let decision: Decision;
    try {
      decision = await provider.decide(buildRequest(feedback));
    } catch (err) {
      providerFailed = true;
      feedback = err instanceof Error ? err.message : String(err);
      recordFailure(ctx, player, attempt, feedback);
      continue;
    }

    if (!isKind(decision, kinds)) {
      providerFailed = true;
      feedback = `Expected ${kinds.join(" or ")} but received ${decision.type}`;
      recordFailure(ctx, player, attempt, feedback);
      continue;
    }

    try {
      validate?.(decision);
      return decision;
    } catch (err) {
      if (!(err instanceof GameRuleError)) throw err;
      providerFailed = false;
      feedback = err.message;
      recordFailure(ctx, player, attempt, feedback);
    }
  }

  if (providerFailed) {
    throw new DecisionError(player.name, `No usable decision from ${player.name}: ${feedback ?? "unknown error"}`);
  }
  return null;
}

function recordFailure(ctx: GameContext, player: Player, attempt: number, reason: string): void {
  record(ctx, {
    kind: "DECISION_ERROR",
    description: `${player.name} made an invalid decision: ${reason}`,
    participants: [player.name],
    metadata: { attempt, reason },
    visibility: "PRIVATE"
  });
}
