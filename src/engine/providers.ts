import type { DayActionType, Decision, DecisionProvider, DecisionRequest, PrivateNote } from "./decisions";
import { randomItem, sample } from "./utils";
import type { RandomFn } from "./utils";
import type { PlayerView } from "../shared/messages";

export type RequestKind = DecisionRequest["kind"];

/** A queued answer: a fixed decision, one computed from the request, or an error to throw. */
export type ScriptedStep = Decision | Error | ((request: DecisionRequest) => Decision);

function otherPlayers(view: PlayerView, aliveOnly: boolean): string[] {
  return view.players.filter(p => p.name !== view.you.name && (!aliveOnly || p.alive)).map(p => p.name);
}

/** Answer used when a scripted queue runs dry: pass, vote no, pick the next seats. */
export function defaultDecision(request: DecisionRequest): Decision {
  switch (request.kind) {
    case "DAY_ACTION":
      return { type: "PASS", privateReasoning: "" };
    case "VOTE":
      return { type: "CAST_VOTE", vote: "NO", privateReasoning: "", publicReasoning: "" };
    case "NIGHT_TARGETS":
      return {
        type: "CHOOSE_NIGHT_TARGETS",
        targets: otherPlayers(request.view, true).slice(0, request.count),
        privateReasoning: ""
      };
  }
}

/**
 * Replays queued decisions per request kind, then falls back to `defaultDecision`.
 * Keeps every note and request it saw, which makes it the workhorse of the tests
 * and of replaying a recorded game.
 */
export class ScriptedProvider implements DecisionProvider {
  readonly notes: PrivateNote[] = [];
  readonly requests: DecisionRequest[] = [];
  private queues: Record<RequestKind, ScriptedStep[]> = { DAY_ACTION: [], VOTE: [], NIGHT_TARGETS: [] };

  constructor(script: Partial<Record<RequestKind, ScriptedStep[]>> = {}) {
    for (const kind of ["DAY_ACTION", "VOTE", "NIGHT_TARGETS"] as const) {
      this.queues[kind].push(...(script[kind] ?? []));
    }
  }

  queue(kind: RequestKind, ...steps: ScriptedStep[]): this {
    this.queues[kind].push(...steps);
    return this;
  }

  inform(note: PrivateNote): void {
    this.notes.push(note);
  }

  async decide(request: DecisionRequest): Promise<Decision> {
    this.requests.push(request);
    const step = this.queues[request.kind].shift();
    if (step === undefined) return defaultDecision(request);
    if (step instanceof Error) throw step;
    return typeof step === "function" ? step(request) : step;
  }

  /** Note texts only, oldest first. */
  texts(): string[] {
    return this.notes.map(n => n.text);
  }
}

export interface RandomProviderOptions {
  passChance: number;
  yesChance: number;
  counterAbilityChance: number;
}

const DEFAULT_RANDOM_OPTIONS: RandomProviderOptions = {
  passChance: 0.5,
  yesChance: 0.5,
  counterAbilityChance: 0.05
};

/** Seeded bot that fills empty seats. Plays legal but aimless moves. */
export class RandomProvider implements DecisionProvider {
  private options: RandomProviderOptions;

  constructor(private random: RandomFn, options: Partial<RandomProviderOptions> = {}) {
    this.options = { ...DEFAULT_RANDOM_OPTIONS, ...options };
  }

  inform(_note: PrivateNote): void {}

  async decide(request: DecisionRequest): Promise<Decision> {
    switch (request.kind) {
      case "DAY_ACTION":
        return this.dayAction(request.view, request.allowed);
      case "VOTE": {
        const vote = this.random() < this.options.yesChance ? "YES" : "NO";
        return { type: "CAST_VOTE", vote, privateReasoning: "", publicReasoning: "" };
      }
      case "NIGHT_TARGETS":
        return {
          type: "CHOOSE_NIGHT_TARGETS",
          targets: sample(otherPlayers(request.view, true), request.count, this.random),
          privateReasoning: ""
        };
    }
  }

  private dayAction(view: PlayerView, allowed: DayActionType[]): Decision {
    const pass: Decision = { type: "PASS", privateReasoning: "" };
    const living = otherPlayers(view, true);
    if (this.random() < this.options.passChance || living.length === 0) return pass;

    if (allowed.includes("NOMINATE")) {
      return { type: "NOMINATE", nominee: randomItem(living, this.random), privateReasoning: "", publicReasoning: "" };
    }
    if (allowed.includes("USE_COUNTER_ABILITY") && this.random() < this.options.counterAbilityChance) {
      const target = randomItem(living, this.random);
      return { type: "USE_COUNTER_ABILITY", target, privateReasoning: "", publicReasoning: "" };
    }
    if (allowed.includes("SEND_MESSAGE")) {
      const recipient = randomItem(living, this.random);
      return { type: "SEND_MESSAGE", recipients: [recipient], text: `Hello ${recipient}, what did you learn last night?` };
    }
    return pass;
  }
}
