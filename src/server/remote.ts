import { randomUUID } from "crypto";
import { parseDecision } from "../engine/decisions";
import type { Decision, DecisionProvider, DecisionRequest, PrivateNote } from "../engine/decisions";
import { GameRuleError } from "../engine/types";
import type { ServerMessage } from "../shared/messages";

/** Whatever carries server messages to one seat; a WebSocket in production. */
export interface SeatChannel {
  send(message: ServerMessage): void;
}

interface PendingDecision {
  resolve: (decision: Decision) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Decision provider for a seat played over the wire. Each `decide` call sends a
 * DECISION_REQUEST and waits for the matching DECISION frame; a timeout, a
 * malformed answer or a closed seat rejects, which the engine counts as a
 * provider failure.
 */
export class RemoteProvider implements DecisionProvider {
  private pending = new Map<string, PendingDecision>();
  private closedReason: string | null = null;

  constructor(
    private channel: SeatChannel,
    private timeoutMs: number,
    private nextId: () => string = randomUUID
  ) {}

  inform(note: PrivateNote): void {
    if (this.closedReason) return;
    this.channel.send({ type: "INFO", payload: note });
  }

  decide(request: DecisionRequest): Promise<Decision> {
    if (this.closedReason) {
      return Promise.reject(new Error(this.closedReason));
    }
    return new Promise<Decision>((resolve, reject) => {
      const requestId = this.nextId();
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`No decision within ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      this.pending.set(requestId, { resolve, reject, timer });
      this.channel.send({
        type: "DECISION_REQUEST",
        payload: { requestId, request, deadline: Date.now() + this.timeoutMs }
      });
    });
  }

  /** Settles the request `requestId` with an untrusted payload from the client. */
  answer(requestId: string, raw: unknown): void {
    const entry = this.pending.get(requestId);
    if (!entry) {
      throw new GameRuleError("UNKNOWN_REQUEST", "No pending decision with that id");
    }
    this.pending.delete(requestId);
    clearTimeout(entry.timer);

    const decision = parseDecision(raw);
    if (decision) entry.resolve(decision);
    else entry.reject(new Error("Malformed decision payload"));
  }

  /** Fails every pending and future request. */
  close(reason: string): void {
    this.closedReason = reason;
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
      entry.reject(new Error(reason));
    }
    this.pending.clear();
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}
