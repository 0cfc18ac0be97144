import type { GameContext } from "../engine/context";
import type { GameOutcome } from "../engine/phases";
import { GameRuleError } from "../engine/types";

export type SessionStatus = "LOBBY" | "RUNNING" | "FINISHED" | "FAILED";

/** A dealt game plus the hosting bookkeeping around it. */
export interface GameSession {
  ctx: GameContext;
  status: SessionStatus;
  /** Seat name of the first claimant; only they may start the game. */
  host: string | null;
  /** Seats answered by a remote client rather than a bot. */
  claimed: Set<string>;
  outcome: GameOutcome | null;
  createdAt: number;
}

export function createSession(ctx: GameContext, now = Date.now()): GameSession {
  return { ctx, status: "LOBBY", host: null, claimed: new Set(), outcome: null, createdAt: now };
}

/**
 * Extremely small in-memory game registry.
 * The HTTP and WS layers both treat it as the single source of truth per process.
 */
export class GameStore {
  private sessions = new Map<string, GameSession>();

  /** Inserts a brand new session, throwing if the ID already exists. */
  create(session: GameSession): GameSession {
    const { gameId } = session.ctx.state;
    if (this.sessions.has(gameId)) {
      throw new GameRuleError("GAME_EXISTS", `Game ${gameId} already exists`);
    }
    this.sessions.set(gameId, session);
    return session;
  }

  get(gameId: string): GameSession | undefined {
    return this.sessions.get(gameId);
  }

  require(gameId: string): GameSession {
    const session = this.sessions.get(gameId);
    if (!session) {
      throw new GameRuleError("GAME_NOT_FOUND", "Game not found");
    }
    return session;
  }

  /** Removes a game entirely (used when cleaning up finished games). */
  delete(gameId: string): void {
    this.sessions.delete(gameId);
  }

  list(): GameSession[] {
    return Array.from(this.sessions.values());
  }
}
