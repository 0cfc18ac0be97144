import { nowIso } from "./utils";
import type { GameState, Phase } from "./types";

export type EventKind =
  | "GAME_SETUP"
  | "PLAYER_SETUP"
  | "ROUND_START"
  | "PHASE_CHANGE"
  | "STORYTELLER_INFO"
  | "CHARACTER_POWER"
  | "MESSAGE"
  | "PLAYER_PASS"
  | "NOMINATION"
  | "VOTING"
  | "NOMINATION_RESULT"
  | "EXECUTION"
  | "PLAYER_DEATH"
  | "SCARLET_WOMAN_TRANSFORM"
  | "DEMON_SUCCESSION"
  | "SLAYER_POWER"
  | "VIRGIN_POWER"
  | "MAYOR_WIN"
  | "SAINT_EXECUTED"
  | "INFO_BROADCAST"
  | "DECISION_ERROR"
  | "GAME_END";

/** PUBLIC events may be shown to every player; PRIVATE ones only to the storyteller view. */
export type Visibility = "PUBLIC" | "PRIVATE";

export interface GameEvent {
  timestamp: string;
  round: number;
  phase: Phase;
  kind: EventKind;
  description: string;
  participants: string[];
  metadata: Record<string, unknown>;
  visibility: Visibility;
}

export interface EventInput {
  kind: EventKind;
  description: string;
  participants?: string[];
  metadata?: Record<string, unknown>;
  visibility?: Visibility;
}

export type EventListener = (event: GameEvent) => void;

/**
 * Append-only stream of everything the engine does.
 * Consumers (console output, WebSocket fan-out, replay tooling) subscribe; game logic never reads it back.
 */
export class EventLog {
  private events: GameEvent[] = [];
  private listeners = new Set<EventListener>();

  constructor(private clock: () => string = nowIso) {}

  record(state: GameState, input: EventInput): GameEvent {
    const event: GameEvent = {
      timestamp: this.clock(),
      round: state.round,
      phase: state.phase,
      kind: input.kind,
      description: input.description,
      participants: input.participants ?? [],
      metadata: input.metadata ?? {},
      visibility: input.visibility ?? "PUBLIC"
    };
    this.events.push(event);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error("Event listener failed", err);
      }
    }
    return event;
  }

  /** Registers a listener and returns its unsubscribe function. */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  list(): GameEvent[] {
    return [...this.events];
  }

  byKind(kind: EventKind): GameEvent[] {
    return this.events.filter(e => e.kind === kind);
  }

  byRound(round: number): GameEvent[] {
    return this.events.filter(e => e.round === round);
  }
}

export interface GameStatistics {
  totalEvents: number;
  totalRounds: number;
  eventsByKind: Partial<Record<EventKind, number>>;
  deaths: string[];
  executions: string[];
  /** "nominator → nominee" */
  nominations: string[];
}

/** Aggregates a finished (or in-progress) event stream. */
export function summarizeEvents(events: readonly GameEvent[]): GameStatistics {
  const stats: GameStatistics = {
    totalEvents: events.length,
    totalRounds: events.reduce((max, e) => Math.max(max, e.round), 0),
    eventsByKind: {},
    deaths: [],
    executions: [],
    nominations: []
  };

  for (const event of events) {
    stats.eventsByKind[event.kind] = (stats.eventsByKind[event.kind] ?? 0) + 1;
    const [first, second] = event.participants;
    if (event.kind === "PLAYER_DEATH" && first) stats.deaths.push(first);
    if (event.kind === "EXECUTION" && first) stats.executions.push(first);
    if (event.kind === "NOMINATION" && first && second) stats.nominations.push(`${first} → ${second}`);
  }

  return stats;
}
