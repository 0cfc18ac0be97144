import { believedCharacter } from "../engine/characters";
import { GameRuleError } from "../engine/types";
import type { Alignment, Character, ChoppingBlock, GameState, Phase, Winner } from "../engine/types";
import type { DecisionRequest, PrivateNote } from "../engine/decisions";
import type { GameEvent } from "../engine/events";

/** Public info exposed to every viewer, with all secret info stripped. */
export interface PublicPlayerView {
  name: string;
  alive: boolean;
  usedGhostVote: boolean;
}

/** A player's private view extends the public shape with what they believe about themselves. */
export interface SelfPlayerView extends PublicPlayerView {
  /** The Drunk sees the Townsfolk character they were told, never "Drunk". */
  character: Character;
  alignment: Alignment;
  usedNomination: boolean;
  usedCounterAbility: boolean;
  messagesLeft: number;
}

/** Read-only snapshot handed to a decision provider. */
export interface PlayerView {
  gameId: string;
  round: number;
  phase: Phase;
  nominationsOpen: boolean;
  choppingBlock: ChoppingBlock | null;
  winner: Winner | null;
  /** Seating order; adjacency wraps from last to first. */
  players: PublicPlayerView[];
  you: SelfPlayerView;
  notes: string[];
}

/**
 * Builds a per-player view by redacting hidden information and ensuring the caller is part of the game.
 * Characters are only revealed for the viewer, and only as the viewer believes them.
 */
export function buildPlayerView(game: GameState, viewerName: string): PlayerView {
  const viewer = game.players.find(p => p.name === viewerName);
  if (!viewer) {
    throw new Error("Viewer is not part of the game");
  }

  const publicPlayers: PublicPlayerView[] = game.players.map(p => ({
    name: p.name,
    alive: p.alive,
    usedGhostVote: p.usedGhostVote
  }));

  const you: SelfPlayerView = {
    name: viewer.name,
    alive: viewer.alive,
    usedGhostVote: viewer.usedGhostVote,
    character: believedCharacter(viewer),
    alignment: viewer.alignment,
    usedNomination: viewer.usedNomination,
    usedCounterAbility: viewer.usedCounterAbility,
    messagesLeft: viewer.messagesLeft
  };

  return {
    gameId: game.gameId,
    round: game.round,
    phase: game.phase,
    nominationsOpen: game.nominationsOpen,
    choppingBlock: game.choppingBlock ? { ...game.choppingBlock } : null,
    winner: game.winner,
    players: publicPlayers,
    you,
    notes: [...(game.inbox[viewer.name] ?? [])]
  };
}

/**
 * All messages a seat client may issue over the WebSocket channel.
 * The server enforces that the socket only answers for the seat it claimed.
 */
export type ClientMessage =
  /** Claim an unoccupied seat in a created game. The first claimant becomes host. */
  | { type: "JOIN_GAME"; payload: { gameId: string; name: string } }
  /** Host-only: fill the remaining seats with bots and start the first night. */
  | { type: "START_GAME"; payload: { gameId: string } }
  /** Answer to a DECISION_REQUEST; `decision` is validated server-side. */
  | { type: "DECISION"; payload: { requestId: string; decision: unknown } }
  /** Release the seat; pending and future decisions fail for this seat. */
  | { type: "LEAVE_GAME"; payload: { gameId: string } };

/** Messages emitted by the server. */
export type ServerMessage =
  | { type: "ERROR"; payload: { code: string; message: string } }
  | { type: "JOINED"; payload: { gameId: string; name: string; isHost: boolean; seats: string[] } }
  | { type: "DECISION_REQUEST"; payload: { requestId: string; request: DecisionRequest; deadline: number } }
  | { type: "INFO"; payload: PrivateNote }
  | { type: "EVENT"; payload: GameEvent }
  | { type: "GAME_OVER"; payload: { gameId: string; winner: Winner | null; reason: string | null } };

function field(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new GameRuleError("BAD_PAYLOAD", `Missing string field "${key}"`);
  }
  return value;
}

/**
 * Parses a raw socket frame into a typed client message.
 * Throws SyntaxError on bad JSON and GameRuleError on an unknown or malformed message.
 */
export function parseClientMessage(raw: string): ClientMessage {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || !("type" in parsed) || !("payload" in parsed)) {
    throw new GameRuleError("BAD_PAYLOAD", "Messages need a type and a payload");
  }
  const { type, payload } = parsed;
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw new GameRuleError("BAD_PAYLOAD", "Payload must be an object");
  }
  const body: Record<string, unknown> = { ...payload };

  switch (type) {
    case "JOIN_GAME":
      return { type: "JOIN_GAME", payload: { gameId: field(body, "gameId"), name: field(body, "name") } };
    case "START_GAME":
      return { type: "START_GAME", payload: { gameId: field(body, "gameId") } };
    case "DECISION":
      return { type: "DECISION", payload: { requestId: field(body, "requestId"), decision: body.decision } };
    case "LEAVE_GAME":
      return { type: "LEAVE_GAME", payload: { gameId: field(body, "gameId") } };
    default:
      throw new GameRuleError("INVALID_TYPE", "Unknown message type");
  }
}
