import http from "http";
import { WebSocketServer, WebSocket } from "ws";
import { parseClientMessage } from "../shared/messages";
import type { ClientMessage, ServerMessage } from "../shared/messages";
import { runGame } from "../engine/phases";
import { RandomProvider } from "../engine/providers";
import { GameRuleError } from "../engine/types";
import { createRandom } from "../engine/utils";
import { RemoteProvider } from "./remote";
import type { SeatChannel } from "./remote";
import { GameStore } from "./store";
import type { GameSession } from "./store";

interface ConnectionContext {
  gameId: string;
  name: string;
  provider: RemoteProvider;
}

export interface GatewayOptions {
  decisionTimeoutMs: number;
}

export const DEFAULT_GATEWAY_OPTIONS: GatewayOptions = {
  decisionTimeoutMs: 60_000
};

/** The slice of a WebSocket the gateway touches; lets tests drive it with a fake. */
export interface SeatSocket {
  readonly readyState: number;
  send(data: string): void;
}

/**
 * WebSocket gateway responsible for:
 * - binding sockets to seats of a dealt game,
 * - answering the engine's decision requests through each seat's RemoteProvider,
 * - starting games with bots in the unclaimed seats, and
 * - fanning public events out to every seat in the room.
 */
export class WebSocketGateway {
  private contexts = new Map<SeatSocket, ConnectionContext>();
  private rooms = new Map<string, Set<SeatSocket>>();
  private options: GatewayOptions;

  constructor(private store: GameStore, options: Partial<GatewayOptions> = {}) {
    this.options = { ...DEFAULT_GATEWAY_OPTIONS, ...options };
  }

  /** Binds the gateway to an HTTP server and starts accepting connections. */
  attach(server: http.Server): WebSocketServer {
    const wss = new WebSocketServer({ server });
    wss.on("connection", socket => {
      socket.on("message", data => this.handleMessage(socket, data.toString()));
      socket.on("close", () => this.handleClose(socket));
      socket.on("error", err => console.error("WebSocket error", err));
    });
    return wss;
  }

  /** Parses an incoming payload and dispatches typed client messages. */
  handleMessage(socket: SeatSocket, raw: string): void {
    let message: ClientMessage;
    try {
      message = parseClientMessage(raw);
    } catch (err) {
      if (err instanceof SyntaxError) {
        this.sendError(socket, "BAD_JSON", "Invalid JSON payload");
      } else if (err instanceof GameRuleError) {
        this.sendError(socket, err.code, err.message);
      } else {
        console.error("Unexpected parse error", err);
        this.sendError(socket, "SERVER_ERROR", "Unexpected error");
      }
      return;
    }
    this.handleClientMessage(socket, message);
  }

  /** Executes the correct handler for the parsed client message. */
  private handleClientMessage(socket: SeatSocket, msg: ClientMessage): void {
    try {
      switch (msg.type) {
        case "JOIN_GAME":
          this.handleJoinGame(socket, msg.payload);
          break;
        case "START_GAME":
          this.handleStartGame(socket, msg.payload);
          break;
        case "DECISION":
          this.handleDecision(socket, msg.payload);
          break;
        case "LEAVE_GAME":
          this.handleLeaveGame(socket, msg.payload);
          break;
      }
    } catch (err) {
      if (err instanceof GameRuleError) {
        this.sendError(socket, err.code, err.message);
      } else {
        console.error("Handler error", err);
        this.sendError(socket, "SERVER_ERROR", "Internal error");
      }
    }
  }

  /** Ensures the socket previously joined a game and has an attached seat. */
  private requireContext(socket: SeatSocket): ConnectionContext {
    const ctx = this.contexts.get(socket);
    if (!ctx) {
      throw new GameRuleError("NO_CONTEXT", "Socket is not joined to a game");
    }
    return ctx;
  }

  /** Rejects payloads that reference another game than the one the socket joined. */
  private requireSameGame(ctx: ConnectionContext, gameId: string): void {
    if (ctx.gameId !== gameId) {
      throw new GameRuleError("WRONG_GAME", "Payload references another game");
    }
  }

  private channelFor(socket: SeatSocket): SeatChannel {
    return { send: message => this.send(socket, message) };
  }

  /** Adds a socket to the per-game room list and stores its context. */
  private attachSocket(socket: SeatSocket, ctx: ConnectionContext): void {
    this.contexts.set(socket, ctx);
    const room = this.rooms.get(ctx.gameId) ?? new Set<SeatSocket>();
    room.add(socket);
    this.rooms.set(ctx.gameId, room);
  }

  /**
   * Releases the seat: pending decisions fail, and a lobby seat becomes free again.
   * A running game keeps the seat; its provider simply fails from now on.
   */
  private detach(socket: SeatSocket): void {
    const ctx = this.contexts.get(socket);
    if (!ctx) return;

    this.contexts.delete(socket);
    const room = this.rooms.get(ctx.gameId);
    if (room) {
      room.delete(socket);
      if (room.size === 0) {
        this.rooms.delete(ctx.gameId);
      }
    }
    ctx.provider.close(`${ctx.name} left the game`);

    const session = this.store.get(ctx.gameId);
    if (!session) {
      console.warn(`Detached socket from missing game ${ctx.gameId}`);
      return;
    }
    if (session.status === "LOBBY") {
      session.claimed.delete(ctx.name);
      delete session.ctx.providers[ctx.name];
      if (session.host === ctx.name) {
        session.host = session.claimed.values().next().value ?? null;
      }
    }
  }

  private handleClose(socket: SeatSocket): void {
    this.detach(socket);
  }

  private send(socket: SeatSocket, message: ServerMessage): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message));
  }

  private sendError(socket: SeatSocket, code: string, message: string): void {
    this.send(socket, { type: "ERROR", payload: { code, message } });
  }

  private broadcast(gameId: string, message: ServerMessage): void {
    const room = this.rooms.get(gameId);
    if (!room) return;
    for (const socket of room) {
      this.send(socket, message);
    }
  }

  /** JOIN_GAME → claims a free seat in a lobby; the first claimant becomes host. */
  private handleJoinGame(socket: SeatSocket, payload: { gameId: string; name: string }): void {
    if (this.contexts.has(socket)) {
      throw new GameRuleError("ALREADY_IN_GAME", "Socket already bound to a game");
    }
    const session = this.store.require(payload.gameId);
    if (session.status !== "LOBBY") {
      throw new GameRuleError("GAME_STARTED", "Seats can only be claimed before the game starts");
    }
    const seat = session.ctx.state.players.find(p => p.name === payload.name);
    if (!seat) {
      throw new GameRuleError("SEAT_NOT_FOUND", `No seat named ${payload.name}`);
    }
    if (session.claimed.has(seat.name)) {
      throw new GameRuleError("SEAT_TAKEN", `${seat.name} is already taken`);
    }

    const provider = new RemoteProvider(this.channelFor(socket), this.options.decisionTimeoutMs);
    session.ctx.providers[seat.name] = provider;
    session.claimed.add(seat.name);
    session.host = session.host ?? seat.name;
    this.attachSocket(socket, { gameId: payload.gameId, name: seat.name, provider });

    this.send(socket, {
      type: "JOINED",
      payload: {
        gameId: payload.gameId,
        name: seat.name,
        isHost: session.host === seat.name,
        seats: session.ctx.state.players.map(p => p.name)
      }
    });
  }

  /** START_GAME → host-only; seats nobody claimed are played by seeded bots. */
  private handleStartGame(socket: SeatSocket, payload: { gameId: string }): void {
    const ctx = this.requireContext(socket);
    this.requireSameGame(ctx, payload.gameId);
    const session = this.store.require(payload.gameId);
    if (session.host !== ctx.name) {
      throw new GameRuleError("NOT_HOST", "Only the host can start the game");
    }
    if (session.status !== "LOBBY") {
      throw new GameRuleError("GAME_STARTED", "Game already started");
    }

    for (const player of session.ctx.state.players) {
      if (!session.claimed.has(player.name)) {
        const seed = Math.floor(session.ctx.random() * 0x100000000);
        session.ctx.providers[player.name] = new RandomProvider(createRandom(seed));
      }
    }
    void this.runSession(session);
  }

  /** Drives the engine to completion, streaming public events to the room. */
  async runSession(session: GameSession): Promise<void> {
    const { gameId } = session.ctx.state;
    session.status = "RUNNING";
    const unsubscribe = session.ctx.log.subscribe(event => {
      if (event.visibility === "PUBLIC") this.broadcast(gameId, { type: "EVENT", payload: event });
    });

    try {
      const outcome = await runGame(session.ctx);
      session.outcome = outcome;
      session.status = "FINISHED";
      this.broadcast(gameId, { type: "GAME_OVER", payload: { gameId, winner: outcome.winner, reason: outcome.reason } });
    } catch (err) {
      session.status = "FAILED";
      console.error(`Game ${gameId} crashed`, err);
      this.broadcast(gameId, { type: "ERROR", payload: { code: "GAME_FAILED", message: "The game stopped unexpectedly" } });
    } finally {
      unsubscribe();
    }
  }

  /** DECISION → settles the seat's pending request. */
  private handleDecision(socket: SeatSocket, payload: { requestId: string; decision: unknown }): void {
    const ctx = this.requireContext(socket);
    ctx.provider.answer(payload.requestId, payload.decision);
  }

  /** LEAVE_GAME → frees the seat in a lobby, or abandons it mid-game. */
  private handleLeaveGame(socket: SeatSocket, payload: { gameId: string }): void {
    const ctx = this.requireContext(socket);
    this.requireSameGame(ctx, payload.gameId);
    this.detach(socket);
  }
}
