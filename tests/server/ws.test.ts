import { describe, expect, it, vi } from "vitest";
import { createGame } from "../../src/engine/setup";
import type { Character } from "../../src/engine/types";
import { GameStore, createSession } from "../../src/server/store";
import { WebSocketGateway } from "../../src/server/ws";
import type { SeatSocket } from "../../src/server/ws";
import type { ServerMessage } from "../../src/shared/messages";

const CHARACTERS: Character[] = ["CHEF", "EMPATH", "SOLDIER", "POISONER", "IMP"];
const NAMES = ["ann", "ben", "cat", "dan", "eve"];

class FakeSocket implements SeatSocket {
  readyState = 1;
  readonly messages: ServerMessage[] = [];

  send(data: string): void {
    const message: ServerMessage = JSON.parse(data);
    this.messages.push(message);
  }

  last(): ServerMessage | undefined {
    return this.messages.at(-1);
  }

  types(): string[] {
    return this.messages.map(m => m.type);
  }
}

function setup() {
  const store = new GameStore();
  const session = store.create(createSession(createGame({ characters: CHARACTERS, names: NAMES, seed: 21, gameId: "g1" })));
  const gateway = new WebSocketGateway(store, { decisionTimeoutMs: 1000 });
  const send = (socket: FakeSocket, message: unknown) => gateway.handleMessage(socket, JSON.stringify(message));
  const join = (socket: FakeSocket, name: string, gameId = "g1") =>
    send(socket, { type: "JOIN_GAME", payload: { gameId, name } });
  return { store, session, gateway, send, join };
}

function errorCode(socket: FakeSocket): string | null {
  const message = socket.last();
  return message?.type === "ERROR" ? message.payload.code : null;
}

describe("WebSocketGateway", () => {
  it("claims a seat and makes the first claimant host", () => {
    const { session, join } = setup();
    const ann = new FakeSocket();
    const ben = new FakeSocket();
    join(ann, "ann");
    join(ben, "ben");

    expect(ann.last()).toEqual({
      type: "JOINED",
      payload: { gameId: "g1", name: "ann", isHost: true, seats: session.ctx.state.players.map(p => p.name) }
    });
    expect(ben.last()).toMatchObject({ type: "JOINED", payload: { name: "ben", isHost: false } });
    expect(session.host).toBe("ann");
    expect([...session.claimed]).toEqual(["ann", "ben"]);
  });

  it("rejects bad joins", () => {
    const { join } = setup();
    const ann = new FakeSocket();
    join(ann, "ann");
    join(ann, "ben");
    expect(errorCode(ann)).toBe("ALREADY_IN_GAME");

    const other = new FakeSocket();
    join(other, "ann");
    expect(errorCode(other)).toBe("SEAT_TAKEN");
    join(other, "zed");
    expect(errorCode(other)).toBe("SEAT_NOT_FOUND");
    join(other, "ben", "missing");
    expect(errorCode(other)).toBe("GAME_NOT_FOUND");
  });

  it("reports malformed frames", () => {
    const { gateway, send } = setup();
    const socket = new FakeSocket();
    gateway.handleMessage(socket, "{not json");
    expect(errorCode(socket)).toBe("BAD_JSON");
    send(socket, { type: "DANCE", payload: {} });
    expect(errorCode(socket)).toBe("INVALID_TYPE");
    send(socket, { type: "START_GAME", payload: { gameId: "g1" } });
    expect(errorCode(socket)).toBe("NO_CONTEXT");
  });

  it("only lets the host start", () => {
    const { join, send } = setup();
    const ann = new FakeSocket();
    const ben = new FakeSocket();
    join(ann, "ann");
    join(ben, "ben");
    send(ben, { type: "START_GAME", payload: { gameId: "g1" } });
    expect(errorCode(ben)).toBe("NOT_HOST");
  });

  it("frees a lobby seat on leave and hands the host role on", () => {
    const { session, join, send } = setup();
    const ann = new FakeSocket();
    const ben = new FakeSocket();
    join(ann, "ann");
    join(ben, "ben");
    send(ann, { type: "LEAVE_GAME", payload: { gameId: "g1" } });

    expect(session.host).toBe("ben");
    expect(session.claimed.has("ann")).toBe(false);
    expect(session.ctx.providers.ann).toBeUndefined();

    const again = new FakeSocket();
    join(again, "ann");
    expect(again.last()).toMatchObject({ type: "JOINED", payload: { name: "ann", isHost: false } });
  });

  it("rejects answers to requests it never sent", () => {
    const { join, send } = setup();
    const ann = new FakeSocket();
    join(ann, "ann");
    send(ann, { type: "DECISION", payload: { requestId: "r-unknown", decision: { type: "PASS" } } });
    expect(errorCode(ann)).toBe("UNKNOWN_REQUEST");
  });

  it("plays the game out with bots once the host starts and leaves", async () => {
    const { session, join, send } = setup();
    const ann = new FakeSocket();
    join(ann, "ann");
    send(ann, { type: "START_GAME", payload: { gameId: "g1" } });

    expect(session.status).toBe("RUNNING");
    expect(ann.types()).toContain("INFO");
    expect(ann.types()).toContain("EVENT");

    send(ann, { type: "START_GAME", payload: { gameId: "g1" } });
    expect(errorCode(ann)).toBe("GAME_STARTED");

    send(ann, { type: "LEAVE_GAME", payload: { gameId: "g1" } });
    await vi.waitFor(() => expect(session.status).toBe("FINISHED"));
    expect(session.outcome).not.toBeNull();
    expect(session.claimed.has("ann")).toBe(true);
  });

  it("stops writing to closed sockets", () => {
    const { join } = setup();
    const ann = new FakeSocket();
    ann.readyState = 3;
    join(ann, "ann");
    expect(ann.messages).toEqual([]);
  });
});
