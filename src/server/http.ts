import express from "express";
import type { NextFunction, Request, Response } from "express";
import { isCharacter } from "../engine/characters";
import { summarizeEvents } from "../engine/events";
import { buildGrimoire } from "../engine/grimoire";
import { createGame } from "../engine/setup";
import type { CategoryCounts, GameOptionsOverrides, GameSetup } from "../engine/setup";
import { GameRuleError } from "../engine/types";
import type { Character, GameOptions } from "../engine/types";
import { GameStore, createSession } from "./store";
import type { GameSession } from "./store";

const OPTION_KEYS: Array<keyof GameOptions> = [
  "maxRounds",
  "dayActionRounds",
  "nominationsOpenRound",
  "maxRetries",
  "messagesPerDay",
  "demonBluffCount",
  "scarletWomanMinAlive"
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function count(body: Record<string, unknown>, key: string): number {
  const value = body[key];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new GameRuleError("BAD_PAYLOAD", `"${key}" must be an integer`);
  }
  return value;
}

/** Turns an untrusted POST /games body into setup arguments. */
export function parseGameSetup(body: unknown): GameSetup {
  if (!isRecord(body)) {
    throw new GameRuleError("BAD_PAYLOAD", "Body must be a JSON object");
  }
  const setup: GameSetup = {};

  if (body.characters !== undefined) {
    if (!Array.isArray(body.characters)) {
      throw new GameRuleError("BAD_PAYLOAD", '"characters" must be an array');
    }
    const characters: Character[] = [];
    for (const value of body.characters) {
      if (!isCharacter(value)) throw new GameRuleError("UNKNOWN_CHARACTER", `Unknown character ${String(value)}`);
      characters.push(value);
    }
    setup.characters = characters;
  }

  if (body.counts !== undefined) {
    if (!isRecord(body.counts)) {
      throw new GameRuleError("BAD_PAYLOAD", '"counts" must be an object');
    }
    const counts: CategoryCounts = {
      townsfolk: count(body.counts, "townsfolk"),
      outsiders: count(body.counts, "outsiders"),
      minions: count(body.counts, "minions")
    };
    setup.counts = counts;
  }

  if (body.names !== undefined) {
    if (!Array.isArray(body.names) || !body.names.every(n => typeof n === "string" && n.trim().length > 0)) {
      throw new GameRuleError("BAD_PAYLOAD", '"names" must be an array of non-empty strings');
    }
    setup.names = body.names.map(n => String(n).trim());
  }

  if (body.seed !== undefined) setup.seed = count(body, "seed");

  if (body.options !== undefined) {
    if (!isRecord(body.options)) {
      throw new GameRuleError("BAD_PAYLOAD", '"options" must be an object');
    }
    const options: GameOptionsOverrides = {};
    for (const key of OPTION_KEYS) {
      if (body.options[key] !== undefined) options[key] = count(body.options, key);
    }
    setup.options = options;
  }

  return setup;
}

/** Public summary: no characters, no tokens. */
export function describeSession(session: GameSession) {
  const { state } = session.ctx;
  return {
    gameId: state.gameId,
    status: session.status,
    round: state.round,
    phase: state.phase,
    winner: state.winner,
    endReason: state.endReason,
    host: session.host,
    seats: state.players.map(p => ({ name: p.name, alive: p.alive, claimed: session.claimed.has(p.name) }))
  };
}

/**
 * Express app for creating games and reading their state. Seats are played over
 * WebSockets; these routes only deal games and expose the logs.
 */
export function createHttpApp(store: GameStore) {
  const app = express();
  app.use(express.json());

  /** Health probe for load balancers / ops. Returns process stats only. */
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", games: store.list().length, timestamp: Date.now() });
  });

  app.post("/games", (req, res) => {
    const ctx = createGame(parseGameSetup(req.body));
    const session = store.create(createSession(ctx));
    res.status(201).json(describeSession(session));
  });

  app.get("/games/:gameId", (req, res) => {
    res.json(describeSession(store.require(req.params.gameId)));
  });

  /** Public events only, unless `?all=true` asks for the storyteller's full log. */
  app.get("/games/:gameId/events", (req, res) => {
    const events = store.require(req.params.gameId).ctx.log.list();
    const all = req.query.all === "true";
    res.json(all ? events : events.filter(e => e.visibility === "PUBLIC"));
  });

  app.get("/games/:gameId/stats", (req, res) => {
    res.json(summarizeEvents(store.require(req.params.gameId).ctx.log.list()));
  });

  /**
   * Debug-only endpoint that dumps the grimoire.
   * Do not expose publicly without authentication; it leaks every character.
   */
  app.get("/games/:gameId/grimoire", (req, res) => {
    res.json(buildGrimoire(store.require(req.params.gameId).ctx.state));
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: "BAD_JSON", message: "Invalid JSON payload" });
    }
    if (err instanceof GameRuleError) {
      const status = err.code === "GAME_NOT_FOUND" ? 404 : 400;
      return res.status(status).json({ error: err.code, message: err.message });
    }
    console.error("HTTP handler error", err);
    return res.status(500).json({ error: "SERVER_ERROR", message: "Internal error" });
  });

  return app;
}
