import { describe, expect, it } from "vitest";
import { createGame } from "../../src/engine/setup";
import { GameRuleError } from "../../src/engine/types";
import { describeSession, parseGameSetup } from "../../src/server/http";
import { createSession } from "../../src/server/store";

function payloadError(body: unknown): string | null {
  try {
    parseGameSetup(body);
  } catch (err) {
    return err instanceof GameRuleError ? err.code : null;
  }
  return null;
}

describe("parseGameSetup", () => {
  it("reads characters, names, seed and known options", () => {
    expect(
      parseGameSetup({
        characters: ["CHEF", "IMP", "POISONER"],
        names: [" ann ", "ben", "cat"],
        seed: 12,
        options: { maxRounds: 3, colour: "red" }
      })
    ).toEqual({
      characters: ["CHEF", "IMP", "POISONER"],
      names: ["ann", "ben", "cat"],
      seed: 12,
      options: { maxRounds: 3 }
    });
  });

  it("reads category counts", () => {
    expect(parseGameSetup({ counts: { townsfolk: 5, outsiders: 0, minions: 1 } })).toEqual({
      counts: { townsfolk: 5, outsiders: 0, minions: 1 }
    });
  });

  it("rejects malformed bodies", () => {
    expect(payloadError("five players")).toBe("BAD_PAYLOAD");
    expect(payloadError({ characters: ["CHEF", "WIZARD"] })).toBe("UNKNOWN_CHARACTER");
    expect(payloadError({ characters: "CHEF" })).toBe("BAD_PAYLOAD");
    expect(payloadError({ counts: { townsfolk: 1.5, outsiders: 0, minions: 1 } })).toBe("BAD_PAYLOAD");
    expect(payloadError({ names: ["ann", ""] })).toBe("BAD_PAYLOAD");
    expect(payloadError({ options: { maxRounds: "six" } })).toBe("BAD_PAYLOAD");
  });
});

describe("describeSession", () => {
  it("lists seats without revealing characters", () => {
    const ctx = createGame({ characters: ["CHEF", "IMP", "POISONER"], names: ["ann", "ben", "cat"], seed: 4, gameId: "g7" });
    const session = createSession(ctx, 0);
    session.claimed.add("ben");
    session.host = "ben";

    const summary = describeSession(session);
    expect(summary).toMatchObject({ gameId: "g7", status: "LOBBY", round: 1, phase: "SETUP", winner: null, host: "ben" });
    expect(summary.seats).toEqual(
      ctx.state.players.map(p => ({ name: p.name, alive: true, claimed: p.name === "ben" }))
    );
    expect(JSON.stringify(summary)).not.toContain("IMP");
  });
});
