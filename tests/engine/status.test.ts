import { describe, it, expect } from "vitest";
import { clearPoisoner, isImpaired, poison } from "../../src/engine/status";
import { makeGame, makePlayer } from "../helpers";

function seated() {
  return makeGame([
    makePlayer("p", "POISONER"),
    makePlayer("q", "POISONER"),
    makePlayer("r", "POISONER"),
    makePlayer("chef", "CHEF"),
    makePlayer("drunk", "DRUNK", { drunkCharacter: "EMPATH" })
  ]);
}

describe("isImpaired", () => {
  it("always impairs the Drunk", () => {
    const game = seated();
    expect(isImpaired(game.state, game.seat("drunk"))).toBe(true);
  });

  it("impairs a player poisoned by a living, healthy poisoner", () => {
    const game = seated();
    game.state.poison = { chef: ["p"] };
    expect(isImpaired(game.state, game.seat("chef"))).toBe(true);
  });

  it("ignores dead poisoners", () => {
    const game = seated();
    game.state.poison = { chef: ["p"] };
    game.seat("p").alive = false;
    expect(isImpaired(game.state, game.seat("chef"))).toBe(false);
  });

  it("ignores poisoners who are impaired themselves", () => {
    const game = seated();
    game.state.poison = { chef: ["p"], p: ["q"] };
    expect(isImpaired(game.state, game.seat("p"))).toBe(true);
    expect(isImpaired(game.state, game.seat("chef"))).toBe(false);
  });

  it("terminates on a 2-cycle", () => {
    const game = seated();
    game.state.poison = { p: ["q"], q: ["p"] };
    expect(isImpaired(game.state, game.seat("p"))).toBe(true);
    expect(isImpaired(game.state, game.seat("q"))).toBe(true);
  });

  it("treats a self-loop as not impaired", () => {
    const game = seated();
    game.state.poison = { p: ["p"] };
    expect(isImpaired(game.state, game.seat("p"))).toBe(false);
  });

  it("impairs a player in a 2-cycle whose partner is also poisoned by an unpoisoned third player", () => {
    const game = seated();
    game.state.poison = { p: ["q"], q: ["p", "r"] };
    expect(isImpaired(game.state, game.seat("p"))).toBe(true);
  });

  it("leaves unpoisoned players alone", () => {
    const game = seated();
    expect(isImpaired(game.state, game.seat("chef"))).toBe(false);
  });
});

describe("poison graph", () => {
  it("moves a poisoner to its new target", () => {
    const game = seated();
    poison(game.state, "p", "chef");
    poison(game.state, "p", "q");
    expect(game.state.poison).toEqual({ q: ["p"] });
  });

  it("keeps other poisoners on a shared target", () => {
    const game = seated();
    poison(game.state, "p", "chef");
    poison(game.state, "q", "chef");
    clearPoisoner(game.state, "p");
    expect(game.state.poison).toEqual({ chef: ["q"] });
  });
});
