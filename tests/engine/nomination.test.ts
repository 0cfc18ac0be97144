import { describe, it, expect } from "vitest";
import { eligibleVoters, formatVotes, runNomination, votingThresholds } from "../../src/engine/nomination";
import { endDay } from "../../src/engine/phases";
import { placeReminder } from "../../src/engine/reminders";
import type { Player } from "../../src/engine/types";
import { makeGame, makePlayer, vote } from "../helpers";

function dayGame(players: Player[]) {
  const game = makeGame(players, { phase: "DAY" });
  game.state.nominationsOpen = true;
  return game;
}

const table = () =>
  dayGame([
    makePlayer("a", "CHEF"),
    makePlayer("b", "EMPATH"),
    makePlayer("c", "IMP"),
    makePlayer("d", "POISONER"),
    makePlayer("e", "SOLDIER")
  ]);

describe("votingThresholds", () => {
  it("needs half the living, rounded up, on an empty block", () => {
    const game = table();
    expect(votingThresholds(game.ctx)).toEqual({ requiredToExecute: 3, requiredToTie: null });
    game.seat("e").alive = false;
    expect(votingThresholds(game.ctx)).toEqual({ requiredToExecute: 2, requiredToTie: null });
  });

  it("is measured against the block once occupied", () => {
    const game = table();
    game.state.choppingBlock = { nominee: "c", votes: 3 };
    expect(votingThresholds(game.ctx)).toEqual({ requiredToExecute: 4, requiredToTie: 3 });
  });
});

describe("runNomination", () => {
  it("asks every seat from the nominee clockwise and puts a majority on the block", async () => {
    const game = table();
    for (const name of ["d", "e", "a"]) game.providers[name].queue("VOTE", vote("YES"));

    const endsDay = await runNomination(game.ctx, game.seat("a"), "c", "shifty.");

    expect(endsDay).toBe(false);
    expect(game.state.choppingBlock).toEqual({ nominee: "c", votes: 3 });
    expect(game.ctx.log.byKind("VOTING").map(e => e.participants[0])).toEqual(["c", "d", "e", "a", "b"]);
    expect(game.providers.b.texts()).toEqual([
      "Storyteller: a has nominated c for execution. Their reason is: shifty. The chopping block is empty.",
      "Storyteller: c has been nominated for execution with 3 votes. They will die at the end of the day if no one else is nominated. Vote record: c: no, d: yes, e: yes, a: yes, b: no"
    ]);
    expect(game.seat("a").usedNomination).toBe(true);
    expect(game.seat("c").nominatedToday).toBe(true);
  });

  it("shows later voters the votes already cast", async () => {
    const game = table();
    game.providers.c.queue("VOTE", vote("YES", "I am innocent, honest"));
    await runNomination(game.ctx, game.seat("a"), "c", "shifty.");
    const [request] = game.providers.d.requests;
    expect(request).toMatchObject({
      kind: "VOTE",
      nominator: "a",
      nominee: "c",
      previousVotes: [{ voter: "c", vote: "YES", publicReasoning: "I am innocent, honest" }],
      requiredToExecute: 3,
      requiredToTie: null
    });
  });

  it("empties the block on an exact tie and nobody is executed that day", async () => {
    const game = table();
    game.state.choppingBlock = { nominee: "c", votes: 3 };
    for (const name of ["a", "b", "c"]) game.providers[name].queue("VOTE", vote("YES"));

    await runNomination(game.ctx, game.seat("b"), "e", "too quiet.");
    expect(game.state.choppingBlock).toBeNull();
    const [result] = game.ctx.log.byKind("NOMINATION_RESULT");
    expect(result.metadata).toMatchObject({ outcome: "TIE", yes: 3 });

    endDay(game.ctx);
    expect(game.ctx.log.byKind("EXECUTION")).toHaveLength(0);
    expect(game.state.players.every(p => p.alive)).toBe(true);
    expect(game.providers.a.texts().at(-1)).toBe("Storyteller: Nobody was executed today.");
  });

  it("replaces the block when the new nominee beats it", async () => {
    const game = table();
    game.state.choppingBlock = { nominee: "c", votes: 2 };
    for (const name of ["a", "b", "c"]) game.providers[name].queue("VOTE", vote("YES"));
    await runNomination(game.ctx, game.seat("b"), "e", "too quiet.");
    expect(game.state.choppingBlock).toEqual({ nominee: "e", votes: 3 });
  });

  it("leaves the block unchanged below the tie", async () => {
    const game = table();
    game.state.choppingBlock = { nominee: "c", votes: 2 };
    game.providers.a.queue("VOTE", vote("YES"));
    await runNomination(game.ctx, game.seat("b"), "e", "too quiet.");
    expect(game.state.choppingBlock).toEqual({ nominee: "c", votes: 2 });
    expect(game.providers.a.texts().at(-1)).toBe(
      "Storyteller: e has received 1 votes, which is not enough. The chopping block is unchanged. Vote record: e: no, a: yes, b: no, c: no, d: no"
    );
  });

  it("spends a dead player's ghost vote on a yes", async () => {
    const game = table();
    game.seat("b").alive = false;
    game.providers.b.queue("VOTE", vote("YES"));

    await runNomination(game.ctx, game.seat("a"), "c", "shifty.");
    expect(game.seat("b").usedGhostVote).toBe(true);
    expect(eligibleVoters(game.state.players).map(p => p.name)).toEqual(["a", "c", "d", "e"]);

    await runNomination(game.ctx, game.seat("e"), "d", "poison vibes.");
    expect(game.providers.b.requests).toHaveLength(1);
    const votes = game.ctx.log.byKind("VOTING").slice(5).map(e => e.metadata.vote);
    expect(votes).toEqual(["NO", "NO", "NO", "CANT_VOTE", "NO"]);
  });

  it("keeps the ghost vote when a dead player votes no", async () => {
    const game = table();
    game.seat("b").alive = false;
    await runNomination(game.ctx, game.seat("a"), "c", "shifty.");
    expect(game.seat("b").usedGhostVote).toBe(false);
  });

  it("ignores nominations that break the rules", async () => {
    const game = table();
    game.state.nominationsOpen = false;
    expect(await runNomination(game.ctx, game.seat("a"), "c", "")).toBe(false);

    game.state.nominationsOpen = true;
    game.seat("e").alive = false;
    await runNomination(game.ctx, game.seat("e"), "c", "");

    game.seat("c").nominatedToday = true;
    await runNomination(game.ctx, game.seat("a"), "c", "");
    await runNomination(game.ctx, game.seat("a"), "zed", "");

    expect(game.ctx.log.byKind("DECISION_ERROR").map(e => e.description)).toEqual([
      "Nomination by a ignored: Nominations are not open yet",
      "Nomination by e ignored: Dead players cannot nominate",
      "Nomination by a ignored: c has already been nominated today",
      "Nomination by a ignored: Player zed not found"
    ]);
    expect(game.ctx.log.byKind("NOMINATION")).toHaveLength(0);
    expect(game.seat("a").usedNomination).toBe(false);
  });

  it("allows nominating a dead player", async () => {
    const game = table();
    game.seat("e").alive = false;
    await runNomination(game.ctx, game.seat("a"), "e", "");
    expect(game.ctx.log.byKind("NOMINATION")).toHaveLength(1);
  });
});

describe("Butler votes", () => {
  const butlerTable = () => {
    const game = dayGame([
      makePlayer("a", "BUTLER"),
      makePlayer("b", "EMPATH"),
      makePlayer("c", "IMP"),
      makePlayer("d", "POISONER"),
      makePlayer("e", "SOLDIER")
    ]);
    placeReminder(game.state, "BUTLER_MASTER", "a", "b");
    return game;
  };

  it("forces a no when the master has not voted yes first", async () => {
    const game = butlerTable();
    game.providers.b.queue("VOTE", vote("YES"));
    await runNomination(game.ctx, game.seat("e"), "c", "");
    expect(game.providers.a.requests).toHaveLength(0);
    expect(game.providers.a.texts()).toContain("Your master b has not voted yes, so you vote no.");
  });

  it("lets the Butler vote after the master's yes", async () => {
    const game = butlerTable();
    game.providers.b.queue("VOTE", vote("YES"));
    game.providers.a.queue("VOTE", vote("YES"));
    await runNomination(game.ctx, game.seat("e"), "b", "");
    const byVoter = Object.fromEntries(game.ctx.log.byKind("VOTING").map(e => [e.participants[0], e.metadata.vote]));
    expect(byVoter).toEqual({ b: "YES", c: "NO", d: "NO", e: "NO", a: "YES" });
  });
});

describe("Virgin", () => {
  const virginTable = (nominator: Player) =>
    dayGame([
      nominator,
      makePlayer("v", "VIRGIN"),
      makePlayer("c", "IMP"),
      makePlayer("d", "POISONER"),
      makePlayer("e", "SOLDIER")
    ]);

  it("executes a Townsfolk nominator and ends the day without a vote", async () => {
    const game = virginTable(makePlayer("a", "CHEF"));
    const endsDay = await runNomination(game.ctx, game.seat("a"), "v", "");

    expect(endsDay).toBe(true);
    expect(game.seat("a").alive).toBe(false);
    expect(game.ctx.log.byKind("VOTING")).toHaveLength(0);
    expect(game.ctx.log.byKind("EXECUTION").map(e => e.participants)).toEqual([["a"]]);
    expect(game.state.reminders.VIRGIN_POWER_USED).toEqual({ holder: "v", target: "v" });
    expect(game.providers.e.texts()).toEqual(["Storyteller: a has nominated v.", "Storyteller: a has been executed."]);
  });

  it("fires for a Spy, who registers as a Townsfolk", async () => {
    const game = virginTable(makePlayer("s", "SPY"));
    expect(await runNomination(game.ctx, game.seat("s"), "v", "")).toBe(true);
    expect(game.seat("s").alive).toBe(false);
  });

  it("spends the ability without effect for a Minion nominator", async () => {
    const game = virginTable(makePlayer("a", "SCARLET_WOMAN"));
    const endsDay = await runNomination(game.ctx, game.seat("a"), "v", "");
    expect(endsDay).toBe(false);
    expect(game.seat("a").alive).toBe(true);
    expect(game.state.reminders.VIRGIN_POWER_USED).toBeDefined();
    expect(game.ctx.log.byKind("VOTING")).toHaveLength(5);
  });

  it("does nothing when the Virgin is really the Drunk", async () => {
    const game = dayGame([
      makePlayer("a", "CHEF"),
      makePlayer("v", "DRUNK", { drunkCharacter: "VIRGIN" }),
      makePlayer("c", "IMP"),
      makePlayer("d", "POISONER"),
      makePlayer("e", "SOLDIER")
    ]);
    expect(await runNomination(game.ctx, game.seat("a"), "v", "")).toBe(false);
    expect(game.seat("a").alive).toBe(true);
    expect(game.ctx.log.byKind("VIRGIN_POWER").map(e => e.metadata.fired)).toEqual([false]);
  });
});

describe("formatVotes", () => {
  it("lists each ballot in order", () => {
    expect(
      formatVotes([
        { voter: "a", vote: "YES", publicReasoning: "" },
        { voter: "b", vote: "CANT_VOTE", publicReasoning: "" }
      ])
    ).toBe("a: yes, b: can't vote");
    expect(formatVotes([])).toBe("no votes");
  });
});
