import { runGame } from "./engine/phases";
import { RandomProvider } from "./engine/providers";
import { createGame } from "./engine/setup";
import { createRandom } from "./engine/utils";

// Plays one bot-only game and prints the public log. Usage: npm run simulate -- [seed]

async function main(): Promise<void> {
  const seed = process.argv[2] ? Number(process.argv[2]) : Date.now() % 0x100000000;
  const ctx = createGame({ counts: { townsfolk: 5, outsiders: 1, minions: 1 }, seed });
  const botRandom = createRandom(seed + 1);
  for (const player of ctx.state.players) {
    ctx.providers[player.name] = new RandomProvider(createRandom(Math.floor(botRandom() * 0x100000000)));
  }

  ctx.log.subscribe(event => {
    if (event.visibility === "PUBLIC") console.log(`[${event.phase} ${event.round}] ${event.description}`);
  });

  console.log(`Seed ${seed}: ${ctx.state.players.map(p => `${p.name} (${p.character})`).join(", ")}`);
  const outcome = await runGame(ctx);
  console.log(`Winner: ${outcome.winner ?? "none"} (${outcome.reason ?? "unknown"}) after ${outcome.rounds} rounds`);
  console.log(`Deaths: ${outcome.statistics.deaths.join(", ") || "none"}`);
}

main().catch(err => {
  console.error("Simulation failed", err);
  process.exitCode = 1;
});
