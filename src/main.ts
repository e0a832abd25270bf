import { loadMatchConfig, parseMatchConfig } from "./config";
import type { MatchConfig } from "./config";
import { runMatch } from "./match";

// Usage: tsx src/main.ts [config.json] [--replay out.json] [--seed n] [--no-log]

function argValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

const DEFAULT_CONFIG = {
  agents: [
    { id: "red", kind: "random" },
    { id: "blue", kind: "expander" },
  ],
};

function main() {
  const flagValues = new Set(["--replay", "--seed"].map(argValue));
  const configPath = process.argv
    .slice(2)
    .find((a) => !a.startsWith("--") && !flagValues.has(a));

  let config: MatchConfig = configPath ? loadMatchConfig(configPath) : parseMatchConfig(DEFAULT_CONFIG);
  const replayFile = argValue("--replay");
  const seed = argValue("--seed");
  config = {
    ...config,
    replayFile: replayFile ?? config.replayFile,
    seed: seed === undefined ? config.seed : /^-?\d+$/.test(seed) ? Number(seed) : seed,
  };

  console.log(`\n  Config: ${configPath ?? "default (random vs expander)"}`);
  console.log(`  Agents: ${config.agents.map((a) => `${a.id} (${a.kind})`).join(" · ")}`);
  console.log(`  Seed:   ${config.seed}\n`);

  const result = runMatch(config, {
    logDir: process.argv.includes("--no-log") ? false : "runs",
    configPath,
    onTurn: (state, infos) => {
      if (state.turn % 50 !== 0 && state.phase === "play") return;
      const summary = state.agents
        .map((id) => `${id} ${infos[id].army}/${infos[id].land}`)
        .join("  ");
      console.log(`  turn ${String(state.turn).padStart(4)}  ${summary}`);
    },
  });

  console.log(`\n  ${result.winner === null ? "No winner" : `${result.winner.toUpperCase()} WINS`} — ${result.reason}`);
  console.log(`  Turns: ${result.turns}`);
}

try {
  main();
} catch (e) {
  console.error("Fatal:", e);
  process.exit(1);
}
