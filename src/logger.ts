/**
 * Match logger: writes a structured JSON log + human-readable summary
 * to the runs/ directory after each match.
 */

import { writeFileSync, mkdirSync } from "fs";
import { join } from "path";
import type { Action, AgentId, AgentMeta, GameState, Grid } from "./types";
import { RULES } from "./types";
import type { GameEvent } from "./engine/events";
import { serializeGrid } from "./engine/grid";
import { agentInfo } from "./engine/observation";

export interface MatchLog {
  id: string;
  startedAt: string;
  endedAt?: string;
  config?: string;
  rules: typeof RULES;
  agents: AgentMeta[];
  layout: string;
  turns: TurnLog[];
  result: {
    winner: AgentId | null;
    totalTurns: number;
    reason: string;
  };
}

export interface TurnLog {
  turn: number;
  actions: { agent: AgentId; action: Action }[];
  events: GameEvent[];
  stateAfter: AgentSnapshot[];
}

interface AgentSnapshot {
  agent: AgentId;
  army: number;
  land: number;
  alive: boolean;
}

export interface GameLoggerOptions {
  config?: string;
  /** Effective land growth interval when the match overrides RULES */
  landGrowthInterval?: number;
  /** Output directory, defaults to runs/ */
  dir?: string;
}

export class GameLogger {
  private log: MatchLog;
  private currentTurn: TurnLog | null = null;
  private readonly dir: string;

  constructor(agents: AgentMeta[], grid: Grid, options: GameLoggerOptions = {}) {
    const now = new Date();
    this.dir = options.dir ?? "runs";
    this.log = {
      id: `${now.toISOString().replace(/[:.]/g, "-").slice(0, 19)}`,
      startedAt: now.toISOString(),
      config: options.config,
      rules: { ...RULES, landGrowthInterval: options.landGrowthInterval ?? RULES.landGrowthInterval },
      agents: agents.map((a) => ({ ...a })),
      layout: serializeGrid(grid),
      turns: [],
      result: { winner: null, totalTurns: 0, reason: "" },
    };
  }

  get data(): MatchLog {
    return this.log;
  }

  startTurn(turn: number) {
    this.currentTurn = { turn, actions: [], events: [], stateAfter: [] };
  }

  logAction(agent: AgentId, action: Action) {
    if (!this.currentTurn) return;
    this.currentTurn.actions.push({ agent, action });
  }

  /** Engine event listener */
  record(event: GameEvent) {
    if (!this.currentTurn) return;
    this.currentTurn.events.push(event);
  }

  endTurn(state: GameState) {
    if (!this.currentTurn) return;
    this.currentTurn.stateAfter = state.agents.map((agent) => {
      const info = agentInfo(state, agent);
      return { agent, army: info.army, land: info.land, alive: state.alive.includes(agent) };
    });
    this.log.turns.push(this.currentTurn);
    this.currentTurn = null;
  }

  /** Close the log and write it out; returns the base path (without extension) */
  finish(state: GameState, reason: string): string {
    this.log.endedAt = new Date().toISOString();
    this.log.result = {
      winner: state.winner ?? null,
      totalTurns: state.turn,
      reason,
    };
    return this.save();
  }

  private save(): string {
    mkdirSync(this.dir, { recursive: true });
    const base = join(this.dir, this.log.id);

    writeFileSync(`${base}.json`, JSON.stringify(this.log, null, 2));
    writeFileSync(`${base}.md`, renderSummary(this.log));
    console.error(`\n  [log] Saved: ${base}.json + ${base}.md`);
    return base;
  }
}

// === Summary ===

export function renderSummary(log: MatchLog): string {
  const lines: string[] = [];
  lines.push(`# Match Log — ${log.id}`);
  lines.push(`Config: ${log.config || "default"}`);
  lines.push(`Started: ${log.startedAt}`);
  lines.push(`Ended: ${log.endedAt ?? "-"}`);
  lines.push("");

  lines.push("## Agents");
  for (const a of log.agents) {
    lines.push(`- **${a.id}** (${a.name}) rgb(${a.color.join(", ")})`);
  }
  lines.push("");

  lines.push("## Map");
  lines.push("```");
  lines.push(log.layout);
  lines.push("```");
  lines.push("");

  lines.push("## Turns");
  for (const turn of log.turns) {
    const notable = turn.events.filter((e) => e.type !== "move_resolved" || e.outcome === "captured");
    if (notable.length === 0) continue;
    lines.push(`### Turn ${turn.turn}`);
    for (const e of notable) lines.push(`- ${describeEvent(e)}`);
    lines.push(
      `  State: ${turn.stateAfter.map((s) => `${s.agent} ${s.army}/${s.land}${s.alive ? "" : " ✗"}`).join(", ")}`,
    );
    lines.push("");
  }

  lines.push("## Result");
  lines.push(`**${log.result.winner === null ? "NO WINNER" : `${log.result.winner.toUpperCase()} WINS`}** — ${log.result.reason}`);
  lines.push(`Total turns: ${log.result.totalTurns}`);
  return lines.join("\n");
}

export function describeEvent(event: GameEvent): string {
  switch (event.type) {
    case "action_downgraded":
      return `${event.agent}: move (${event.from.row},${event.from.col}) ${event.direction} ignored (${event.reason})`;
    case "move_resolved":
      return `${event.agent}: (${event.from.row},${event.from.col}) → (${event.to.row},${event.to.col}) x${event.moved} ${event.outcome}`;
    case "agent_eliminated":
      return `${event.agent} eliminated by ${event.by} (${event.cellsTransferred} cells taken)`;
    case "game_end":
      return event.winner === null ? "game over, no winner" : `game over, ${event.winner} wins`;
  }
}
