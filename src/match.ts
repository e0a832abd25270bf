import type { Action, ActionSet, AgentId, AgentMeta, GameState, Grid, Info } from "./types";
import type { MatchConfig } from "./config";
import { createAgent } from "./agent/agents";
import { createGame, isDone, observeAll, step } from "./engine/game";
import { generateGrid, parseGrid } from "./engine/grid";
import { GameLogger } from "./logger";
import { Replay } from "./replay/replay";

export interface MatchOptions {
  /** Where the match log goes; false disables it */
  logDir?: string | false;
  configPath?: string;
  onTurn?: (state: GameState, infos: Record<AgentId, Info>) => void;
}

export interface MatchResult {
  state: GameState;
  replay: Replay;
  winner: AgentId | null;
  turns: number;
  reason: string;
  logPath?: string;
}

export function buildGrid(config: MatchConfig): Grid {
  const agentCount = config.agents.length;
  if ("layout" in config.grid) return parseGrid(config.grid.layout, agentCount);
  return generateGrid({ ...config.grid, agentCount }, config.seed);
}

/** Play agents against each other until one is left or maxTurns runs out */
export function runMatch(config: MatchConfig, options: MatchOptions = {}): MatchResult {
  const grid = buildGrid(config);
  const agents = config.agents.map((spec, i) => createAgent(spec, i));
  const meta: AgentMeta[] = config.agents.map((spec, i) => ({
    id: spec.id,
    name: spec.name ?? spec.id,
    color: agents[i].color,
  }));

  const state = createGame(
    grid,
    agents.map((a) => a.id),
    { landGrowthInterval: config.landGrowthInterval },
  );
  const replay = new Replay({ grid, agents: meta, landGrowthInterval: config.landGrowthInterval });
  replay.addState(state);

  const logger =
    options.logDir === false
      ? null
      : new GameLogger(meta, grid, {
          config: options.configPath,
          dir: options.logDir,
          landGrowthInterval: config.landGrowthInterval,
        });

  for (const agent of agents) agent.reset();
  let observations = observeAll(state);

  while (!isDone(state) && state.turn < config.maxTurns) {
    logger?.startTurn(state.turn + 1);

    const actions: ActionSet = {};
    for (const agent of agents) {
      if (!state.alive.includes(agent.id)) continue;
      let action: Action;
      try {
        action = agent.play(observations[agent.id]);
      } catch (e) {
        console.error(`  [match] ${agent.id} failed to act, idling: ${e instanceof Error ? e.message : String(e)}`);
        action = { type: "idle" };
      }
      actions[agent.id] = action;
      logger?.logAction(agent.id, action);
    }

    const result = step(state, actions, {
      onEvent: (event) => logger?.record(event),
      replay,
    });
    observations = result.observations;
    logger?.endTurn(state);
    options.onTurn?.(state, result.infos);
  }

  const winner = isDone(state) ? (state.winner ?? null) : null;
  const reason = !isDone(state)
    ? `Turn limit of ${config.maxTurns} reached`
    : winner === null
      ? "All agents eliminated"
      : `${winner} captured every other general`;

  if (config.replayFile) replay.store(config.replayFile);
  const logPath = logger?.finish(state, reason);

  return { state, replay, winner, turns: state.turn, reason, logPath };
}
