import { z } from "zod/v4";
import { readFileSync } from "fs";
import { ActionSchema, PositionSchema } from "./engine/events";
import { RULES } from "./types";

const Color = z.tuple([z.int().min(0).max(255), z.int().min(0).max(255), z.int().min(0).max(255)]);
const Seed = z.union([z.int(), z.string()]);

const AgentBase = {
  id: z.string().min(1),
  name: z.string().optional(),
  color: Color.optional(),
};

const AgentSpecSchema = z.discriminatedUnion("kind", [
  z.object({
    ...AgentBase,
    kind: z.literal("random"),
    idleProbability: z.number().min(0).max(1).optional(),
    splitProbability: z.number().min(0).max(1).optional(),
    seed: Seed.optional(),
  }),
  z.object({ ...AgentBase, kind: z.literal("expander"), seed: Seed.optional() }),
  z.object({ ...AgentBase, kind: z.literal("scripted"), actions: z.array(ActionSchema) }),
]);

export type AgentSpec = z.infer<typeof AgentSpecSchema>;

const GridSpecSchema = z.union([
  z.object({ layout: z.string().min(1) }),
  z.object({
    rows: z.int().min(1).default(RULES.generator.rows),
    cols: z.int().min(1).default(RULES.generator.cols),
    mountainDensity: z.number().min(0).max(1).default(RULES.generator.mountainDensity),
    cityDensity: z.number().min(0).max(1).default(RULES.generator.cityDensity),
    generals: z.array(PositionSchema).optional(),
  }),
]);

export const MatchConfig = z.object({
  seed: Seed.default(0),
  maxTurns: z.int().min(1).default(500),
  landGrowthInterval: z.int().min(1).default(RULES.landGrowthInterval),
  grid: GridSpecSchema.default({
    rows: RULES.generator.rows,
    cols: RULES.generator.cols,
    mountainDensity: RULES.generator.mountainDensity,
    cityDensity: RULES.generator.cityDensity,
  }),
  agents: z
    .array(AgentSpecSchema)
    .min(1)
    .refine((agents) => new Set(agents.map((a) => a.id)).size === agents.length, {
      message: "Agent ids must be unique",
    }),
  replayFile: z.string().optional(),
});

export type MatchConfig = z.infer<typeof MatchConfig>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parseMatchConfig(raw: unknown): MatchConfig {
  const result = MatchConfig.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new ConfigError(`Invalid match config: ${issues.join("; ")}`);
  }
  return result.data;
}

export function loadMatchConfig(path: string): MatchConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new ConfigError(`Cannot read match config ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseMatchConfig(raw);
}
