import { z } from "zod/v4";

export const REPLAY_VERSION = 1;

// === Primitives ===

const Channel = z.int().min(0);
const Color = z.tuple([Channel.max(255), Channel.max(255), Channel.max(255)]);

const AgentMetaSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  color: Color,
});

// === Snapshot ===

export const SnapshotSchema = z.object({
  turn: z.int().min(0),
  army: z.array(z.array(z.int().min(0))),
  /** Agent index, null = neutral */
  owner: z.array(z.array(z.int().min(0).nullable())),
  alive: z.array(z.string()),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

// === Replay File ===

export const ReplayFile = z.object({
  version: z.int(),
  createdAt: z.string(),
  grid: z.object({
    rows: z.int().min(1),
    cols: z.int().min(1),
    /** Text encoding, see engine/grid.ts */
    layout: z.string(),
  }),
  agents: z.array(AgentMetaSchema).min(1),
  landGrowthInterval: z.int().min(1),
  snapshots: z.array(SnapshotSchema),
});

export type ReplayFile = z.infer<typeof ReplayFile>;
