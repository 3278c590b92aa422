import { z } from "zod";

export const MINER_STATE_VERSION = 1 as const;

export const MinerPhaseSchema = z.enum(["STOPPED", "FETCHING", "DECIDING", "ACTING", "RECORDING", "PACING"]);
export type MinerPhase = z.infer<typeof MinerPhaseSchema>;

export const DecisionKindSchema = z.enum(["ENGINE", "SNAPSHOT", "DECISION", "DEPLOY", "LEDGER"]);
export type DecisionKind = z.infer<typeof DecisionKindSchema>;

export const DecisionSchema = z.object({
  id: z.string().min(1),
  ts: z.string().min(1),
  kind: DecisionKindSchema,
  summary: z.string().min(1),
  details: z.record(z.unknown()).optional()
});
export type Decision = z.infer<typeof DecisionSchema>;

export const TileDeploymentSchema = z.object({
  tileId: z.number().int().min(1).max(25),
  amountSol: z.number().positive(),
  status: z.enum(["SIMULATED", "SENT", "FAILED"]),
  signature: z.string().min(1).optional(),
  reason: z.string().min(1).optional()
});
export type TileDeployment = z.infer<typeof TileDeploymentSchema>;

export const RoundOutcomeSchema = z.object({
  roundNumber: z.number().int().min(1),
  roundId: z.string().regex(/^\d+$/),
  fallback: z.boolean(),
  chosenTiles: z.array(z.number().int().min(1).max(25)),
  deployments: z.array(TileDeploymentSchema),
  roundProfit: z.number(),
  cumulativeProfit: z.number(),
  ledgerWritten: z.boolean()
});
export type RoundOutcome = z.infer<typeof RoundOutcomeSchema>;

export const MinerStateSchema = z.object({
  version: z.literal(MINER_STATE_VERSION),
  startedAt: z.string().min(1).optional(),
  updatedAt: z.string().min(1),
  running: z.boolean(),
  phase: MinerPhaseSchema,
  dryRun: z.boolean(),
  roundsCompleted: z.number().int().min(0),
  cumulativeProfit: z.number(),
  lastError: z.string().optional(),
  lastRound: RoundOutcomeSchema.optional(),
  decisions: z.array(DecisionSchema)
});
export type MinerState = z.infer<typeof MinerStateSchema>;

export function defaultMinerState(): MinerState {
  return {
    version: MINER_STATE_VERSION,
    updatedAt: new Date().toISOString(),
    running: false,
    phase: "STOPPED",
    dryRun: true,
    roundsCompleted: 0,
    cumulativeProfit: 0,
    decisions: []
  };
}
