import { z } from "zod";

export const CONFIG_VERSION = 1 as const;

export const DEFAULT_ORE_PROGRAM_ID = "oreV3EG1i9BEgiAJ8b177Z2S2rMarzak4NMv1kULvWv";

export const CommitmentSchema = z.enum(["processed", "confirmed", "finalized"]);
export type Commitment = z.infer<typeof CommitmentSchema>;

/** Longest pause a Node timer can hold (2^31 - 1 ms), in whole seconds. */
export const MAX_SLEEP_SECONDS = 2_147_483;

export const RunSettingsSchema = z.object({
  dryRun: z.boolean().default(true),
  /** 0 means run until stopped. */
  rounds: z.number().int().min(0).default(0),
  sleepSeconds: z.number().max(MAX_SLEEP_SECONDS).default(5),
  unitAmountSol: z.number().positive().max(1_000).default(0.01)
});
export type RunSettings = z.infer<typeof RunSettingsSchema>;

export const StrategySettingsSchema = z.object({
  maxTilesPerRound: z.number().int().min(0).max(25).default(5),
  feeBps: z.number().int().min(0).max(10_000).default(1_000)
});
export type StrategySettings = z.infer<typeof StrategySettingsSchema>;

export const SolanaSettingsSchema = z.object({
  rpcUrl: z.string().url().optional(),
  programId: z.string().min(32).max(44).default(DEFAULT_ORE_PROGRAM_ID),
  commitment: CommitmentSchema.default("confirmed"),
  keypairPath: z.string().min(1).optional(),
  walletSecretKey: z.string().min(1).optional(),
  walletAddress: z.string().min(32).max(44).optional()
});
export type SolanaSettings = z.infer<typeof SolanaSettingsSchema>;

export const MinerConfigSchema = z.object({
  version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
  run: RunSettingsSchema.default({}),
  strategy: StrategySettingsSchema.default({}),
  solana: SolanaSettingsSchema.default({}),
  apiKey: z.string().min(16).optional(),
  ledgerFile: z.string().min(1).optional(),
  autostart: z.boolean().default(false)
});
export type MinerConfig = z.infer<typeof MinerConfigSchema>;

export const RunOverridesSchema = z.object({
  dryRun: z.boolean().optional(),
  rounds: z.number().int().min(0).optional(),
  sleepSeconds: z.number().max(MAX_SLEEP_SECONDS).optional(),
  unitAmountSol: z.number().positive().max(1_000).optional()
});
export type RunOverrides = z.infer<typeof RunOverridesSchema>;

export type RunOptions = {
  dryRun: boolean;
  /** null runs until stopped. */
  rounds: number | null;
  sleepMs: number;
  unitAmountSol: number;
};

export function resolveRunOptions(run: RunSettings, overrides: RunOverrides = {}): RunOptions {
  const rounds = overrides.rounds ?? run.rounds;
  const sleepSeconds = overrides.sleepSeconds ?? run.sleepSeconds;
  return {
    dryRun: overrides.dryRun ?? run.dryRun,
    rounds: rounds > 0 ? rounds : null,
    sleepMs: Number.isFinite(sleepSeconds) ? Math.round(Math.min(Math.max(0, sleepSeconds), MAX_SLEEP_SECONDS) * 1000) : 0,
    unitAmountSol: overrides.unitAmountSol ?? run.unitAmountSol
  };
}

export function defaultMinerConfig(): MinerConfig {
  return MinerConfigSchema.parse({});
}
