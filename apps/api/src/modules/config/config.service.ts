import fs from "node:fs";
import path from "node:path";

import { Inject, Injectable, Optional } from "@nestjs/common";
import type { MinerConfig, RunOverrides } from "@ore-miner/shared";
import { MinerConfigSchema } from "@ore-miner/shared";

export const CONFIG_ENV = Symbol("CONFIG_ENV");

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["1", "true", "yes"].includes(value.toLowerCase());
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickDefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

@Injectable()
export class ConfigService {
  private cachedConfig: MinerConfig | null = null;
  private cachedMtimeMs: number | null = null;

  constructor(@Optional() @Inject(CONFIG_ENV) private readonly env: NodeJS.ProcessEnv = process.env) {}

  get dataDir(): string {
    return this.env.DATA_DIR ?? path.resolve(process.cwd(), "data");
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  get ledgerPath(): string {
    const ledgerFile = this.load().ledgerFile;
    if (!ledgerFile) return path.join(this.dataDir, "ledger.jsonl");
    return path.isAbsolute(ledgerFile) ? ledgerFile : path.join(this.dataDir, ledgerFile);
  }

  /**
   * config.json (when present) with environment variables layered on top.
   */
  load(): MinerConfig {
    const stored = this.readStored();
    const env = this.env;

    const merged = {
      ...stored,
      run: {
        ...stored.run,
        ...pickDefined({
          dryRun: envFlag(env.MINER_DRY_RUN),
          rounds: envNumber(env.MINER_ROUNDS),
          sleepSeconds: envNumber(env.MINER_SLEEP_SECONDS),
          unitAmountSol: envNumber(env.MINER_UNIT_AMOUNT_SOL)
        })
      },
      strategy: {
        ...stored.strategy,
        ...pickDefined({
          maxTilesPerRound: envNumber(env.MINER_MAX_TILES),
          feeBps: envNumber(env.MINER_FEE_BPS)
        })
      },
      solana: {
        ...stored.solana,
        ...pickDefined({
          rpcUrl: envString(env.SOLANA_RPC_URL),
          programId: envString(env.ORE_PROGRAM_ID),
          keypairPath: envString(env.KEYPAIR_PATH),
          walletSecretKey: envString(env.WALLET_SECRET_KEY),
          walletAddress: envString(env.WALLET_ADDRESS)
        })
      },
      ...pickDefined({
        apiKey: envString(env.MINER_API_KEY),
        ledgerFile: envString(env.MINER_LEDGER_FILE),
        autostart: envFlag(env.MINER_AUTOSTART)
      })
    };

    return MinerConfigSchema.parse(merged);
  }

  /** Persists run settings to config.json. Environment overrides still apply on the next load. */
  updateRun(patch: RunOverrides): MinerConfig {
    const stored = this.readStored();
    const next = MinerConfigSchema.parse({ ...stored, run: { ...stored.run, ...pickDefined(patch) } });
    this.save(next);
    return this.load();
  }

  save(config: MinerConfig): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.configPath, JSON.stringify(config, null, 2));
    this.cachedConfig = config;
    this.cachedMtimeMs = fs.statSync(this.configPath).mtimeMs;
  }

  private readStored(): MinerConfig {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return MinerConfigSchema.parse({});
    }

    const stat = fs.statSync(this.configPath);
    if (this.cachedConfig && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cachedConfig;
    }

    const raw: unknown = JSON.parse(fs.readFileSync(this.configPath, "utf-8"));
    const parsed = MinerConfigSchema.parse(isRecord(raw) ? raw : {});
    this.cachedConfig = parsed;
    this.cachedMtimeMs = stat.mtimeMs;
    return parsed;
  }
}
