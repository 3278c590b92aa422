import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigService } from "./config.service";

describe("ConfigService", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "miner-config-"));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("uses defaults when there is no config file", () => {
    const service = new ConfigService({ DATA_DIR: dataDir });
    const config = service.load();

    expect(config.run.dryRun).toBe(true);
    expect(config.solana.rpcUrl).toBeUndefined();
    expect(service.ledgerPath).toBe(path.join(dataDir, "ledger.jsonl"));
  });

  it("layers environment variables over config.json", () => {
    fs.writeFileSync(
      path.join(dataDir, "config.json"),
      JSON.stringify({ run: { rounds: 3, sleepSeconds: 1 }, strategy: { maxTilesPerRound: 2 }, ledgerFile: "pnl.jsonl" })
    );

    const service = new ConfigService({
      DATA_DIR: dataDir,
      MINER_DRY_RUN: "false",
      MINER_ROUNDS: "7",
      MINER_SLEEP_SECONDS: "",
      SOLANA_RPC_URL: "http://127.0.0.1:8899",
      WALLET_ADDRESS: "  "
    });
    const config = service.load();

    expect(config.run).toEqual({ dryRun: false, rounds: 7, sleepSeconds: 1, unitAmountSol: 0.01 });
    expect(config.strategy.maxTilesPerRound).toBe(2);
    expect(config.solana.rpcUrl).toBe("http://127.0.0.1:8899");
    expect(config.solana.walletAddress).toBeUndefined();
    expect(service.ledgerPath).toBe(path.join(dataDir, "pnl.jsonl"));
  });

  it("persists run updates atomically", () => {
    const service = new ConfigService({ DATA_DIR: dataDir });
    const next = service.updateRun({ rounds: 12, dryRun: undefined });

    expect(next.run.rounds).toBe(12);
    expect(next.run.dryRun).toBe(true);
    expect(fs.existsSync(path.join(dataDir, "config.json.tmp"))).toBe(false);

    const reloaded = new ConfigService({ DATA_DIR: dataDir }).load();
    expect(reloaded.run.rounds).toBe(12);
  });
});
