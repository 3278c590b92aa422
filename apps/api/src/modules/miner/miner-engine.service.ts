import crypto from "node:crypto";

import { Inject, Injectable, Logger, type OnApplicationShutdown, Optional } from "@nestjs/common";
import type {
  Decision,
  LedgerRecord,
  MinerPhase,
  MinerState,
  RoundOutcome,
  RunOptions,
  RunOverrides,
  TileDeployment
} from "@ore-miner/shared";
import { LEDGER_RECORD_VERSION, defaultMinerState, resolveRunOptions } from "@ore-miner/shared";

import { ConfigService } from "../config/config.service";
import { DEPLOYMENT_SINK, type DeployResult, type DeploymentSink } from "../integrations/deployment-sink";
import { LEDGER_SINK, type LedgerSink } from "../ledger/ledger-sink";
import { RoundSnapshotService, type RoundSnapshot } from "../round/round-snapshot.service";
import { checkTileSelection } from "../strategy/tile-policy";
import { TILE_STRATEGY_FACTORY, type TileStrategy, type TileStrategyFactory } from "../strategy/tile-strategy";

export type RunSummary = {
  roundsCompleted: number;
  cumulativeProfit: number;
  stoppedEarly: boolean;
};

type RoundContext = {
  roundNumber: number;
  options: RunOptions;
  strategy: TileStrategy;
  programId: string;
  cumulativeProfit: number;
};

type PreparedRun = {
  options: RunOptions;
  strategy: TileStrategy;
  programId: string;
  abortController: AbortController;
  finish: () => void;
};

const MAX_DECISIONS = 200;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Resolves after `ms`, or as soon as the signal aborts. */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

@Injectable()
export class MinerEngineService implements OnApplicationShutdown {
  private readonly logger = new Logger(MinerEngineService.name);
  private state: MinerState = defaultMinerState();
  private abortController: AbortController | null = null;
  private runFinished: Promise<void> | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly snapshots: RoundSnapshotService,
    @Inject(TILE_STRATEGY_FACTORY) private readonly strategyFactory: TileStrategyFactory,
    @Inject(LEDGER_SINK) private readonly ledger: LedgerSink,
    @Optional() @Inject(DEPLOYMENT_SINK) private readonly deploymentSink: DeploymentSink | null
  ) {}

  getState(): MinerState {
    return { ...this.state, decisions: [...this.state.decisions] };
  }

  isRunning(): boolean {
    return this.state.running;
  }

  /**
   * Starts a run in the background. Returns false when a run is already active.
   * Throws when the configuration cannot be loaded, before anything runs.
   */
  start(overrides: RunOverrides = {}): boolean {
    if (this.state.running) return false;

    const prepared = this.prepare(overrides);
    void this.loop(prepared).then(
      (summary) => {
        this.logger.log(`Run finished after ${summary.roundsCompleted} rounds | Total PnL: ${summary.cumulativeProfit.toFixed(4)}`);
      },
      (err: unknown) => {
        const message = errorMessage(err);
        this.logger.error(`Run aborted: ${message}`);
        this.patchState({ lastError: message });
      }
    );
    return true;
  }

  /**
   * Runs the loop until the round bound is reached or {@link stop} is called.
   */
  async run(overrides: RunOverrides = {}): Promise<RunSummary> {
    if (this.state.running) {
      throw new Error("A mining run is already in progress.");
    }
    return this.loop(this.prepare(overrides));
  }

  private prepare(overrides: RunOverrides): PreparedRun {
    const config = this.configService.load();
    const options = resolveRunOptions(config.run, overrides);
    const strategy = this.strategyFactory({ ...config.strategy, unitAmountSol: options.unitAmountSol });
    const abortController = new AbortController();
    this.abortController = abortController;

    let finish: () => void = () => undefined;
    this.runFinished = new Promise<void>((resolve) => {
      finish = () => resolve();
    });

    this.patchState({
      running: true,
      phase: "FETCHING",
      startedAt: new Date().toISOString(),
      dryRun: options.dryRun,
      roundsCompleted: 0,
      cumulativeProfit: 0,
      lastError: undefined,
      lastRound: undefined
    });
    this.addDecision(
      "ENGINE",
      `Run started (${options.dryRun ? "dry-run" : "live"}, ${options.rounds ?? "unlimited"} rounds, ${options.sleepMs} ms pacing)`
    );
    if (options.dryRun) {
      this.logger.log("Starting simulated mining loop");
    }

    return { options, strategy, programId: config.solana.programId, abortController, finish };
  }

  private async loop(run: PreparedRun): Promise<RunSummary> {
    const { options, strategy, programId, abortController } = run;
    let cumulativeProfit = 0;
    let roundNumber = 0;
    try {
      while (!abortController.signal.aborted && (options.rounds === null || roundNumber < options.rounds)) {
        roundNumber += 1;
        const outcome = await this.playRound({ roundNumber, options, strategy, programId, cumulativeProfit });
        cumulativeProfit = outcome.cumulativeProfit;
        this.patchState({ roundsCompleted: roundNumber, cumulativeProfit, lastRound: outcome });

        const moreRounds = options.rounds === null || roundNumber < options.rounds;
        if (moreRounds && options.sleepMs > 0 && !abortController.signal.aborted) {
          this.setPhase("PACING");
          await pause(options.sleepMs, abortController.signal);
        }
      }
    } finally {
      this.abortController = null;
      this.patchState({ running: false, phase: "STOPPED" });
      run.finish();
    }

    const stoppedEarly = abortController.signal.aborted && (options.rounds === null || roundNumber < options.rounds);
    this.addDecision("ENGINE", `Run ended after ${roundNumber} rounds (total PnL ${cumulativeProfit.toFixed(4)} SOL)`);
    return { roundsCompleted: roundNumber, cumulativeProfit, stoppedEarly };
  }

  /**
   * Ends the active run after its current round. Cancels any pacing wait.
   */
  async stop(): Promise<void> {
    const controller = this.abortController;
    if (!controller) return;

    this.addDecision("ENGINE", "Stop requested");
    controller.abort();
    await this.runFinished;
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  addDecision(kind: Decision["kind"], summary: Decision["summary"], details?: Decision["details"]): void {
    const decision: Decision = {
      id: crypto.randomUUID(),
      ts: new Date().toISOString(),
      kind,
      summary,
      ...(details ? { details } : {})
    };
    this.patchState({ decisions: [decision, ...this.state.decisions].slice(0, MAX_DECISIONS) });
  }

  private async playRound(ctx: RoundContext): Promise<RoundOutcome> {
    const { roundNumber, options, strategy } = ctx;

    this.setPhase("FETCHING");
    const scan = await this.snapshots.buildSnapshot(ctx.programId);
    const snapshot = scan.snapshot;
    this.addDecision(
      "SNAPSHOT",
      scan.fallbackReason
        ? `Round ${roundNumber}: fallback snapshot (${scan.fallbackReason})`
        : `Round ${roundNumber}: round #${snapshot.roundId} from ${scan.decoded} decoded accounts (${scan.skipped} skipped)`
    );

    this.setPhase("DECIDING");
    const chosenTiles = this.decide(snapshot, strategy);
    this.addDecision("DECISION", `Round ${roundNumber}: tiles [${chosenTiles.join(", ")}]`);

    this.setPhase("ACTING");
    const deployments = await this.act(chosenTiles, options);

    this.setPhase("RECORDING");
    const roundProfit = this.estimate(snapshot, chosenTiles, strategy);
    const cumulativeProfit = ctx.cumulativeProfit + roundProfit;
    this.logger.log(`[Round ${roundNumber}] Profit: ${roundProfit.toFixed(4)} | Total PnL: ${cumulativeProfit.toFixed(4)}`);

    const record: LedgerRecord = {
      version: LEDGER_RECORD_VERSION,
      ts: new Date().toISOString(),
      roundNumber,
      roundId: snapshot.roundId.toString(),
      chosenTiles,
      roundProfit,
      cumulativeProfit,
      dryRun: options.dryRun
    };
    const ledgerWritten = await this.record(record);

    return {
      roundNumber,
      roundId: record.roundId,
      fallback: snapshot.fallback,
      chosenTiles,
      deployments,
      roundProfit,
      cumulativeProfit,
      ledgerWritten
    };
  }

  private decide(snapshot: RoundSnapshot, strategy: TileStrategy): number[] {
    let picked: number[];
    try {
      picked = strategy.pickTiles(snapshot);
    } catch (err) {
      this.logger.error(`Strategy failed to pick tiles: ${errorMessage(err)}`);
      return [];
    }

    const checked = checkTileSelection(picked);
    for (const { tile, reason } of checked.rejected) {
      this.logger.warn(`Dropping tile ${String(tile)} from strategy output: ${reason}`);
    }
    return checked.tiles;
  }

  private estimate(snapshot: RoundSnapshot, tiles: number[], strategy: TileStrategy): number {
    try {
      const profit = strategy.estimateProfit(snapshot, tiles);
      if (Number.isFinite(profit)) return profit;
      this.logger.error(`Strategy returned a non-finite profit estimate (${profit}); recording 0`);
    } catch (err) {
      this.logger.error(`Strategy failed to estimate profit: ${errorMessage(err)}; recording 0`);
    }
    return 0;
  }

  private async act(tiles: number[], options: RunOptions): Promise<TileDeployment[]> {
    const amountSol = options.unitAmountSol;

    if (options.dryRun) {
      return tiles.map((tileId): TileDeployment => {
        this.logger.log(`[DRY-RUN] Would deploy tile ${tileId} with ${amountSol} SOL`);
        return { tileId, amountSol, status: "SIMULATED" };
      });
    }

    const sink = this.deploymentSink;
    if (!sink) {
      const reason = "Live deployment requested but no deployment sink is configured (set SOLANA_RPC_URL).";
      if (tiles.length > 0) {
        this.logger.error(reason);
        this.patchState({ lastError: reason });
        this.addDecision("DEPLOY", reason, { tiles });
      }
      return tiles.map((tileId): TileDeployment => ({ tileId, amountSol, status: "FAILED", reason }));
    }

    const deployments: TileDeployment[] = [];
    for (const tileId of tiles) {
      let result: DeployResult;
      try {
        result = await sink.deploy(tileId, amountSol);
      } catch (err) {
        result = { ok: false, reason: errorMessage(err) };
      }

      if (result.ok) {
        this.addDecision("DEPLOY", `Deployed ${amountSol} SOL on tile ${tileId}`, { signature: result.signature });
        deployments.push({ tileId, amountSol, status: "SENT", signature: result.signature });
      } else {
        this.logger.error(`Deploy on tile ${tileId} failed: ${result.reason}`);
        this.patchState({ lastError: result.reason });
        this.addDecision("DEPLOY", `Deploy on tile ${tileId} failed: ${result.reason}`);
        deployments.push({ tileId, amountSol, status: "FAILED", reason: result.reason });
      }
    }
    return deployments;
  }

  private async record(record: LedgerRecord): Promise<boolean> {
    try {
      await this.ledger.append(record);
      return true;
    } catch (err) {
      const message = `Ledger write failed for round ${record.roundNumber}: ${errorMessage(err)}`;
      this.logger.error(message);
      this.addDecision("LEDGER", message);
      return false;
    }
  }

  private setPhase(phase: MinerPhase): void {
    this.patchState({ phase });
  }

  private patchState(patch: Partial<MinerState>): void {
    this.state = { ...this.state, ...patch, updatedAt: new Date().toISOString() };
  }
}
