import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import { LAMPORTS_PER_SOL } from "@solana/web3.js";

import { ACCOUNT_SOURCE, type AccountSource } from "../integrations/account-source";
import { normalizeAccountData } from "./account-data";
import { TILE_COUNT, decodeRoundState, type RoundState } from "./round-decoder";

export type Tile = {
  tileId: number;
  solDeployed: number;
};

export type RoundSnapshot = {
  roundId: bigint;
  tiles: Tile[];
  /** Lamports. */
  motherlode: bigint;
  /** Lamports. */
  totalDeployed: bigint;
  fallback: boolean;
};

export type RoundSnapshotResult = {
  snapshot: RoundSnapshot;
  accounts: number;
  decoded: number;
  skipped: number;
  fallbackReason?: string;
};

type ScanFold = {
  rounds: RoundState[];
  skipped: number;
};

export function fallbackSnapshot(): RoundSnapshot {
  return {
    roundId: 0n,
    tiles: [{ tileId: 1, solDeployed: 0.1 }],
    motherlode: 0n,
    totalDeployed: 0n,
    fallback: true
  };
}

export function lamportsToSol(lamports: bigint): number {
  return Number(lamports) / LAMPORTS_PER_SOL;
}

/** Highest id wins; equal ids keep whichever was seen first. */
export function selectLatestRound(rounds: RoundState[]): RoundState | null {
  let latest: RoundState | null = null;
  for (const round of rounds) {
    if (!latest || round.id > latest.id) {
      latest = round;
    }
  }
  return latest;
}

export function toSnapshot(round: RoundState): RoundSnapshot {
  const tiles: Tile[] = [];
  for (let i = 0; i < TILE_COUNT; i++) {
    tiles.push({ tileId: i + 1, solDeployed: lamportsToSol(round.deployed[i] ?? 0n) });
  }
  return {
    roundId: round.id,
    tiles,
    motherlode: round.motherlode,
    totalDeployed: round.totalDeployed,
    fallback: false
  };
}

@Injectable()
export class RoundSnapshotService {
  private readonly logger = new Logger(RoundSnapshotService.name);

  constructor(@Optional() @Inject(ACCOUNT_SOURCE) private readonly accountSource: AccountSource | null) {}

  async buildSnapshot(programId: string): Promise<RoundSnapshotResult> {
    if (!this.accountSource) {
      return this.fallback(0, 0, "account source not configured");
    }

    let fetched: unknown;
    try {
      fetched = await this.accountSource.fetchProgramAccounts(programId);
    } catch (err) {
      const reason = `account fetch failed: ${err instanceof Error ? err.message : String(err)}`;
      this.logger.error(reason);
      return this.fallback(0, 0, reason);
    }
    if (!Array.isArray(fetched)) {
      const reason = "account source returned no account list";
      this.logger.error(reason);
      return this.fallback(0, 0, reason);
    }
    const accounts: unknown[] = fetched;

    const scan = accounts.reduce<ScanFold>(
      (acc, field, index) => {
        const normalized = normalizeAccountData(field);
        if (!normalized.ok) {
          this.logger.warn(`Skipping account #${index}: ${normalized.reason}`);
          acc.skipped += 1;
          return acc;
        }

        const decoded = decodeRoundState(normalized.bytes);
        if (!decoded.ok) {
          // Board, miner and treasury accounts share the program and are shorter than a round.
          const message = `Skipping account #${index}: ${decoded.code} (${decoded.reason})`;
          if (decoded.code === "TooShort") this.logger.debug(message);
          else this.logger.warn(message);
          acc.skipped += 1;
          return acc;
        }

        acc.rounds.push(decoded.round);
        return acc;
      },
      { rounds: [], skipped: 0 }
    );

    this.logger.log(`Parsed ${scan.rounds.length} round accounts (${scan.skipped} skipped of ${accounts.length}).`);

    const latest = selectLatestRound(scan.rounds);
    if (!latest) {
      return this.fallback(accounts.length, scan.skipped, "no round accounts decoded");
    }

    const snapshot = toSnapshot(latest);
    this.logger.log(
      `Round #${snapshot.roundId} | total_deployed=${lamportsToSol(snapshot.totalDeployed).toFixed(4)} SOL | motherlode=${lamportsToSol(
        snapshot.motherlode
      ).toFixed(4)} SOL`
    );

    return {
      snapshot,
      accounts: accounts.length,
      decoded: scan.rounds.length,
      skipped: scan.skipped
    };
  }

  private fallback(accounts: number, skipped: number, reason: string): RoundSnapshotResult {
    this.logger.warn(`Using fallback snapshot: ${reason}`);
    return {
      snapshot: fallbackSnapshot(),
      accounts,
      decoded: 0,
      skipped,
      fallbackReason: reason
    };
  }
}
