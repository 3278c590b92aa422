import { describe, expect, it, vi } from "vitest";

import type { AccountSource } from "../integrations/account-source";
import { emptyRoundState, encodeRoundState, type RoundState } from "./round-decoder";
import { RoundSnapshotService, fallbackSnapshot, selectLatestRound } from "./round-snapshot.service";

const PROGRAM_ID = "oreV3EG1i9BEgiAJ8b177Z2S2rMarzak4NMv1kULvWv";

function roundWith(id: bigint, patch: Partial<RoundState> = {}): RoundState {
  return { ...emptyRoundState(id), ...patch };
}

function asBase64Pair(round: RoundState): [string, string] {
  return [Buffer.from(encodeRoundState(round)).toString("base64"), "base64"];
}

function sourceOf(accounts: unknown[]): AccountSource {
  return { fetchProgramAccounts: vi.fn(async () => accounts) };
}

describe("round-snapshot selection", () => {
  it("picks the highest id regardless of order", () => {
    const rounds = [roundWith(3n), roundWith(11n), roundWith(5n)];
    const orders = [rounds, [...rounds].reverse(), [rounds[1], rounds[0], rounds[2]]];
    for (const order of orders) {
      expect(selectLatestRound(order)?.id).toBe(11n);
    }
    expect(selectLatestRound([])).toBeNull();
  });
});

describe("RoundSnapshotService", () => {
  it("builds the snapshot of the latest round", async () => {
    const deployed = emptyRoundState(0n).deployed.map((_, i) => (i === 0 ? 1_000_000_000n : 0n));
    const latest = roundWith(7n, { deployed, motherlode: 5_000_000_000n, totalDeployed: 1_000_000_000n });
    const source = sourceOf([asBase64Pair(roundWith(6n)), asBase64Pair(latest)]);

    const service = new RoundSnapshotService(source);
    const result = await service.buildSnapshot(PROGRAM_ID);

    expect(source.fetchProgramAccounts).toHaveBeenCalledWith(PROGRAM_ID);
    expect(result.accounts).toBe(2);
    expect(result.decoded).toBe(2);
    expect(result.skipped).toBe(0);
    expect(result.fallbackReason).toBeUndefined();
    expect(result.snapshot.roundId).toBe(7n);
    expect(result.snapshot.fallback).toBe(false);
    expect(result.snapshot.motherlode).toBe(5_000_000_000n);
    expect(result.snapshot.totalDeployed).toBe(1_000_000_000n);
    expect(result.snapshot.tiles).toHaveLength(25);
    expect(result.snapshot.tiles[0]).toEqual({ tileId: 1, solDeployed: 1 });
    expect(result.snapshot.tiles.slice(1)).toEqual(
      Array.from({ length: 24 }, (_, i) => ({ tileId: i + 2, solDeployed: 0 }))
    );
  });

  it("accepts every known data shape in one scan", async () => {
    const source = sourceOf([
      encodeRoundState(roundWith(1n)),
      asBase64Pair(roundWith(2n)),
      { data: asBase64Pair(roundWith(3n)), executable: false }
    ]);

    const result = await new RoundSnapshotService(source).buildSnapshot(PROGRAM_ID);

    expect(result.decoded).toBe(3);
    expect(result.snapshot.roundId).toBe(3n);
  });

  it("skips one malformed account and keeps the rest", async () => {
    const source = sourceOf([
      asBase64Pair(roundWith(4n)),
      { unexpected: true },
      asBase64Pair(roundWith(9n)),
      ["%%%", "base64"],
      new Uint8Array(100)
    ]);

    const result = await new RoundSnapshotService(source).buildSnapshot(PROGRAM_ID);

    expect(result.accounts).toBe(5);
    expect(result.decoded).toBe(2);
    expect(result.skipped).toBe(3);
    expect(result.snapshot.roundId).toBe(9n);
  });

  it("falls back when nothing decodes", async () => {
    const result = await new RoundSnapshotService(sourceOf([new Uint8Array(10), 12])).buildSnapshot(PROGRAM_ID);

    expect(result.snapshot).toEqual(fallbackSnapshot());
    expect(result.snapshot.roundId).toBe(0n);
    expect(result.snapshot.tiles).toEqual([{ tileId: 1, solDeployed: 0.1 }]);
    expect(result.skipped).toBe(2);
    expect(result.fallbackReason).toBe("no round accounts decoded");
  });

  it("falls back on transport failure", async () => {
    const source: AccountSource = {
      fetchProgramAccounts: vi.fn(async () => {
        throw new Error("connect ECONNREFUSED");
      })
    };

    const result = await new RoundSnapshotService(source).buildSnapshot(PROGRAM_ID);

    expect(result.snapshot.fallback).toBe(true);
    expect(result.fallbackReason).toBe("account fetch failed: connect ECONNREFUSED");
  });

  it("falls back when the source resolves to something other than a list", async () => {
    const source: AccountSource = { fetchProgramAccounts: async () => JSON.parse("null") };

    const result = await new RoundSnapshotService(source).buildSnapshot(PROGRAM_ID);

    expect(result.snapshot.fallback).toBe(true);
    expect(result.snapshot.tiles).toEqual([{ tileId: 1, solDeployed: 0.1 }]);
    expect(result.fallbackReason).toBe("account source returned no account list");
  });

  it("falls back when no account source is configured", async () => {
    const result = await new RoundSnapshotService(null).buildSnapshot(PROGRAM_ID);

    expect(result.snapshot.roundId).toBe(0n);
    expect(result.fallbackReason).toBe("account source not configured");
  });
});
