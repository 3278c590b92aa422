import { describe, expect, it } from "vitest";

import { ROUND_ACCOUNT_SIZE, TILE_COUNT, decodeRoundState, emptyRoundState, encodeRoundState, type RoundState } from "./round-decoder";

function sampleRound(): RoundState {
  const round = emptyRoundState(7n);
  return {
    ...round,
    deployed: round.deployed.map((_, i) => BigInt(i) * 1_000_000n),
    slotHash: new Uint8Array(32).fill(0xab),
    counts: round.counts.map((_, i) => BigInt(TILE_COUNT - i)),
    expiresAt: 312_000_123n,
    motherlode: 5_000_000_000n,
    rentPayer: new Uint8Array(32).fill(1),
    topMiner: new Uint8Array(32).fill(2),
    topMinerReward: 123_456n,
    totalDeployed: 300_000_000n,
    totalVaulted: 42n,
    totalWinnings: (1n << 64n) - 1n
  };
}

describe("round-decoder", () => {
  it("decodes the documented field offsets", () => {
    const bytes = new Uint8Array(ROUND_ACCOUNT_SIZE);
    const view = new DataView(bytes.buffer);
    view.setBigUint64(0, 7n, true);
    view.setBigUint64(8, 1_000_000_000n, true);
    // expires_at follows id, deployed, slot_hash and counts
    view.setBigUint64(8 + 200 + 32 + 200, 99n, true);
    view.setBigUint64(8 + 200 + 32 + 200 + 8, 5_000_000_000n, true);
    view.setBigUint64(ROUND_ACCOUNT_SIZE - 8, 11n, true);

    const result = decodeRoundState(bytes);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.round.id).toBe(7n);
    expect(result.round.deployed[0]).toBe(1_000_000_000n);
    expect(result.round.deployed.slice(1).every((v) => v === 0n)).toBe(true);
    expect(result.round.expiresAt).toBe(99n);
    expect(result.round.motherlode).toBe(5_000_000_000n);
    expect(result.round.totalWinnings).toBe(11n);
  });

  it("restores every field after encoding", () => {
    const round = sampleRound();
    const encoded = encodeRoundState(round);

    expect(encoded.byteLength).toBe(ROUND_ACCOUNT_SIZE);
    expect(decodeRoundState(encoded)).toEqual({ ok: true, round });
  });

  it("ignores trailing padding", () => {
    const round = sampleRound();
    const padded = new Uint8Array(ROUND_ACCOUNT_SIZE + 40).fill(0xff);
    padded.set(encodeRoundState(round));

    expect(decodeRoundState(padded)).toEqual({ ok: true, round });
  });

  it("decodes a view into a larger buffer without reading outside it", () => {
    const round = sampleRound();
    const backing = new Uint8Array(ROUND_ACCOUNT_SIZE + 16).fill(0xee);
    backing.set(encodeRoundState(round), 16);

    expect(decodeRoundState(backing.subarray(16))).toEqual({ ok: true, round });
  });

  it("rejects blobs shorter than the layout", () => {
    for (const length of [0, 1, 8, 583]) {
      const result = decodeRoundState(new Uint8Array(length));
      expect(result).toEqual({
        ok: false,
        code: "TooShort",
        reason: `expected at least 584 bytes, got ${length}`
      });
    }
  });

  it("refuses to encode values outside the layout", () => {
    expect(() => encodeRoundState({ ...sampleRound(), id: -1n })).toThrow(RangeError);
    expect(() => encodeRoundState({ ...sampleRound(), deployed: [1n] })).toThrow("deployed must have 25 entries, got 1");
    expect(() => encodeRoundState({ ...sampleRound(), topMiner: new Uint8Array(31) })).toThrow(RangeError);
  });
});
