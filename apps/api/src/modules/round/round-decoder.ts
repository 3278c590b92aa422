export const TILE_COUNT = 25;
export const ROUND_ACCOUNT_SIZE = 584;

const U64_BYTES = 8;
const KEY_BYTES = 32;
const U64_MAX = (1n << 64n) - 1n;

export type RoundState = {
  id: bigint;
  /** Lamports deployed per tile, index 0..24. */
  deployed: bigint[];
  slotHash: Uint8Array;
  /** Number of deployments per tile. */
  counts: bigint[];
  expiresAt: bigint;
  motherlode: bigint;
  rentPayer: Uint8Array;
  topMiner: Uint8Array;
  topMinerReward: bigint;
  totalDeployed: bigint;
  totalVaulted: bigint;
  totalWinnings: bigint;
};

export type RoundDecodeErrorCode = "TooShort" | "LayoutMismatch";

export type RoundDecodeResult =
  | { ok: true; round: RoundState }
  | { ok: false; code: RoundDecodeErrorCode; reason: string };

class ByteCursor {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get consumed(): number {
    return this.offset;
  }

  private claim(width: number): number {
    const start = this.offset;
    if (start + width > this.bytes.byteLength) {
      throw new RangeError(`read of ${width} bytes at offset ${start} exceeds ${this.bytes.byteLength}`);
    }
    this.offset += width;
    return start;
  }

  u64(): bigint {
    return this.view.getBigUint64(this.claim(U64_BYTES), true);
  }

  u64Array(length: number): bigint[] {
    const out: bigint[] = [];
    for (let i = 0; i < length; i++) {
      out.push(this.u64());
    }
    return out;
  }

  blob(width: number): Uint8Array {
    const start = this.claim(width);
    return new Uint8Array(this.bytes.subarray(start, start + width));
  }
}

/**
 * Decodes the first {@link ROUND_ACCOUNT_SIZE} bytes of a round account. Trailing bytes are ignored.
 */
export function decodeRoundState(data: Uint8Array): RoundDecodeResult {
  if (data.byteLength < ROUND_ACCOUNT_SIZE) {
    return {
      ok: false,
      code: "TooShort",
      reason: `expected at least ${ROUND_ACCOUNT_SIZE} bytes, got ${data.byteLength}`
    };
  }

  const cursor = new ByteCursor(data.subarray(0, ROUND_ACCOUNT_SIZE));
  try {
    const round: RoundState = {
      id: cursor.u64(),
      deployed: cursor.u64Array(TILE_COUNT),
      slotHash: cursor.blob(KEY_BYTES),
      counts: cursor.u64Array(TILE_COUNT),
      expiresAt: cursor.u64(),
      motherlode: cursor.u64(),
      rentPayer: cursor.blob(KEY_BYTES),
      topMiner: cursor.blob(KEY_BYTES),
      topMinerReward: cursor.u64(),
      totalDeployed: cursor.u64(),
      totalVaulted: cursor.u64(),
      totalWinnings: cursor.u64()
    };

    if (cursor.consumed !== ROUND_ACCOUNT_SIZE) {
      return {
        ok: false,
        code: "LayoutMismatch",
        reason: `layout consumed ${cursor.consumed} bytes instead of ${ROUND_ACCOUNT_SIZE}`
      };
    }

    return { ok: true, round };
  } catch (err) {
    return { ok: false, code: "LayoutMismatch", reason: err instanceof Error ? err.message : String(err) };
  }
}

function writeU64(view: DataView, offset: number, value: bigint, field: string): number {
  if (value < 0n || value > U64_MAX) {
    throw new RangeError(`${field} does not fit in u64: ${value}`);
  }
  view.setBigUint64(offset, value, true);
  return offset + U64_BYTES;
}

function writeU64Array(view: DataView, offset: number, values: bigint[], field: string): number {
  if (values.length !== TILE_COUNT) {
    throw new RangeError(`${field} must have ${TILE_COUNT} entries, got ${values.length}`);
  }
  let next = offset;
  for (const value of values) {
    next = writeU64(view, next, value, field);
  }
  return next;
}

function writeBlob(out: Uint8Array, offset: number, blob: Uint8Array, field: string): number {
  if (blob.byteLength !== KEY_BYTES) {
    throw new RangeError(`${field} must be ${KEY_BYTES} bytes, got ${blob.byteLength}`);
  }
  out.set(blob, offset);
  return offset + KEY_BYTES;
}

/**
 * Writes a round back into its on-chain layout. Throws RangeError on values the layout cannot hold.
 */
export function encodeRoundState(round: RoundState): Uint8Array {
  const out = new Uint8Array(ROUND_ACCOUNT_SIZE);
  const view = new DataView(out.buffer);

  let offset = writeU64(view, 0, round.id, "id");
  offset = writeU64Array(view, offset, round.deployed, "deployed");
  offset = writeBlob(out, offset, round.slotHash, "slotHash");
  offset = writeU64Array(view, offset, round.counts, "counts");
  offset = writeU64(view, offset, round.expiresAt, "expiresAt");
  offset = writeU64(view, offset, round.motherlode, "motherlode");
  offset = writeBlob(out, offset, round.rentPayer, "rentPayer");
  offset = writeBlob(out, offset, round.topMiner, "topMiner");
  offset = writeU64(view, offset, round.topMinerReward, "topMinerReward");
  offset = writeU64(view, offset, round.totalDeployed, "totalDeployed");
  offset = writeU64(view, offset, round.totalVaulted, "totalVaulted");
  writeU64(view, offset, round.totalWinnings, "totalWinnings");

  return out;
}

export function emptyRoundState(id: bigint): RoundState {
  return {
    id,
    deployed: new Array<bigint>(TILE_COUNT).fill(0n),
    slotHash: new Uint8Array(KEY_BYTES),
    counts: new Array<bigint>(TILE_COUNT).fill(0n),
    expiresAt: 0n,
    motherlode: 0n,
    rentPayer: new Uint8Array(KEY_BYTES),
    topMiner: new Uint8Array(KEY_BYTES),
    topMinerReward: 0n,
    totalDeployed: 0n,
    totalVaulted: 0n,
    totalWinnings: 0n
  };
}
