import type { LedgerRecord } from "@ore-miner/shared";

export const LEDGER_SINK = Symbol("LEDGER_SINK");

/** Append-only. A rejected append loses that record only. */
export interface LedgerSink {
  append(record: LedgerRecord): Promise<void>;
}
