import { z } from "zod";

export const LEDGER_RECORD_VERSION = 1 as const;

export const LedgerRecordSchema = z.object({
  version: z.literal(LEDGER_RECORD_VERSION),
  ts: z.string().min(1),
  roundNumber: z.number().int().min(1),
  /** u64 round id as a decimal string. */
  roundId: z.string().regex(/^\d+$/),
  chosenTiles: z.array(z.number().int().min(1).max(25)),
  roundProfit: z.number(),
  cumulativeProfit: z.number(),
  dryRun: z.boolean()
});
export type LedgerRecord = z.infer<typeof LedgerRecordSchema>;
