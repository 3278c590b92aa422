import fs from "node:fs";
import path from "node:path";

import type { LedgerRecord } from "@ore-miner/shared";
import { LedgerRecordSchema } from "@ore-miner/shared";

import type { LedgerSink } from "./ledger-sink";

/** Torn or foreign lines come back as undefined. */
function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

export class JsonlLedgerService implements LedgerSink {
  constructor(readonly filePath: string) {}

  async append(record: LedgerRecord): Promise<void> {
    const line = JSON.stringify(LedgerRecordSchema.parse(record));
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.appendFile(this.filePath, `${line}\n`, { encoding: "utf-8" });
  }

  readTail(maxItems: number): LedgerRecord[] {
    if (maxItems <= 0 || !fs.existsSync(this.filePath)) return [];

    const lines = fs
      .readFileSync(this.filePath, "utf-8")
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);

    const parsed: LedgerRecord[] = [];
    for (const line of lines.slice(Math.max(0, lines.length - maxItems))) {
      const result = LedgerRecordSchema.safeParse(parseJsonLine(line));
      if (result.success) parsed.push(result.data);
    }
    return parsed;
  }
}
