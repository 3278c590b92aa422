import { BadRequestException, Controller, Get, Query } from "@nestjs/common";
import type { LedgerRecord } from "@ore-miner/shared";
import { z } from "zod";

import { JsonlLedgerService } from "./jsonl-ledger.service";

const LimitSchema = z.coerce.number().int().min(1).max(1_000).default(50);

@Controller("ledger")
export class LedgerController {
  constructor(private readonly ledger: JsonlLedgerService) {}

  @Get()
  getTail(@Query("limit") limit: string | undefined): LedgerRecord[] {
    const parsed = LimitSchema.safeParse(limit);
    if (!parsed.success) {
      throw new BadRequestException("limit must be an integer between 1 and 1000.");
    }
    return this.ledger.readTail(parsed.data);
  }
}
