import { BadRequestException, Body, Controller, Get, Post } from "@nestjs/common";
import type { MinerState } from "@ore-miner/shared";
import { RunOverridesSchema } from "@ore-miner/shared";

import { MinerEngineService } from "./miner-engine.service";

@Controller("miner")
export class MinerController {
  constructor(private readonly engine: MinerEngineService) {}

  @Get("status")
  getStatus(): MinerState {
    return this.engine.getState();
  }

  @Post("start")
  start(@Body() body: unknown): { ok: true; started: boolean } {
    const parsed = RunOverridesSchema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "));
    }
    try {
      return { ok: true, started: this.engine.start(parsed.data) };
    } catch (err) {
      throw new BadRequestException(`Run could not start: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  @Post("stop")
  async stop(): Promise<{ ok: true }> {
    await this.engine.stop();
    return { ok: true };
  }

  @Get("decisions")
  getDecisions(): MinerState["decisions"] {
    return this.engine.getState().decisions;
  }
}
