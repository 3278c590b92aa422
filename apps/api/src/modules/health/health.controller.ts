import { Controller, Get } from "@nestjs/common";

import { MinerEngineService } from "../miner/miner-engine.service";

@Controller("health")
export class HealthController {
  constructor(private readonly engine: MinerEngineService) {}

  @Get()
  getHealth(): { ok: true; ts: string; mining: boolean } {
    return { ok: true, ts: new Date().toISOString(), mining: this.engine.isRunning() };
  }
}
