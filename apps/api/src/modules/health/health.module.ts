import { Module } from "@nestjs/common";

import { MinerModule } from "../miner/miner.module";
import { HealthController } from "./health.controller";

@Module({
  imports: [MinerModule],
  controllers: [HealthController]
})
export class HealthModule {}
