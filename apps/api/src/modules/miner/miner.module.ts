import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { LedgerModule } from "../ledger/ledger.module";
import { RoundModule } from "../round/round.module";
import { StrategyModule } from "../strategy/strategy.module";
import { MinerController } from "./miner.controller";
import { MinerEngineService } from "./miner-engine.service";

@Module({
  imports: [ConfigModule, IntegrationsModule, RoundModule, StrategyModule, LedgerModule],
  controllers: [MinerController],
  providers: [MinerEngineService],
  exports: [MinerEngineService]
})
export class MinerModule {}
