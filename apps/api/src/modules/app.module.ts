import { Module } from "@nestjs/common";

import { ConfigModule } from "./config/config.module";
import { HealthModule } from "./health/health.module";
import { LedgerModule } from "./ledger/ledger.module";
import { MinerModule } from "./miner/miner.module";
import { RoundModule } from "./round/round.module";
import { SecurityModule } from "./security/security.module";

@Module({
  imports: [SecurityModule, HealthModule, ConfigModule, RoundModule, LedgerModule, MinerModule]
})
export class AppModule {}
