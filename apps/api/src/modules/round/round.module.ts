import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { RoundController } from "./round.controller";
import { RoundSnapshotService } from "./round-snapshot.service";

@Module({
  imports: [ConfigModule, IntegrationsModule],
  controllers: [RoundController],
  providers: [RoundSnapshotService],
  exports: [RoundSnapshotService]
})
export class RoundModule {}
