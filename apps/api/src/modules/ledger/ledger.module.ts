import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { JsonlLedgerService } from "./jsonl-ledger.service";
import { LedgerController } from "./ledger.controller";
import { LEDGER_SINK } from "./ledger-sink";

@Module({
  imports: [ConfigModule],
  controllers: [LedgerController],
  providers: [
    {
      provide: JsonlLedgerService,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => new JsonlLedgerService(configService.ledgerPath)
    },
    { provide: LEDGER_SINK, useExisting: JsonlLedgerService }
  ],
  exports: [LEDGER_SINK, JsonlLedgerService]
})
export class LedgerModule {}
