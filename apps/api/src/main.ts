import "reflect-metadata";

import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { json } from "express";
import pinoHttp from "pino-http";

import { AppModule } from "./modules/app.module";
import { ConfigService } from "./modules/config/config.service";
import { createLogger, toNestLogger } from "./modules/logging/pino-logger";
import { MinerEngineService } from "./modules/miner/miner-engine.service";

async function bootstrap(): Promise<void> {
  const logger = createLogger();

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: false
  });

  app.use(json({ limit: "1mb" }));
  app.use(pinoHttp({ logger }));
  app.useLogger(toNestLogger(logger));
  app.enableShutdownHooks();

  const config = app.get(ConfigService).load();
  if (config.autostart) {
    app.get(MinerEngineService).start();
    logger.info({ msg: "Mining loop autostarted", dryRun: config.run.dryRun });
  }

  const port = Number.parseInt(process.env.PORT ?? "8148", 10);
  await app.listen(port, "0.0.0.0");

  logger.info({ msg: "API listening", port });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
