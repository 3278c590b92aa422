#!/usr/bin/env node
import "reflect-metadata";

import { NestFactory } from "@nestjs/core";

import { USAGE, parseCliArgs, type CliCommand } from "./cli-args";
import { AppModule } from "./modules/app.module";
import { createLogger, toNestLogger } from "./modules/logging/pino-logger";
import { MinerEngineService } from "./modules/miner/miner-engine.service";

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 2;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  const logger = createLogger();
  const app = await NestFactory.createApplicationContext(AppModule, { logger: false });
  app.useLogger(toNestLogger(logger));

  const engine = app.get(MinerEngineService);
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ msg: "Stopping after the current round", signal });
    engine.stop().catch((err: unknown) => logger.error({ msg: "Stop failed", err }));
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const summary = await engine.run(command.overrides);
    logger.info({ msg: "Mining finished", ...summary });
    return 0;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await app.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error(err);
    process.exit(1);
  }
);
