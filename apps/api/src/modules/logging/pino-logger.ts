import fs from "node:fs";
import path from "node:path";

import type { LoggerService } from "@nestjs/common";
import pino from "pino";

export function createLogger(): pino.Logger {
  const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), "data");
  const logDir = process.env.LOG_DIR ?? path.join(dataDir, "logs");
  fs.mkdirSync(logDir, { recursive: true });

  const destination = pino.destination({
    dest: path.join(logDir, "miner.log"),
    sync: false
  });

  return pino(
    {
      level: process.env.LOG_LEVEL ?? "info",
      base: undefined
    },
    pino.multistream([{ stream: process.stdout }, { stream: destination }])
  );
}

/** Routes Nest's Logger calls into pino. */
export function toNestLogger(logger: pino.Logger): LoggerService {
  return {
    log: (message: unknown, context?: string) => logger.info({ context, msg: message }),
    error: (message: unknown, trace?: string, context?: string) => logger.error({ context, msg: message, trace }),
    warn: (message: unknown, context?: string) => logger.warn({ context, msg: message }),
    debug: (message: unknown, context?: string) => logger.debug({ context, msg: message }),
    verbose: (message: unknown, context?: string) => logger.trace({ context, msg: message })
  };
}
