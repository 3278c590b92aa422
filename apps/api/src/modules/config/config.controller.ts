import { BadRequestException, Body, Controller, Get, Put } from "@nestjs/common";
import type { MinerConfig } from "@ore-miner/shared";
import { RunOverridesSchema } from "@ore-miner/shared";

import { ConfigService } from "./config.service";

export type PublicConfig = {
  run: MinerConfig["run"];
  strategy: MinerConfig["strategy"];
  solana: {
    rpcConfigured: boolean;
    programId: string;
    commitment: MinerConfig["solana"]["commitment"];
    walletConfigured: boolean;
    walletAddress?: string;
  };
  autostart: boolean;
  apiKeyHint?: string;
};

export function toPublicConfig(config: MinerConfig): PublicConfig {
  const { solana } = config;
  return {
    run: config.run,
    strategy: config.strategy,
    solana: {
      rpcConfigured: Boolean(solana.rpcUrl),
      programId: solana.programId,
      commitment: solana.commitment,
      walletConfigured: Boolean(solana.keypairPath || solana.walletSecretKey),
      walletAddress: solana.walletAddress
    },
    autostart: config.autostart,
    apiKeyHint: config.apiKey?.slice(-6)
  };
}

@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get("public")
  getPublic(): PublicConfig {
    return toPublicConfig(this.configService.load());
  }

  @Put("run")
  updateRun(@Body() body: unknown): { ok: true; run: MinerConfig["run"] } {
    const parsed = RunOverridesSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "));
    }
    return { ok: true, run: this.configService.updateRun(parsed.data).run };
  }
}
