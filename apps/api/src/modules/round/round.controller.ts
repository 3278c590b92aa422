import { Controller, Get } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { RoundSnapshotService, type RoundSnapshotResult, type Tile } from "./round-snapshot.service";

export type RoundSnapshotResponse = {
  roundId: string;
  tiles: Tile[];
  motherlode: string;
  totalDeployed: string;
  fallback: boolean;
  accounts: number;
  decoded: number;
  skipped: number;
  fallbackReason?: string;
};

/** bigints go out as decimal strings; JSON has no 64-bit integers. */
export function toSnapshotResponse(result: RoundSnapshotResult): RoundSnapshotResponse {
  const { snapshot } = result;
  return {
    roundId: snapshot.roundId.toString(),
    tiles: snapshot.tiles,
    motherlode: snapshot.motherlode.toString(),
    totalDeployed: snapshot.totalDeployed.toString(),
    fallback: snapshot.fallback,
    accounts: result.accounts,
    decoded: result.decoded,
    skipped: result.skipped,
    ...(result.fallbackReason ? { fallbackReason: result.fallbackReason } : {})
  };
}

@Controller("round")
export class RoundController {
  constructor(
    private readonly configService: ConfigService,
    private readonly snapshots: RoundSnapshotService
  ) {}

  @Get("snapshot")
  async getSnapshot(): Promise<RoundSnapshotResponse> {
    const { programId } = this.configService.load().solana;
    return toSnapshotResponse(await this.snapshots.buildSnapshot(programId));
  }
}
