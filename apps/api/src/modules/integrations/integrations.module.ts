import { Module } from "@nestjs/common";
import { Connection } from "@solana/web3.js";

import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { ACCOUNT_SOURCE, type AccountSource } from "./account-source";
import { DEPLOYMENT_SINK, type DeploymentSink } from "./deployment-sink";
import { SolanaAccountSource } from "./solana-account-source";
import { SolanaDeploymentSink } from "./solana-deployment-sink";

export const SOLANA_CONNECTION = Symbol("SOLANA_CONNECTION");

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: SOLANA_CONNECTION,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Connection | null => {
        const { rpcUrl, commitment } = configService.load().solana;
        return rpcUrl ? new Connection(rpcUrl, commitment) : null;
      }
    },
    {
      provide: ACCOUNT_SOURCE,
      inject: [SOLANA_CONNECTION, ConfigService],
      useFactory: (connection: Connection | null, configService: ConfigService): AccountSource | null =>
        connection ? new SolanaAccountSource(connection, configService.load().solana.commitment) : null
    },
    {
      provide: DEPLOYMENT_SINK,
      inject: [SOLANA_CONNECTION, ConfigService],
      useFactory: (connection: Connection | null, configService: ConfigService): DeploymentSink | null => {
        if (!connection) return null;
        const { keypairPath, walletSecretKey, walletAddress, commitment } = configService.load().solana;
        return new SolanaDeploymentSink(connection, { keypairPath, walletSecretKey, walletAddress, commitment });
      }
    }
  ],
  exports: [ACCOUNT_SOURCE, DEPLOYMENT_SINK]
})
export class IntegrationsModule {}
