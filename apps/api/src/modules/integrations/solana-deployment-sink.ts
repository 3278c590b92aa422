import { Logger } from "@nestjs/common";
import {
  LAMPORTS_PER_SOL,
  PublicKey,
  SystemProgram,
  Transaction,
  type Commitment,
  type Connection,
  type Keypair
} from "@solana/web3.js";

import type { DeployResult, DeploymentSink } from "./deployment-sink";
import { loadKeypair, type WalletSettings } from "./wallet";

export type SolanaDeploymentSettings = WalletSettings & {
  walletAddress?: string;
  commitment: Commitment;
};

export function solToLamports(amountSol: number): number {
  return Math.round(amountSol * LAMPORTS_PER_SOL);
}

/**
 * Sends one SOL transfer per deployment to the configured destination.
 */
export class SolanaDeploymentSink implements DeploymentSink {
  private readonly logger = new Logger(SolanaDeploymentSink.name);
  private keypair: Keypair | null = null;

  constructor(
    private readonly connection: Connection,
    private readonly settings: SolanaDeploymentSettings
  ) {}

  async deploy(tileId: number, amountSol: number): Promise<DeployResult> {
    if (!this.settings.walletAddress) {
      return { ok: false, reason: "No destination configured (set WALLET_ADDRESS)." };
    }

    try {
      const signer = this.signer();
      const lamports = solToLamports(amountSol);
      const tx = new Transaction().add(
        SystemProgram.transfer({
          fromPubkey: signer.publicKey,
          toPubkey: new PublicKey(this.settings.walletAddress),
          lamports
        })
      );

      tx.feePayer = signer.publicKey;
      const { blockhash } = await this.connection.getLatestBlockhash(this.settings.commitment);
      tx.recentBlockhash = blockhash;
      tx.sign(signer);

      const signature = await this.connection.sendRawTransaction(tx.serialize(), {
        skipPreflight: false,
        maxRetries: 3
      });
      this.logger.log(`Tile ${tileId}: sent ${lamports} lamports (${signature})`);
      return { ok: true, signature };
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }

  private signer(): Keypair {
    if (!this.keypair) {
      this.keypair = loadKeypair(this.settings);
    }
    return this.keypair;
  }
}
