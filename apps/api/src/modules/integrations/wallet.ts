import fs from "node:fs";

import { Keypair } from "@solana/web3.js";
import bs58 from "bs58";
import { z } from "zod";

const SecretKeyFileSchema = z.array(z.number().int().min(0).max(255)).length(64);

export type WalletSettings = {
  keypairPath?: string;
  walletSecretKey?: string;
};

/**
 * Loads the signing keypair from a solana-keygen JSON file, or from a base58 secret key.
 * Throws when neither is configured or the material is unreadable.
 */
export function loadKeypair(settings: WalletSettings): Keypair {
  if (settings.keypairPath) {
    const raw: unknown = JSON.parse(fs.readFileSync(settings.keypairPath, "utf-8"));
    const parsed = SecretKeyFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Keypair file ${settings.keypairPath} must hold a 64-byte JSON array.`);
    }
    return Keypair.fromSecretKey(Uint8Array.from(parsed.data));
  }

  if (settings.walletSecretKey) {
    return Keypair.fromSecretKey(bs58.decode(settings.walletSecretKey));
  }

  throw new Error("No wallet configured (set KEYPAIR_PATH or WALLET_SECRET_KEY).");
}
