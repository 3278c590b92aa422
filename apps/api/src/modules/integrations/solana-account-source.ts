import { PublicKey, type Commitment, type Connection } from "@solana/web3.js";

import type { AccountSource } from "./account-source";

export class SolanaAccountSource implements AccountSource {
  constructor(
    private readonly connection: Connection,
    private readonly commitment: Commitment
  ) {}

  async fetchProgramAccounts(programId: string): Promise<unknown[]> {
    const accounts = await this.connection.getProgramAccounts(new PublicKey(programId), {
      commitment: this.commitment
    });
    return accounts.map(({ account }) => account.data);
  }
}
