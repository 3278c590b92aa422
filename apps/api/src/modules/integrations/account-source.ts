export const ACCOUNT_SOURCE = Symbol("ACCOUNT_SOURCE");

/**
 * Returns the raw `data` field of every account owned by a program. Rejects on transport failure.
 */
export interface AccountSource {
  fetchProgramAccounts(programId: string): Promise<unknown[]>;
}
