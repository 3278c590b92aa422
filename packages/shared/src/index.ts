export * from "./schemas/ledger";
export * from "./schemas/miner-config";
export * from "./schemas/miner-state";
