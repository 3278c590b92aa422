import type { RoundSnapshot } from "../round/round-snapshot.service";

/**
 * Pure decision functions. Implementations must be deterministic and must not perform I/O.
 */
export interface TileStrategy {
  pickTiles(snapshot: RoundSnapshot): number[];
  /** Estimated round profit in SOL; negative for an expected loss. */
  estimateProfit(snapshot: RoundSnapshot, tiles: number[]): number;
}

export type TileStrategyOptions = {
  maxTilesPerRound: number;
  unitAmountSol: number;
  feeBps: number;
};

export const TILE_STRATEGY_FACTORY = Symbol("TILE_STRATEGY_FACTORY");

/** Builds the strategy for one run, once its unit amount is known. */
export type TileStrategyFactory = (options: TileStrategyOptions) => TileStrategy;

const BOARD_TILES = 25;
const LAMPORT_PRECISION = 1_000_000_000;

function roundToLamports(sol: number): number {
  return Math.round(sol * LAMPORT_PRECISION) / LAMPORT_PRECISION;
}

/**
 * Stakes on the tiles with the least SOL on them, where a fixed stake buys the largest share of the pot.
 */
export class LeastCrowdedTileStrategy implements TileStrategy {
  constructor(private readonly options: TileStrategyOptions) {}

  pickTiles(snapshot: RoundSnapshot): number[] {
    if (this.options.maxTilesPerRound <= 0) return [];

    return [...snapshot.tiles]
      .sort((a, b) => a.solDeployed - b.solDeployed || a.tileId - b.tileId)
      .slice(0, this.options.maxTilesPerRound)
      .map((tile) => tile.tileId);
  }

  estimateProfit(snapshot: RoundSnapshot, tiles: number[]): number {
    const unit = this.options.unitAmountSol;
    const winChance = 1 / BOARD_TILES;
    const feeFactor = 1 - this.options.feeBps / 10_000;
    const poolSol = snapshot.tiles.reduce((sum, tile) => sum + tile.solDeployed, 0);

    let expected = 0;
    for (const tileId of tiles) {
      const tileSol = snapshot.tiles.find((tile) => tile.tileId === tileId)?.solDeployed ?? 0;
      const share = unit / (tileSol + unit);
      const winnings = share * (poolSol - tileSol) * feeFactor;
      expected += winChance * winnings - (1 - winChance) * unit;
    }

    return roundToLamports(expected);
  }
}
