import { Module } from "@nestjs/common";

import { LeastCrowdedTileStrategy, TILE_STRATEGY_FACTORY, type TileStrategyFactory } from "./tile-strategy";

const leastCrowded: TileStrategyFactory = (options) => new LeastCrowdedTileStrategy(options);

@Module({
  providers: [{ provide: TILE_STRATEGY_FACTORY, useValue: leastCrowded }],
  exports: [TILE_STRATEGY_FACTORY]
})
export class StrategyModule {}
