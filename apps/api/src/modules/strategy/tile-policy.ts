import { TILE_COUNT } from "../round/round-decoder";

export type TileSelectionCheck = {
  tiles: number[];
  rejected: Array<{ tile: unknown; reason: string }>;
};

/**
 * Keeps the strategy's order and drops ids outside 1..25 or already chosen.
 */
export function checkTileSelection(tiles: readonly unknown[]): TileSelectionCheck {
  const seen = new Set<number>();
  const out: number[] = [];
  const rejected: TileSelectionCheck["rejected"] = [];

  for (const tile of tiles) {
    if (typeof tile !== "number" || !Number.isInteger(tile) || tile < 1 || tile > TILE_COUNT) {
      rejected.push({ tile, reason: `tile id outside 1..${TILE_COUNT}` });
      continue;
    }
    if (seen.has(tile)) {
      rejected.push({ tile, reason: "duplicate tile id" });
      continue;
    }
    seen.add(tile);
    out.push(tile);
  }

  return { tiles: out, rejected };
}
