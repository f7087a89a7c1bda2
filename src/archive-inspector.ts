import pLimit from 'p-limit';
import { PMTiles } from './pmtiles/pmtiles';
import { Header, TileCoordinate } from './pmtiles/types';

export type InspectOptions = {
  verify?: boolean;
  concurrency?: number;
};

export type InspectSummary = {
  header: Readonly<Header>;
  name: string | undefined;
  tileCount: number;
  tilesPerZoom: Record<number, number>;
  missingTiles: TileCoordinate[];
};

/**
 * Walks every addressed tile of an archive and, with `verify`, reads each one back through the
 * single-tile lookup. Verification stops at the first failed lookup and rethrows its error.
 */
export async function inspectArchive(pmtiles: PMTiles, options: InspectOptions = {}): Promise<InspectSummary> {
  const { verify = false, concurrency = 10 } = options;
  const header = pmtiles.getHeader();
  const metadata = await pmtiles.getMetadata();
  const limit = pLimit(concurrency);

  const tilesPerZoom: Record<number, number> = {};
  const missingTiles: TileCoordinate[] = [];
  const inFlight = new Set<Promise<void>>();
  const failures: unknown[] = [];
  // how many enumerated tiles may wait for a check before the walk pauses
  const maxQueued = concurrency * 4;
  let tileCount = 0;

  for await (const coord of pmtiles.allTileCoordinates()) {
    if (failures.length > 0) {
      break;
    }
    tileCount++;
    tilesPerZoom[coord.z] = (tilesPerZoom[coord.z] ?? 0) + 1;
    if (!verify) {
      continue;
    }
    const check = limit(async () => {
      const tile = await pmtiles.getTile(coord.z, coord.x, coord.y);
      if (!tile) {
        missingTiles.push(coord);
      }
    })
      .catch((e: unknown) => {
        failures.push(e);
      })
      .finally(() => {
        inFlight.delete(check);
      });
    inFlight.add(check);
    while (inFlight.size >= maxQueued) {
      await Promise.race(inFlight);
    }
  }
  await Promise.all(inFlight);
  if (failures.length > 0) {
    throw failures[0];
  }

  return { header, name: metadata.name, tileCount, tilesPerZoom, missingTiles };
}
