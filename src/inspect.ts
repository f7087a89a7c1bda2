import { inspectArchive } from './archive-inspector';
import { createStorageRepository, loadConfig } from './config';
import { PMTiles } from './pmtiles/pmtiles';
import { ConsoleMetricsProvider, InfluxMetricsProvider, MetricsRepository } from './repository';

const handler = async () => {
  const config = loadConfig();
  const storageRepository = createStorageRepository(config.archive);
  const metricsRepository = new MetricsRepository(
    'pmtiles_inspect',
    [
      new ConsoleMetricsProvider(),
      new InfluxMetricsProvider(config.metrics.apiToken, config.environment, config.metrics.url),
    ],
    { environment: config.environment },
  );

  console.log('Opening', storageRepository.getKey());
  const pmTiles = await PMTiles.open(storageRepository, { metrics: metricsRepository });
  try {
    const summary = await inspectArchive(pmTiles, { verify: config.verifyTiles });
    const { header } = summary;
    console.log('Name', summary.name ?? '(unnamed)');
    console.log('Zoom range', `${header.minZoom}-${header.maxZoom}`);
    console.log('Bounds', [header.minLon, header.minLat, header.maxLon, header.maxLat].join(','));
    console.log('Tiles', summary.tileCount);
    for (const [z, count] of Object.entries(summary.tilesPerZoom)) {
      console.log(`  z${z}`, count);
    }
    if (config.verifyTiles) {
      console.log('Missing tiles', summary.missingTiles.length);
      for (const { z, x, y } of summary.missingTiles) {
        console.error('Missing', `${z}/${x}/${y}`);
      }
    }
  } finally {
    await pmTiles.close();
    await metricsRepository.flush();
  }
};

handler()
  .then(() => console.log('Done'))
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  });
