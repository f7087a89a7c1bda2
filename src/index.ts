export { PMTiles, MAX_DIRECTORY_DEPTH } from './pmtiles/pmtiles';
export type { PMTilesOptions } from './pmtiles/pmtiles';
export { Compression, TileType } from './pmtiles/types';
export type { Entry, Header, Metadata, TileCoordinate, VectorLayer } from './pmtiles/types';
export {
  HEADER_SIZE_BYTES,
  MAX_ZOOM,
  bytesToHeader,
  decompress,
  deserializeIndex,
  findTile,
  readVarint,
  tileIdToZxy,
  zxyToTileId,
} from './pmtiles/utils';
export {
  ArchiveReadError,
  DecompressionError,
  DirectoryParseError,
  HeaderParseError,
  InvalidTileIdError,
  PMTilesError,
} from './pmtiles/errors';
export type { PMTilesErrorCode } from './pmtiles/errors';
export {
  ConsoleMetricsProvider,
  FileStorageRepository,
  InfluxMetricsProvider,
  Metric,
  MetricsRepository,
  NoopMetricsRepository,
  S3StorageRepository,
} from './repository';
export type { ByteRange, IMetricsProviderRepository, IMetricsRepository, IStorageRepository } from './interface';
export { createStorageRepository, loadConfig } from './config';
export type { Config } from './config';
export { inspectArchive } from './archive-inspector';
export type { InspectOptions, InspectSummary } from './archive-inspector';
