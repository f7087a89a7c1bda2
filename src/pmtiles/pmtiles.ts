import { IMetricsRepository, IStorageRepository } from '../interface';
import { NoopMetricsRepository } from '../repository';
import { ArchiveReadError, DirectoryParseError, HeaderParseError } from './errors';
import { Entry, Header, Metadata, TileCoordinate } from './types';
import { HEADER_SIZE_BYTES, bytesToHeader, decompress, deserializeIndex, findTile, tileIdToZxy, zxyToTileId } from './utils';

/** Root directory plus at most three levels of leaf directories. */
export const MAX_DIRECTORY_DEPTH = 4;

export interface PMTilesOptions {
  metrics?: IMetricsRepository;
}

function isMetadata(value: unknown): value is Metadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkRegions(header: Header, size: number) {
  const regions: [string, number, number][] = [
    ['root directory', header.rootDirectoryOffset, header.rootDirectoryLength],
    ['metadata', header.jsonMetadataOffset, header.jsonMetadataLength],
    ['leaf directories', header.leafDirectoryOffset, header.leafDirectoryLength],
    ['tile data', header.tileDataOffset, header.tileDataLength],
  ];
  for (const [name, offset, length] of regions) {
    if (offset + length > size) {
      throw new HeaderParseError(`Header places ${name} at ${offset}+${length}, past the end of the archive (${size})`);
    }
  }
}

/**
 * Read-only accessor for a PMTiles v3 archive.
 *
 * Only the header is kept; every lookup reads and decodes its directories again.
 */
export class PMTiles {
  private constructor(
    private source: IStorageRepository,
    private header: Readonly<Header>,
    private metrics: IMetricsRepository,
  ) {}

  /**
   * Reads and validates the header. The source is closed when this fails.
   */
  static async open(source: IStorageRepository, options: PMTilesOptions = {}): Promise<PMTiles> {
    let header: Header;
    try {
      header = await PMTiles.readHeader(source);
    } catch (e) {
      await source.close();
      throw e;
    }
    return new PMTiles(source, Object.freeze(header), options.metrics ?? new NoopMetricsRepository());
  }

  private static async readHeader(source: IStorageRepository): Promise<Header> {
    let headerData: Uint8Array;
    let size: number | undefined;
    try {
      headerData = await source.getRange({ offset: 0, length: HEADER_SIZE_BYTES });
      size = await source.getSize();
    } catch (e) {
      throw new HeaderParseError(`Could not read header of ${source.getKey()}`, { cause: e });
    }
    const header = bytesToHeader(headerData);
    if (size !== undefined) {
      checkRegions(header, size);
    }
    return header;
  }

  getHeader(): Readonly<Header> {
    return this.header;
  }

  private async readRange(offset: number, length: number): Promise<Uint8Array> {
    try {
      return await this.source.getRange({ offset, length });
    } catch (e) {
      throw new ArchiveReadError(
        `Could not read ${length} bytes at offset ${offset} of ${this.source.getKey()}`,
        { offset, length },
        { cause: e },
      );
    }
  }

  async getDirectory(offset: number, length: number): Promise<Entry[]> {
    const data = await this.readRange(offset, length);
    return deserializeIndex(decompress(data, this.header.internalCompression));
  }

  /**
   * Returns the tile bytes, or undefined when the archive holds nothing at that coordinate.
   */
  async getTile(z: number, x: number, y: number): Promise<Uint8Array | undefined> {
    const tileId = zxyToTileId(z, x, y);
    const header = this.header;

    if (z < header.minZoom || z > header.maxZoom) {
      return;
    }

    let offset = header.rootDirectoryOffset;
    let length = header.rootDirectoryLength;
    for (let depth = 0; depth < MAX_DIRECTORY_DEPTH; depth++) {
      const directory = await this.metrics.monitorAsyncFunction(
        { name: 'get_directory', tags: { depth: `${depth}` } },
        (dirOffset: number, dirLength: number) => this.getDirectory(dirOffset, dirLength),
      )(offset, length);
      const entry = findTile(directory, tileId);
      if (!entry) {
        return;
      }
      if (entry.runLength > 0) {
        return this.metrics.monitorAsyncFunction({ name: 'get_tile' }, (tileOffset: number, tileLength: number) =>
          this.readRange(tileOffset, tileLength),
        )(header.tileDataOffset + entry.offset, entry.length);
      }
      offset = header.leafDirectoryOffset + entry.offset;
      length = entry.length;
    }
    return;
  }

  async getMetadata(): Promise<Metadata> {
    const header = this.header;
    const data = await this.readRange(header.jsonMetadataOffset, header.jsonMetadataLength);
    const decompressed = decompress(data, header.internalCompression);
    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder('utf-8').decode(decompressed));
    } catch (e) {
      throw new DirectoryParseError('Archive metadata is not valid JSON', { cause: e });
    }
    if (!isMetadata(parsed)) {
      throw new DirectoryParseError('Archive metadata is not a JSON object');
    }
    return parsed;
  }

  /**
   * Lazily walks every directory, yielding the coordinate of each addressed tile in tile id order.
   * Leaf directories are read when the walk reaches them.
   */
  async *allTileCoordinates(): AsyncGenerator<TileCoordinate> {
    const header = this.header;
    const stack: { entries: Entry[]; index: number }[] = [
      { entries: await this.getDirectory(header.rootDirectoryOffset, header.rootDirectoryLength), index: 0 },
    ];
    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      if (top.index >= top.entries.length) {
        stack.pop();
        continue;
      }
      const entry = top.entries[top.index++];
      if (entry.runLength === 0) {
        stack.push({
          entries: await this.getDirectory(header.leafDirectoryOffset + entry.offset, entry.length),
          index: 0,
        });
        continue;
      }
      for (let tileId = entry.tileId; tileId < entry.tileId + entry.runLength; tileId++) {
        yield tileIdToZxy(tileId);
      }
    }
  }

  async close(): Promise<void> {
    await this.source.close();
  }
}
