import { gzipSync } from 'fflate';
import { ByteRange, IStorageRepository } from '../src/interface';
import { Compression, Entry } from '../src/pmtiles/types';

export function writeVarint(value: number, out: number[]) {
  let v = value;
  while (v >= 0x80) {
    out.push((v % 0x80) | 0x80);
    v = Math.floor(v / 0x80);
  }
  out.push(v);
}

export function serializeIndex(entries: Entry[]): Uint8Array {
  const out: number[] = [];
  writeVarint(entries.length, out);
  let lastId = 0;
  for (const entry of entries) {
    writeVarint(entry.tileId - lastId, out);
    lastId = entry.tileId;
  }
  for (const entry of entries) {
    writeVarint(entry.runLength, out);
  }
  for (const entry of entries) {
    writeVarint(entry.length, out);
  }
  entries.forEach((entry, i) => {
    const previous = entries[i - 1];
    if (i > 0 && entry.offset === previous.offset + previous.length) {
      writeVarint(0, out);
    } else {
      writeVarint(entry.offset + 1, out);
    }
  });
  return Uint8Array.from(out);
}

function concat(parts: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

function setUint64(v: DataView, offset: number, value: number) {
  v.setUint32(offset, value % 2 ** 32, true);
  v.setUint32(offset + 4, Math.floor(value / 2 ** 32), true);
}

export type Range = { offset: number; length: number };

/**
 * Assembles a small archive in memory: header, root directory, metadata, leaf directories, tile data.
 * Leaves referencing other leaves must be added deepest first.
 */
export class ArchiveBuilder {
  private leaves: Uint8Array[] = [];
  private leavesLength = 0;
  private tiles: Uint8Array[] = [];
  private tilesLength = 0;

  constructor(private compression: Compression = Compression.None) {}

  private compress(data: Uint8Array): Uint8Array {
    return this.compression === Compression.Gzip ? gzipSync(data) : data;
  }

  addTile(content: string): Range {
    const bytes = new TextEncoder().encode(content);
    const range = { offset: this.tilesLength, length: bytes.length };
    this.tiles.push(bytes);
    this.tilesLength += bytes.length;
    return range;
  }

  addLeaf(entries: Entry[]): Range {
    const bytes = this.compress(serializeIndex(entries));
    const range = { offset: this.leavesLength, length: bytes.length };
    this.leaves.push(bytes);
    this.leavesLength += bytes.length;
    return range;
  }

  build(
    root: Entry[],
    options: { minZoom?: number; maxZoom?: number; metadata?: object } = {},
  ): Uint8Array {
    const { minZoom = 0, maxZoom = 2, metadata = { name: 'test' } } = options;
    const rootBytes = this.compress(serializeIndex(root));
    const metadataBytes = this.compress(new TextEncoder().encode(JSON.stringify(metadata)));
    const leafBytes = concat(this.leaves);
    const tileBytes = concat(this.tiles);

    const header = new Uint8Array(127);
    header.set([0x50, 0x4d, 0x54, 0x69, 0x6c, 0x65, 0x73, 3]);
    const v = new DataView(header.buffer);
    const rootOffset = header.length;
    const metadataOffset = rootOffset + rootBytes.length;
    const leafOffset = metadataOffset + metadataBytes.length;
    const tileOffset = leafOffset + leafBytes.length;
    setUint64(v, 8, rootOffset);
    setUint64(v, 16, rootBytes.length);
    setUint64(v, 24, metadataOffset);
    setUint64(v, 32, metadataBytes.length);
    setUint64(v, 40, leafOffset);
    setUint64(v, 48, leafBytes.length);
    setUint64(v, 56, tileOffset);
    setUint64(v, 64, tileBytes.length);
    setUint64(v, 72, 0);
    setUint64(v, 80, 0);
    setUint64(v, 88, this.tiles.length);
    v.setUint8(96, 1);
    v.setUint8(97, this.compression);
    v.setUint8(98, Compression.None);
    v.setUint8(99, 1);
    v.setUint8(100, minZoom);
    v.setUint8(101, maxZoom);
    v.setInt32(102, -1800000000, true);
    v.setInt32(106, -850000000, true);
    v.setInt32(110, 1800000000, true);
    v.setInt32(114, 850000000, true);
    v.setUint8(118, minZoom);
    v.setInt32(119, 0, true);
    v.setInt32(123, 0, true);

    return concat([header, rootBytes, metadataBytes, leafBytes, tileBytes]);
  }
}

/** Builds the two-level archive shared by the reader tests: ids 0-2 share tile "a", ids 3-4 live in a leaf as "b". */
export function buildSmallArchive(compression: Compression = Compression.None, maxZoom = 2): Uint8Array {
  const builder = new ArchiveBuilder(compression);
  const a = builder.addTile('a');
  const b = builder.addTile('b');
  const leaf = builder.addLeaf([{ tileId: 3, runLength: 2, ...b }]);
  return builder.build(
    [
      { tileId: 0, runLength: 3, ...a },
      { tileId: 3, runLength: 0, ...leaf },
    ],
    { maxZoom },
  );
}

export class MemoryStorageRepository implements IStorageRepository {
  reads: ByteRange[] = [];
  failReads = false;
  closeCount = 0;

  constructor(private data: Uint8Array) {}

  async getRange(range: ByteRange): Promise<Uint8Array> {
    this.reads.push(range);
    if (this.failReads) {
      throw new Error('disk on fire');
    }
    if (range.offset + range.length > this.data.length) {
      throw new Error(`Range ${range.offset}+${range.length} outside ${this.data.length} bytes`);
    }
    return this.data.slice(range.offset, range.offset + range.length);
  }

  async getSize(): Promise<number> {
    return this.data.length;
  }

  getKey(): string {
    return 'memory';
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}
