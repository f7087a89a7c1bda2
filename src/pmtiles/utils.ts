import { gunzipSync } from 'fflate';
import { decompress as zstdDecompress } from 'fzstd';
import { brotliDecompressSync } from 'node:zlib';
import { crc32 } from './crc32';
import { DecompressionError, DirectoryParseError, HeaderParseError, InvalidTileIdError } from './errors';
import { Compression, Entry, Header, TileCoordinate } from './types';

export const HEADER_SIZE_BYTES = 127;
export const MAX_ZOOM = 26;

const MAGIC = [0x50, 0x4d, 0x54, 0x69, 0x6c, 0x65, 0x73]; // "PMTiles"

// First tile id of each zoom level, the last value is the first id past MAX_ZOOM.
const tileZoomValues: number[] = [
  0, 1, 5, 21, 85, 341, 1365, 5461, 21845, 87381, 349525, 1398101, 5592405, 22369621, 89478485, 357913941, 1431655765,
  5726623061, 22906492245, 91625968981, 366503875925, 1466015503701, 5864062014805, 23456248059221, 93824992236885,
  375299968947541, 1501199875790165, 6004799503160661,
];

function rotate(n: number, xy: number[], rx: number, ry: number): void {
  if (ry === 0) {
    if (rx === 1) {
      xy[0] = n - 1 - xy[0];
      xy[1] = n - 1 - xy[1];
    }
    const t = xy[0];
    xy[0] = xy[1];
    xy[1] = t;
  }
}

function isTileIndex(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Convert Z,X,Y to a Hilbert TileID.
 */
export function zxyToTileId(z: number, x: number, y: number): number {
  if (!isTileIndex(z) || z > MAX_ZOOM) {
    throw new InvalidTileIdError(`Tile zoom level ${z} outside supported range 0-${MAX_ZOOM}`);
  }
  if (!isTileIndex(x) || !isTileIndex(y) || x > 2 ** z - 1 || y > 2 ** z - 1) {
    throw new InvalidTileIdError(`Tile ${z}/${x}/${y} outside zoom level bounds`);
  }

  const acc = tileZoomValues[z];
  const n = 2 ** z;
  let rx = 0;
  let ry = 0;
  let d = 0;
  const xy = [x, y];
  let s = n / 2;
  while (s > 0) {
    rx = (xy[0] & s) > 0 ? 1 : 0;
    ry = (xy[1] & s) > 0 ? 1 : 0;
    d += s * s * ((3 * rx) ^ ry);
    rotate(s, xy, rx, ry);
    s = s / 2;
  }
  return acc + d;
}

function idOnLevel(z: number, pos: number): TileCoordinate {
  const n = 2 ** z;
  const xy = [0, 0];
  let t = pos;
  let s = 1;
  // positions go up to 4^26, past the 32 bits bitwise operators work on
  while (s < n) {
    const rx = Math.floor(t / 2) % 2;
    const ry = (t % 2) ^ rx;
    rotate(s, xy, rx, ry);
    xy[0] += s * rx;
    xy[1] += s * ry;
    t = Math.floor(t / 4);
    s *= 2;
  }
  return { z, x: xy[0], y: xy[1] };
}

/**
 * Convert a Hilbert TileID back to Z,X,Y.
 */
export function tileIdToZxy(tileId: number): TileCoordinate {
  if (!isTileIndex(tileId)) {
    throw new InvalidTileIdError(`Tile id ${tileId} is not a non-negative integer`);
  }
  for (let z = 0; z <= MAX_ZOOM; z++) {
    if (tileId < tileZoomValues[z + 1]) {
      return idOnLevel(z, tileId - tileZoomValues[z]);
    }
  }
  throw new InvalidTileIdError(`Tile id ${tileId} exceeds max zoom level (${MAX_ZOOM})`);
}

export interface BufferPosition {
  buf: Uint8Array;
  pos: number;
}

function readByte(bufferPosition: BufferPosition): number {
  if (bufferPosition.pos >= bufferPosition.buf.length) {
    throw new DirectoryParseError('Unexpected end of directory data');
  }
  return bufferPosition.buf[bufferPosition.pos++];
}

function toNum(low: number, high: number): number {
  const h = high >>> 0;
  const l = low >>> 0;
  if (h > 0x200000 || (h === 0x200000 && l !== 0)) {
    throw new DirectoryParseError('Varint exceeds 2^53');
  }
  return h * 0x100000000 + l;
}

function readVarintRemainder(lowBits: number, bufferPosition: BufferPosition): number {
  let byte = readByte(bufferPosition);
  let highBits = (byte & 0x70) >> 4;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x7f) << 3;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x7f) << 10;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x7f) << 17;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x7f) << 24;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x01) << 31;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  throw new DirectoryParseError('Expected varint not more than 10 bytes');
}

export function readVarint(bufferPosition: BufferPosition): number {
  let byte = readByte(bufferPosition);
  let val = byte & 0x7f;
  if (byte < 0x80) {
    return val;
  }
  byte = readByte(bufferPosition);
  val |= (byte & 0x7f) << 7;
  if (byte < 0x80) {
    return val;
  }
  byte = readByte(bufferPosition);
  val |= (byte & 0x7f) << 14;
  if (byte < 0x80) {
    return val;
  }
  byte = readByte(bufferPosition);
  val |= (byte & 0x7f) << 21;
  if (byte < 0x80) {
    return val;
  }
  // the fifth byte is split between the low and high words, the remainder reads it again
  byte = readByte(bufferPosition);
  bufferPosition.pos--;
  val |= (byte & 0x0f) << 28;

  return readVarintRemainder(val, bufferPosition);
}

/**
 * Decode a serialized (already decompressed) directory into its entries, sorted by tile id.
 */
export function deserializeIndex(buffer: Uint8Array): Entry[] {
  const p = { buf: buffer, pos: 0 };
  const numEntries = readVarint(p);

  const entries: Entry[] = [];

  let lastId = 0;
  for (let i = 0; i < numEntries; i++) {
    const v = readVarint(p);
    entries.push({ tileId: lastId + v, offset: 0, length: 0, runLength: 1 });
    lastId += v;
  }

  for (let i = 0; i < numEntries; i++) {
    entries[i].runLength = readVarint(p);
  }

  for (let i = 0; i < numEntries; i++) {
    entries[i].length = readVarint(p);
  }

  for (let i = 0; i < numEntries; i++) {
    const v = readVarint(p);
    if (v === 0 && i > 0) {
      entries[i].offset = entries[i - 1].offset + entries[i - 1].length;
    } else {
      entries[i].offset = v - 1;
    }
  }

  return entries;
}

/**
 * Low-level function for looking up a TileID or leaf directory inside a directory.
 *
 * An exact match wins. Otherwise the closest entry below the id is returned when it is a
 * leaf directory (which covers everything up to the next entry) or when its run covers the id.
 */
export function findTile(entries: Entry[], tileId: number): Entry | undefined {
  let m = 0;
  let n = entries.length - 1;
  while (m <= n) {
    const k = (n + m) >> 1;
    const cmp = tileId - entries[k].tileId;
    if (cmp > 0) {
      m = k + 1;
    } else if (cmp < 0) {
      n = k - 1;
    } else {
      return entries[k];
    }
  }

  // at this point, m > n
  if (n >= 0) {
    if (entries[n].runLength === 0) {
      return entries[n];
    }
    if (tileId - entries[n].tileId < entries[n].runLength) {
      return entries[n];
    }
  }
  return;
}

export function getUint64(v: DataView, offset: number): number {
  const wh = v.getUint32(offset + 4, true);
  const wl = v.getUint32(offset + 0, true);
  return wh * 2 ** 32 + wl;
}

/**
 * Parse raw header bytes into a Header object.
 */
export function bytesToHeader(buff: Uint8Array): Header {
  if (buff.length < HEADER_SIZE_BYTES) {
    throw new HeaderParseError(`Header needs ${HEADER_SIZE_BYTES} bytes, got ${buff.length}`);
  }
  if (MAGIC.some((byte, i) => buff[i] !== byte)) {
    throw new HeaderParseError('Wrong magic number for PMTiles archive');
  }
  const v = new DataView(buff.buffer, buff.byteOffset, buff.byteLength);
  const specVersion = v.getUint8(7);
  if (specVersion !== 3) {
    throw new HeaderParseError(`Archive is spec version ${specVersion} but this code only supports version 3`);
  }

  return {
    specVersion: specVersion,
    rootDirectoryOffset: getUint64(v, 8),
    rootDirectoryLength: getUint64(v, 16),
    jsonMetadataOffset: getUint64(v, 24),
    jsonMetadataLength: getUint64(v, 32),
    leafDirectoryOffset: getUint64(v, 40),
    leafDirectoryLength: getUint64(v, 48),
    tileDataOffset: getUint64(v, 56),
    tileDataLength: getUint64(v, 64),
    numAddressedTiles: getUint64(v, 72),
    numTileEntries: getUint64(v, 80),
    numTileContents: getUint64(v, 88),
    clustered: v.getUint8(96) === 1,
    internalCompression: v.getUint8(97),
    tileCompression: v.getUint8(98),
    tileType: v.getUint8(99),
    minZoom: v.getUint8(100),
    maxZoom: v.getUint8(101),
    minLon: v.getInt32(102, true) / 10000000,
    minLat: v.getInt32(106, true) / 10000000,
    maxLon: v.getInt32(110, true) / 10000000,
    maxLat: v.getInt32(114, true) / 10000000,
    centerZoom: v.getUint8(118),
    centerLon: v.getInt32(119, true) / 10000000,
    centerLat: v.getInt32(123, true) / 10000000,
  };
}

// gunzipSync does not look at the trailer, so the CRC32 and ISIZE are checked here
function gunzipChecked(buf: Uint8Array): Uint8Array {
  const result = gunzipSync(buf);
  const trailer = new DataView(buf.buffer, buf.byteOffset + buf.length - 8, 8);
  if (trailer.getUint32(0, true) !== crc32(result)) {
    throw new Error('gzip CRC32 mismatch');
  }
  if (trailer.getUint32(4, true) !== result.length % 2 ** 32) {
    throw new Error('gzip size mismatch');
  }
  return result;
}

export function decompress(buf: Uint8Array, compression: Compression): Uint8Array {
  if (compression === Compression.None || compression === Compression.Unknown) {
    return buf;
  }
  try {
    switch (compression) {
      case Compression.Gzip: {
        return gunzipChecked(buf);
      }
      case Compression.Brotli: {
        return brotliDecompressSync(buf);
      }
      case Compression.Zstd: {
        return zstdDecompress(buf);
      }
    }
  } catch (e) {
    throw new DecompressionError(`Could not decompress ${Compression[compression]} block`, { cause: e });
  }
  throw new DecompressionError(`Compression method ${compression} not supported`);
}
