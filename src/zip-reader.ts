/**
 * Minimal ZIP reader for EPUB and FB2.ZIP containers.
 * Reads the central directory from an in-memory buffer; supports stored and
 * deflated entries, which is all e-book containers use.
 */

import zlib from 'zlib';

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_ENTRY_SIGNATURE = 0x02014b50;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const EOCD_MIN_SIZE = 22;
const MAX_COMMENT_SIZE = 0xffff;

interface ZipEntry {
  name: string;
  compressedSize: number;
  uncompressedSize: number;
  compressionMethod: number;
  localHeaderOffset: number;
}

export class ZipReader {
  private readonly buffer: Buffer;
  private readonly entries = new Map<string, ZipEntry>();

  constructor(buffer: Buffer) {
    this.buffer = buffer;
    this._readCentralDirectory();
  }

  getEntryNames(): string[] {
    return Array.from(this.entries.keys());
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  readEntry(name: string): Buffer {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Entry not found: ${name}`);
    }

    const offset = entry.localHeaderOffset;
    if (this.buffer.readUInt32LE(offset) !== LOCAL_HEADER_SIGNATURE) {
      throw new Error(`Invalid local file header for ${name}`);
    }

    const fileNameLength = this.buffer.readUInt16LE(offset + 26);
    const extraFieldLength = this.buffer.readUInt16LE(offset + 28);
    const dataStart = offset + 30 + fileNameLength + extraFieldLength;
    const data = this.buffer.subarray(dataStart, dataStart + entry.compressedSize);

    if (entry.compressionMethod === 0) {
      return Buffer.from(data);
    }
    if (entry.compressionMethod === 8) {
      return zlib.inflateRawSync(data);
    }
    throw new Error(`Unsupported compression method ${entry.compressionMethod} for ${name}`);
  }

  readText(name: string): string {
    return this.readEntry(name).toString('utf8');
  }

  private _readCentralDirectory(): void {
    const buf = this.buffer;
    if (buf.length < EOCD_MIN_SIZE) {
      throw new Error('Not a ZIP archive: file too small');
    }

    // End of central directory record sits in the last 22 + comment bytes
    const searchFloor = Math.max(0, buf.length - EOCD_MIN_SIZE - MAX_COMMENT_SIZE);
    let eocd = -1;
    for (let i = buf.length - EOCD_MIN_SIZE; i >= searchFloor; i--) {
      if (buf.readUInt32LE(i) === EOCD_SIGNATURE) {
        eocd = i;
        break;
      }
    }
    if (eocd === -1) {
      throw new Error('Not a ZIP archive: end of central directory not found');
    }

    const entryCount = buf.readUInt16LE(eocd + 10);
    let offset = buf.readUInt32LE(eocd + 16);

    for (let i = 0; i < entryCount; i++) {
      if (buf.readUInt32LE(offset) !== CENTRAL_ENTRY_SIGNATURE) {
        throw new Error('Invalid central directory entry');
      }

      const compressionMethod = buf.readUInt16LE(offset + 10);
      const compressedSize = buf.readUInt32LE(offset + 20);
      const uncompressedSize = buf.readUInt32LE(offset + 24);
      const fileNameLength = buf.readUInt16LE(offset + 28);
      const extraFieldLength = buf.readUInt16LE(offset + 30);
      const commentLength = buf.readUInt16LE(offset + 32);
      const localHeaderOffset = buf.readUInt32LE(offset + 42);
      const name = buf.toString('utf8', offset + 46, offset + 46 + fileNameLength);

      this.entries.set(name, { name, compressedSize, uncompressedSize, compressionMethod, localHeaderOffset });

      offset += 46 + fileNameLength + extraFieldLength + commentLength;
    }
  }
}
