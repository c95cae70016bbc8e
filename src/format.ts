/**
 * Byte-level layout of the archive: header, directory, filename block and
 * hash table. Everything here works on buffers; file access lives in
 * archive.ts.
 *
 *   0                  magic (4)
 *   4                  dirsize (u32)
 *   8                  filenum (u32)
 *   12                 filenum x (size u32, offset u32)
 *   12 + 8n            filenum x filename offset (u32)
 *   12 + 12n           null-terminated filenames
 *   12 + dirsize       filenum x name hash (u64)
 *   12 + dirsize + 8n  file data
 */

import {
  MAGIC, HEADER_SIZE, DIRECTORY_RECORD_SIZE, HASH_SIZE, MIN_ENTRY_SIZE, MAX_U32,
  type Entry,
} from './entry.js';
import { nameHash } from './hash.js';
import {
  FileTooSmallError, BadHeaderError, DirectorySizeInvalidError,
  NameCountMismatchError, BadNameEncodingError, OffsetOutsideArchiveError, ArchiveTooLargeError,
} from './errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export interface Header {
  /** Bytes used by the size/offset table, filename offsets and filenames. */
  dirsize: number;
  filenum: number;
}

export function assertMinimumSize(fileSize: number): void {
  if (fileSize < HEADER_SIZE) throw new FileTooSmallError(fileSize);
}

/**
 * Parse the 12-byte header and reject counts that cannot fit in a file of
 * `fileSize` bytes, before anything sized by them is allocated.
 */
export function parseHeader(bytes: Buffer, fileSize: number): Header {
  assertMinimumSize(fileSize);
  if (!bytes.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new BadHeaderError();
  }

  const dirsize = bytes.readUInt32LE(4);
  const filenum = bytes.readUInt32LE(8);

  const available = fileSize - HEADER_SIZE;
  if (filenum * MIN_ENTRY_SIZE > available || dirsize + HASH_SIZE * filenum > available) {
    throw new DirectorySizeInvalidError();
  }

  return { dirsize, filenum };
}

export function recordTableLength(header: Header): number {
  return DIRECTORY_RECORD_SIZE * header.filenum;
}

/**
 * Length of the filename block. Zero when the declared directory is smaller
 * than its own record table; the position check after reading catches that.
 */
export function nameBlockLength(header: Header): number {
  return Math.max(0, header.dirsize - recordTableLength(header));
}

/** Offset of the first byte of file data. */
export function dataOffset(header: Header): number {
  return HEADER_SIZE + header.dirsize + HASH_SIZE * header.filenum;
}

/**
 * Split a null-terminated filename block into names. Bytes that are not
 * UTF-8 are rejected; decoding them lossily could merge distinct names.
 */
export function splitNames(block: Buffer): string[] {
  const names: string[] = [];
  let start = 0;
  for (let i = 0; i <= block.length; i++) {
    if (i === block.length ? start < i : block[i] === 0) {
      names.push(decodeName(block.subarray(start, i)));
      start = i + 1;
    }
  }
  return names;
}

function decodeName(bytes: Buffer): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new BadNameEncodingError(err);
  }
}

/**
 * Build entries from the raw record table and filename block. The filename
 * offset words are skipped; names are recovered by splitting on nulls.
 */
export function parseDirectory(records: Buffer, names: Buffer, header: Header, fileSize: number): Entry[] {
  const { filenum } = header;
  const nameList = splitNames(names);
  if (nameList.length < filenum) {
    throw new NameCountMismatchError(filenum, nameList.length);
  }

  const base = dataOffset(header);
  const entries: Entry[] = [];
  for (let i = 0; i < filenum; i++) {
    const entry: Entry = {
      name: nameList[i],
      size: records.readUInt32LE(i * 8),
      offset: records.readUInt32LE(i * 8 + 4) + base,
    };
    if (entry.offset + entry.size > fileSize) {
      throw new OffsetOutsideArchiveError(entry.name, entry.offset, entry.size);
    }
    entries.push(entry);
  }
  return entries;
}

export interface LayoutEntry {
  name: string;
  size: number;
  /** Offset relative to the start of the data section. */
  offset: number;
}

export interface Layout {
  header: Header;
  entries: LayoutEntry[];
}

/**
 * Place files contiguously in the given order and size the directory.
 */
export function planLayout(files: Array<{ name: string; size: number }>): Layout {
  const entries: LayoutEntry[] = [];
  let offset = 0;
  let dirsize = DIRECTORY_RECORD_SIZE * files.length;

  for (const { name, size } of files) {
    if (size > MAX_U32) throw new ArchiveTooLargeError(`Size of ${name}`, size);
    if (offset > MAX_U32) throw new ArchiveTooLargeError(`Offset of ${name}`, offset);
    entries.push({ name, size, offset });
    offset += size;
    dirsize += Buffer.byteLength(name, 'utf8') + 1;
  }

  if (dirsize > MAX_U32) throw new ArchiveTooLargeError('Directory size', dirsize);
  return { header: { dirsize, filenum: entries.length }, entries };
}

export function encodeHeader(header: Header): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE);
  MAGIC.copy(buf, 0);
  buf.writeUInt32LE(header.dirsize, 4);
  buf.writeUInt32LE(header.filenum, 8);
  return buf;
}

/** Size/offset pairs followed by each name's position in the filename block. */
export function encodeRecords(entries: LayoutEntry[]): Buffer {
  const buf = Buffer.alloc(DIRECTORY_RECORD_SIZE * entries.length);
  let pos = 0;
  for (const entry of entries) {
    buf.writeUInt32LE(entry.size, pos);
    buf.writeUInt32LE(entry.offset, pos + 4);
    pos += 8;
  }

  let nameOffset = 0;
  for (const entry of entries) {
    buf.writeUInt32LE(nameOffset, pos);
    nameOffset += Buffer.byteLength(entry.name, 'utf8') + 1;
    pos += 4;
  }
  return buf;
}

export function encodeNames(entries: LayoutEntry[]): Buffer {
  return Buffer.concat(entries.map(e => Buffer.from(e.name + '\0', 'utf8')));
}

/** Hash of each null-terminated name, in directory order. */
export function encodeHashTable(entries: LayoutEntry[]): Buffer {
  const buf = Buffer.alloc(HASH_SIZE * entries.length);
  entries.forEach((entry, i) => {
    buf.writeBigUInt64LE(nameHash(entry.name + '\0'), i * HASH_SIZE);
  });
  return buf;
}
