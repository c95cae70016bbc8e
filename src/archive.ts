import { open, stat, readFile, type FileHandle } from 'node:fs/promises';
import { resolve } from 'node:path';
import { HEADER_SIZE, DIRECTORY_RECORD_SIZE, archiveName, toArchiveSeparators, type Entry } from './entry.js';
import {
  assertMinimumSize, parseHeader, parseDirectory, recordTableLength, nameBlockLength,
  dataOffset, planLayout, encodeHeader, encodeRecords, encodeNames, encodeHashTable,
} from './format.js';
import {
  NotOpenError, AlreadyOpenError, FileNotFoundError, PositionMismatchError,
  BytesWrittenMismatchError, ArchiveIOError, type IOOperation,
} from './errors.js';

export interface CreateOptions {
  /** Directory source paths are resolved against. Defaults to process.cwd(). */
  cwd?: string;
}

interface LoadedState {
  path: string;
  entries: Entry[];
  lookup: Map<string, number>;
}

async function io<T>(operation: IOOperation, path: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new ArchiveIOError(operation, path, err);
  }
}

/**
 * Run `fn` on a handle opened on `path` and close it afterwards. When `fn`
 * fails, its error is the one that propagates, even if closing fails too.
 */
export async function withFile<T>(path: string, flags: 'r' | 'w', fn: (handle: FileHandle) => Promise<T>): Promise<T> {
  const handle = await io('open', path, () => open(path, flags));
  let result: T;
  try {
    result = await fn(handle);
  } catch (err) {
    // the handle is being discarded; err describes the real failure
    await handle.close().catch(() => undefined);
    throw err;
  }
  await io('close', path, () => handle.close());
  return result;
}

/**
 * Read exactly `length` bytes at `position`. Running out of file is an
 * error, never a short buffer.
 */
async function readExactly(handle: FileHandle, path: string, length: number, position: number): Promise<Buffer> {
  const buf = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await io('read', path, () => handle.read(buf, filled, length - filled, position + filled));
    if (bytesRead === 0) throw new ArchiveIOError('read', path);
    filled += bytesRead;
  }
  return buf;
}

class FileReader {
  position = 0;

  constructor(private handle: FileHandle, private path: string) {}

  async read(length: number): Promise<Buffer> {
    const buf = await readExactly(this.handle, this.path, length, this.position);
    this.position += buf.length;
    return buf;
  }
}

class FileWriter {
  position = 0;

  constructor(private handle: FileHandle, private path: string) {}

  async write(data: Buffer): Promise<void> {
    const { bytesWritten } = await io('write', this.path, () => this.handle.write(data, 0, data.length, this.position));
    this.position += bytesWritten;
  }

  expect(total: number): void {
    if (this.position !== total) throw new BytesWrittenMismatchError(total, this.position);
  }
}

/**
 * An archive on disk. An instance starts empty and becomes loaded after one
 * successful `open` or `create`; after that it is read-only and any further
 * `open` or `create` fails. A failed `open` or `create` leaves it empty.
 */
export class Archive {
  private state: LoadedState | null = null;

  get loaded(): boolean {
    return this.state !== null;
  }

  get path(): string | undefined {
    return this.state?.path;
  }

  /** Parse the header and directory of the archive at `path`. */
  async open(path: string): Promise<void> {
    if (this.state) throw new AlreadyOpenError();

    const entries = await withFile(path, 'r', async handle => {
      const { size: fileSize } = await io('stat', path, () => handle.stat());
      assertMinimumSize(fileSize);

      const reader = new FileReader(handle, path);
      const header = parseHeader(await reader.read(HEADER_SIZE), fileSize);
      const records = await reader.read(recordTableLength(header));
      const names = await reader.read(nameBlockLength(header));

      const expected = HEADER_SIZE + header.dirsize;
      if (reader.position !== expected) {
        throw new PositionMismatchError(expected, reader.position);
      }

      return parseDirectory(records, names, header, fileSize);
    });

    this.load(path, entries);
  }

  /**
   * Write a new archive to `destination` holding `files` in the given order.
   * Entry names are the paths as given, lower-cased, with backslash
   * separators. A partially written destination is left in place on failure.
   */
  async create(destination: string, files: string[], opts: CreateOptions = {}): Promise<void> {
    if (this.state) throw new AlreadyOpenError();
    const cwd = opts.cwd ?? process.cwd();

    const sources: Array<{ name: string; size: number; sourcePath: string }> = [];
    for (const file of files) {
      const sourcePath = resolve(cwd, file);
      const { size } = await io('stat', sourcePath, () => stat(sourcePath));
      sources.push({ name: archiveName(file), size, sourcePath });
    }

    const layout = planLayout(sources);
    const { filenum } = layout.header;
    const base = dataOffset(layout.header);

    await withFile(destination, 'w', async handle => {
      const writer = new FileWriter(handle, destination);

      await writer.write(encodeHeader(layout.header));
      writer.expect(HEADER_SIZE);

      await writer.write(encodeRecords(layout.entries));
      writer.expect(HEADER_SIZE + DIRECTORY_RECORD_SIZE * filenum);

      await writer.write(encodeNames(layout.entries));
      await writer.write(encodeHashTable(layout.entries));
      writer.expect(base);

      for (let i = 0; i < sources.length; i++) {
        const { sourcePath } = sources[i];
        const data = await io('read', sourcePath, () => readFile(sourcePath));
        // The file may have changed since it was measured.
        if (data.length !== layout.entries[i].size) {
          throw new BytesWrittenMismatchError(layout.entries[i].size, data.length);
        }
        await writer.write(data);
        writer.expect(base + layout.entries[i].offset + data.length);
      }
    });

    this.load(destination, layout.entries.map(e => ({ name: e.name, size: e.size, offset: e.offset + base })));
  }

  /** Whether `name` is in the archive. Slashes are treated as backslashes. */
  exists(name: string): boolean {
    return this.loadedState().lookup.has(toArchiveSeparators(name));
  }

  /** Entries in directory order. */
  list(): readonly Entry[] {
    return this.loadedState().entries;
  }

  entry(name: string): Entry {
    const { entries, lookup } = this.loadedState();
    const index = lookup.get(toArchiveSeparators(name));
    if (index === undefined) throw new FileNotFoundError(name);
    return entries[index];
  }

  /**
   * Read an entry's bytes. Each call opens its own handle on the archive, so
   * reads never share a file position.
   */
  async read(name: string): Promise<Buffer> {
    const { path } = this.loadedState();
    const entry = this.entry(name);

    return withFile(path, 'r', handle => readExactly(handle, path, entry.size, entry.offset));
  }

  private loadedState(): LoadedState {
    if (!this.state) throw new NotOpenError();
    return this.state;
  }

  private load(path: string, entries: Entry[]): void {
    const lookup = new Map<string, number>();
    entries.forEach((entry, i) => lookup.set(entry.name, i));
    this.state = { path, entries, lookup };
  }
}

/** Open the archive at `path`. */
export async function openArchive(path: string): Promise<Archive> {
  const archive = new Archive();
  await archive.open(path);
  return archive;
}
