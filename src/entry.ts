/** Magic bytes at offset 0 of every archive. */
export const MAGIC = Buffer.from([0x00, 0x01, 0x00, 0x00]);

/** magic + dirsize + filenum */
export const HEADER_SIZE = 12;

/** size/offset pair plus the filename-offset slot */
export const DIRECTORY_RECORD_SIZE = 12;

export const HASH_SIZE = 8;

/**
 * Lower bound on the bytes one entry occupies on disk, used to reject
 * corrupt entry counts before anything is allocated.
 */
export const MIN_ENTRY_SIZE = 21;

export const MAX_U32 = 0xffffffff;

export interface Entry {
  /** Name as stored, backslash-separated. */
  readonly name: string;
  readonly size: number;
  /** Absolute offset of the data from the start of the archive file. */
  readonly offset: number;
}

/**
 * Lower-case ASCII letters only; everything else, including non-ASCII
 * characters, passes through unchanged.
 */
export function asciiLowerCase(value: string): string {
  return value.replace(/[A-Z]/g, c => String.fromCharCode(c.charCodeAt(0) + 32));
}

/** Convert forward slashes to the archive's backslash separator. */
export function toArchiveSeparators(path: string): string {
  return path.replace(/\//g, '\\');
}

/** Name under which a source path is stored when creating an archive. */
export function archiveName(sourcePath: string): string {
  return toArchiveSeparators(asciiLowerCase(sourcePath));
}
