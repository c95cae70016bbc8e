/**
 * Errors raised by the archive codec. Every failure carries a stable `code`
 * so callers can branch without matching on message text.
 */

export type ArchiveErrorCode =
  | 'NOT_OPEN'
  | 'ALREADY_OPEN'
  | 'FILE_TOO_SMALL'
  | 'BAD_HEADER'
  | 'DIRECTORY_SIZE_INVALID'
  | 'POSITION_MISMATCH'
  | 'NAME_COUNT_MISMATCH'
  | 'BAD_NAME_ENCODING'
  | 'OFFSET_OUTSIDE_ARCHIVE'
  | 'FILE_NOT_FOUND'
  | 'BYTES_WRITTEN_MISMATCH'
  | 'ARCHIVE_TOO_LARGE'
  | 'UNSAFE_PATH'
  | 'IO';

export class ArchiveError extends Error {
  readonly code: ArchiveErrorCode;

  constructor(code: ArchiveErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotOpenError extends ArchiveError {
  constructor() {
    super('NOT_OPEN', 'Archive must be opened before reading');
  }
}

export class AlreadyOpenError extends ArchiveError {
  constructor() {
    super('ALREADY_OPEN', 'Archive is already open');
  }
}

export class FileTooSmallError extends ArchiveError {
  constructor(readonly size: number) {
    super('FILE_TOO_SMALL', `File too small to be a valid archive: ${size} bytes`);
  }
}

export class BadHeaderError extends ArchiveError {
  constructor() {
    super('BAD_HEADER', 'Unrecognized archive header');
  }
}

export class DirectorySizeInvalidError extends ArchiveError {
  constructor() {
    super('DIRECTORY_SIZE_INVALID', 'Directory information larger than entire archive, file may be corrupt');
  }
}

export class PositionMismatchError extends ArchiveError {
  constructor(readonly expected: number, readonly actual: number) {
    super('POSITION_MISMATCH', `Read position should be ${expected} but was ${actual}`);
  }
}

export class NameCountMismatchError extends ArchiveError {
  constructor(readonly expected: number, readonly actual: number) {
    super('NAME_COUNT_MISMATCH', `Filename block holds ${actual} names, directory declares ${expected}`);
  }
}

export class BadNameEncodingError extends ArchiveError {
  constructor(cause?: unknown) {
    super('BAD_NAME_ENCODING', 'Filename block is not valid UTF-8', { cause });
  }
}

export class OffsetOutsideArchiveError extends ArchiveError {
  constructor(readonly entryName: string, readonly offset: number, readonly size: number) {
    super('OFFSET_OUTSIDE_ARCHIVE', `Archive contains offsets outside itself: ${entryName} (${size} bytes at ${offset})`);
  }
}

export class FileNotFoundError extends ArchiveError {
  constructor(readonly entryName: string) {
    super('FILE_NOT_FOUND', `File not found in archive: ${entryName}`);
  }
}

export class BytesWrittenMismatchError extends ArchiveError {
  constructor(readonly expected: number, readonly actual: number) {
    super('BYTES_WRITTEN_MISMATCH', `Expected to write ${expected} bytes but was ${actual}`);
  }
}

export class ArchiveTooLargeError extends ArchiveError {
  constructor(what: string, readonly value: number) {
    super('ARCHIVE_TOO_LARGE', `${what} does not fit in 32 bits: ${value}`);
  }
}

export class UnsafePathError extends ArchiveError {
  constructor(readonly entryName: string, readonly outputDir: string) {
    super('UNSAFE_PATH', `Refusing to extract ${entryName} outside ${outputDir}`);
  }
}

export type IOOperation = 'open' | 'stat' | 'read' | 'write' | 'close';

export class ArchiveIOError extends ArchiveError {
  constructor(readonly operation: IOOperation, readonly path: string, cause?: unknown) {
    super('IO', `Failed to ${operation} ${path}: ${cause instanceof Error ? cause.message : 'unexpected end of file'}`, { cause });
  }
}
