export { Archive, openArchive, type CreateOptions } from './archive.js';
export { nameHash } from './hash.js';
export { MAGIC, archiveName, type Entry } from './entry.js';
export { extractEntry, extractAll, targetPath, type ExtractOptions, type ProgressCallback } from './extract.js';
export { formatEntry, formatListing } from './listing.js';
export * from './errors.js';
