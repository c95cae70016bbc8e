#!/usr/bin/env node
/**
 * bsa — inspect, extract and create BSA archives
 *
 *   bsa <archive> list [--long]
 *   bsa <archive> extract --output <dir> [--full-path] <file>...
 *   bsa <archive> extract-all --output <dir>
 *   bsa <archive> create --files <file>...
 */

import { Archive, openArchive } from './archive.js';
import { extractEntry, extractAll } from './extract.js';
import { formatListing } from './listing.js';
import type { Entry } from './entry.js';

const USAGE = `bsa — BSA archive tool

  bsa <archive> list [--long|-l]
  bsa <archive> extract --output <dir> [--full-path|-f] <file>...
  bsa <archive> extract-all --output <dir>
  bsa <archive> create --files <file>...`;

const VALUE_FLAGS = ['--output', '-o'];

function getFlag(args: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx >= 0) return args[idx + 1];
  }
  return undefined;
}

function hasFlag(args: string[], ...flags: string[]): boolean {
  return flags.some(f => args.includes(f));
}

/** Arguments that are neither flags nor the value of a flag. */
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (VALUE_FLAGS.includes(args[i])) {
      i++;
    } else if (!args[i].startsWith('-')) {
      out.push(args[i]);
    }
  }
  return out;
}

function usage(message: string): never {
  console.error(message);
  process.exit(1);
}

function showProgress(done: number, total: number, entry: Entry): void {
  if (!process.stderr.isTTY) return;
  process.stderr.write(`\r[${done}/${total}] ${entry.name}\x1b[K`);
  if (done === total) process.stderr.write('\n');
}

// ── Commands ────────────────────────────────────────────────

async function list(archivePath: string, args: string[]): Promise<void> {
  const archive = await openArchive(archivePath);
  for (const line of formatListing(archive.list(), hasFlag(args, '--long', '-l'))) {
    console.log(line);
  }
}

async function extract(archivePath: string, args: string[]): Promise<void> {
  const files = positionals(args);
  if (files.length === 0) {
    usage('Usage: bsa <archive> extract --output <dir> [--full-path] <file>...');
  }

  const outputDir = getFlag(args, '--output', '-o') ?? '.';
  const fullPath = hasFlag(args, '--full-path', '-f');
  const archive = await openArchive(archivePath);

  for (const file of files) {
    const target = await extractEntry(archive, file, { outputDir, fullPath });
    console.log(`Extracting ${file} to ${target}`);
  }
}

async function extractAllCommand(archivePath: string, args: string[]): Promise<void> {
  const outputDir = getFlag(args, '--output', '-o') ?? '.';
  const archive = await openArchive(archivePath);
  const written = await extractAll(archive, outputDir, showProgress);
  console.log(`✓ Extracted ${written.length} files to ${outputDir}`);
}

async function create(archivePath: string, args: string[]): Promise<void> {
  const files = positionals(args);
  if (files.length === 0) {
    usage('Usage: bsa <archive> create --files <file>...');
  }

  const archive = new Archive();
  await archive.create(archivePath, files);
  console.log(`✓ Created ${archivePath} (${archive.list().length} files)`);
}

// ── Main ────────────────────────────────────────────────────

const commands: Record<string, (archivePath: string, args: string[]) => Promise<void>> = {
  list,
  extract,
  'extract-all': extractAllCommand,
  create,
};

const [archivePath, command, ...args] = process.argv.slice(2);

if (!archivePath) {
  console.log(USAGE);
  process.exit(0);
}

const run = command && Object.hasOwn(commands, command) ? commands[command] : undefined;
if (!run) usage(USAGE);

run(archivePath, args).catch((err: unknown) => {
  console.error(`✗ ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
