import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { writeFile, mkdir, rm, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { Archive, openArchive } from '../src/archive.js';
import { extractEntry, extractAll, targetPath } from '../src/extract.js';
import { UnsafePathError } from '../src/errors.js';

describe('extract', () => {
  const tmp = join(tmpdir(), `bsa-extract-test-${Date.now()}`);
  const source = join(tmp, 'source');
  const archivePath = join(tmp, 'test.bsa');
  let archive: Archive;

  before(async () => {
    await mkdir(join(source, 'meshes', 'x'), { recursive: true });
    await writeFile(join(source, 'readme.txt'), 'hello');
    await writeFile(join(source, 'meshes', 'x', 'rock.nif'), Buffer.from([0xde, 0xad]));

    await new Archive().create(archivePath, ['readme.txt', 'meshes/x/rock.nif'], { cwd: source });
    archive = await openArchive(archivePath);
  });

  after(async () => {
    await rm(tmp, { recursive: true });
  });

  it('should extract by base name', async () => {
    const out = join(tmp, 'flat');
    const target = await extractEntry(archive, 'meshes/x/rock.nif', { outputDir: out });
    assert.strictEqual(target, join(out, 'rock.nif'));
    assert.deepStrictEqual(await readFile(target), Buffer.from([0xde, 0xad]));
  });

  it('should extract with the full path', async () => {
    const out = join(tmp, 'full');
    const target = await extractEntry(archive, 'meshes\\x\\rock.nif', { outputDir: out, fullPath: true });
    assert.strictEqual(target, join(out, 'meshes', 'x', 'rock.nif'));
    assert.deepStrictEqual(await readFile(target), Buffer.from([0xde, 0xad]));
  });

  it('should extract everything in directory order', async () => {
    const out = join(tmp, 'all');
    const progress: Array<[number, number, string]> = [];
    const written = await extractAll(archive, out, (done, total, entry) => {
      progress.push([done, total, entry.name]);
    });

    assert.deepStrictEqual(written, [join(out, 'readme.txt'), join(out, 'meshes', 'x', 'rock.nif')]);
    assert.deepStrictEqual(progress, [[1, 2, 'readme.txt'], [2, 2, 'meshes\\x\\rock.nif']]);
    assert.strictEqual(await readFile(join(out, 'readme.txt'), 'utf8'), 'hello');
  });

  it('should reject missing entries', async () => {
    await assert.rejects(extractEntry(archive, 'missing.txt', { outputDir: tmp }), { code: 'FILE_NOT_FOUND' });
  });

  it('should refuse names that escape the output directory', () => {
    const outputDir = join(tmp, 'safe');
    assert.throws(() => targetPath('..\\evil.txt', { outputDir, fullPath: true }), { name: 'UnsafePathError', code: 'UNSAFE_PATH' });
    assert.throws(() => targetPath('a\\..\\..\\evil.txt', { outputDir, fullPath: true }), UnsafePathError);
    assert.strictEqual(targetPath('..\\evil.txt', { outputDir }), resolve(outputDir, 'evil.txt'));
  });
});
