/**
 * Directory listing filters system junk files (.DS_Store, Thumbs.db, ...)
 * while keeping legitimate dotfiles and dot-directories.
 */

import { describe, test, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { FileSystemError } from '../../src/utils/errors.js';
import { listEntries, readJsonOrJsoncFile, writeJsonFile } from '../../src/utils/fs.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

describe('fs utilities', () => {
  let tmp: string;

  before(async () => {
    tmp = await makeTempDir('fs');
  });

  after(async () => {
    await removeTempDir(tmp);
  });

  test('listEntries skips junk files', async () => {
    const dir = join(tmp, 'server');
    await mkdir(join(dir, '.fabric'), { recursive: true });
    await writeFile(join(dir, '.DS_Store'), 'junk');
    await writeFile(join(dir, 'Thumbs.db'), 'junk');
    await writeFile(join(dir, 'server.properties'), 'motd=hi');

    const entries = (await listEntries(dir)).sort();

    assert.deepStrictEqual(entries, ['.fabric', 'server.properties']);
  });

  test('listEntries reports missing directories', async () => {
    await assert.rejects(listEntries(join(tmp, 'absent')), FileSystemError);
  });

  test('JSONC files allow comments and trailing commas', async () => {
    const file = join(tmp, 'settings.jsonc');
    await writeFile(file, '{\n  // loader\n  "loader": "forge",\n}\n');

    assert.deepStrictEqual(await readJsonOrJsoncFile(file), { loader: 'forge' });
  });

  test('invalid JSON is a file system error', async () => {
    const file = join(tmp, 'broken.json');
    await writeFile(file, '{ "loader": ');

    await assert.rejects(readJsonOrJsoncFile(file), FileSystemError);
  });

  test('writeJsonFile creates parent directories', async () => {
    const file = join(tmp, 'nested', 'deeper', 'out.json');
    await writeJsonFile(file, { a: 1 });

    assert.deepStrictEqual(await readJsonOrJsoncFile(file), { a: 1 });
  });
});
