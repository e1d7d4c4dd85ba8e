import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { FileSystemError } from '../../src/utils/errors.js';
import { acquireFileLock, tryFileLock, withFileLock } from '../../src/utils/file-lock.js';
import { exists } from '../../src/utils/fs.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

describe('file locks', () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    dir = await makeTempDir('lock');
    target = join(dir, 'state.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('locks a path that does not exist yet', async () => {
    const release = await tryFileLock(target);

    assert.notEqual(release, null);
    assert.equal(await exists(`${target}.lock`), true);
    assert.equal(await exists(target), false);

    await release?.();
    assert.equal(await exists(`${target}.lock`), false);
  });

  it('refuses a lock that is already held', async () => {
    const held = await tryFileLock(target);

    assert.equal(await tryFileLock(target), null);

    await held?.();
    const again = await tryFileLock(target);
    assert.notEqual(again, null);
    await again?.();
  });

  it('releases after the task, even when it throws', async () => {
    assert.equal(await withFileLock(target, async () => 'done'), 'done');
    await assert.rejects(
      withFileLock(target, async () => {
        throw new Error('task failed');
      }),
      /task failed/
    );

    assert.equal(await exists(`${target}.lock`), false);
  });

  it('waits for a lock held by someone else', async () => {
    const held = await tryFileLock(target);
    const waiting = acquireFileLock(target);
    setTimeout(() => {
      held?.().catch(() => undefined);
    }, 100);

    const release = await waiting;
    assert.equal(await exists(`${target}.lock`), true);
    await release();
  });

  it('fails at once when the lock cannot be created', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, 'x');

    await assert.rejects(acquireFileLock(join(blocker, 'state.json')), FileSystemError);
  });
});
