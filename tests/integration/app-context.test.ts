import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { createAppContext } from '../../src/core/app-context.js';
import { LedgerStore } from '../../src/core/ledger/index.js';
import { resolveConfig } from '../../src/core/config.js';
import { UpdateLog } from '../../src/core/scheduler/index.js';
import type { ModkeeperConfig } from '../../src/types/index.js';
import { ConfigError } from '../../src/utils/errors.js';
import { tryFileLock } from '../../src/utils/file-lock.js';
import type { FetchLike } from '../../src/utils/http-client.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

function versionPayload(projectId: string, slug: string, versionNumber: string, dependencies: unknown[] = []): unknown {
  return {
    id: `${slug}-${versionNumber}`,
    project_id: projectId,
    version_number: versionNumber,
    game_versions: ['1.20.1'],
    loaders: ['fabric'],
    version_type: 'release',
    date_published: '2024-01-01T00:00:00Z',
    dependencies,
    files: [{ url: `https://cdn.example.test/${slug}-${versionNumber}.jar`, filename: `${slug}-${versionNumber}.jar`, size: 64, primary: true }]
  };
}

const API: Record<string, unknown> = {
  '/v2/project/sodium': { id: 'AANobbMI', slug: 'sodium', title: 'Sodium' },
  '/v2/project/sodium/version': [
    versionPayload('AANobbMI', 'sodium', '0.5.3', [{ project_id: 'P7dR8mSH', dependency_type: 'required' }])
  ],
  '/v2/project/P7dR8mSH': { id: 'P7dR8mSH', slug: 'fabric-api', title: 'Fabric API' },
  '/v2/project/fabric-api/version': [versionPayload('P7dR8mSH', 'fabric-api', '0.92.0')]
};

const fakeFetch: FetchLike = async (input) => {
  const url = new URL(input);
  if (url.hostname === 'cdn.example.test') {
    return new Response(`bytes of ${url.pathname.slice(1)}`);
  }
  const body = API[url.pathname];
  return body === undefined
    ? new Response('{"error":"not_found"}', { status: 404 })
    : new Response(JSON.stringify(body));
};

describe('application context', () => {
  let dir: string;
  let config: ModkeeperConfig;

  beforeEach(async () => {
    dir = await makeTempDir('app');
    config = resolveConfig(
      { serverPath: dir, gameVersion: '1.20.1', apiBaseUrl: 'https://api.example.test/v2' },
      {},
      '/'
    );
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('installs a mod with its dependency and audits a scheduled check', async () => {
    const app = await createAppContext(config, { fetchImpl: fakeFetch, batchPauseMs: 0 });

    try {
      assert.deepEqual(app.environment, { gameVersion: '1.20.1', loader: 'fabric' });

      const result = await app.installer.install('https://modrinth.com/mod/sodium');
      assert.deepEqual(result, { success: true, data: { installed: ['sodium', 'fabric-api'], updated: [], skipped: [] } });
      assert.equal(await readFile(join(dir, 'mods', 'sodium-0.5.3.jar'), 'utf-8'), 'bytes of sodium-0.5.3.jar');
      assert.deepEqual(app.ledger.get('sodium')?.dependencies, ['fabric-api']);

      assert.equal(app.scheduler.runNow().status, 'started');
      await app.scheduler.waitForIdle();

      assert.deepEqual(
        app.scheduler.getLogs().map(entry => `${entry.slug}:${entry.status}`),
        ['fabric-api:skipped', 'sodium:skipped']
      );
      assert.notEqual(app.ledger.getMetadata().lastUpdateCheck, null);

      const persisted = await UpdateLog.open({ filePath: join(dir, 'modkeeper-update-log.json') });
      assert.equal(persisted.size, 2);
    } finally {
      await app.shutdown();
    }
  });

  describe('shared by a daemon and a command', () => {
    it('keeps a mod installed by the command after the daemon checks for updates', async () => {
      const daemon = await createAppContext(config, { fetchImpl: fakeFetch, batchPauseMs: 0 });
      const cli = await createAppContext(config, { fetchImpl: fakeFetch, batchPauseMs: 0 });

      try {
        const installed = await cli.installer.install('sodium');
        assert.equal(installed.success, true);

        const started = daemon.scheduler.runNow();
        assert.equal(started.status, 'started');
        await daemon.scheduler.waitForIdle();

        assert.deepEqual(
          daemon.scheduler.getLogs().map(entry => `${entry.slug}:${entry.status}`),
          ['fabric-api:skipped', 'sodium:skipped']
        );
        const saved = await LedgerStore.open({ filePath: join(dir, 'mod_manager_state.json') });
        assert.deepEqual(saved.list().map(entry => entry.slug), ['sodium', 'fabric-api']);
        assert.notEqual(saved.getMetadata().lastUpdateCheck, null);
      } finally {
        await daemon.shutdown();
        await cli.shutdown();
      }
    });

    it('does not let the daemon restore a removed mod or cleared log', async () => {
      const daemon = await createAppContext(config, { fetchImpl: fakeFetch, batchPauseMs: 0 });
      const cli = await createAppContext(config, { fetchImpl: fakeFetch, batchPauseMs: 0 });

      try {
        await daemon.installer.install('sodium');
        daemon.scheduler.runNow();
        await daemon.scheduler.waitForIdle();

        assert.equal(await cli.installer.remove('sodium'), true);
        await cli.scheduler.clearLogs();

        daemon.scheduler.runNow();
        await daemon.scheduler.waitForIdle();

        const saved = await LedgerStore.open({ filePath: join(dir, 'mod_manager_state.json') });
        assert.deepEqual(saved.list().map(entry => entry.slug), ['fabric-api']);
        const log = await UpdateLog.open({ filePath: join(dir, 'modkeeper-update-log.json') });
        assert.deepEqual(log.getLogs().map(entry => `${entry.slug}:${entry.status}`), ['fabric-api:skipped']);
      } finally {
        await daemon.shutdown();
        await cli.shutdown();
      }
    });

    it('skips a manual check while another process runs one', async () => {
      const app = await createAppContext(config, { fetchImpl: fakeFetch, batchPauseMs: 0 });
      const release = await tryFileLock(join(dir, 'modkeeper-update-batch'));
      assert.notEqual(release, null);

      try {
        const started = app.scheduler.runNow();
        assert.equal(started.status, 'started');
        assert.deepEqual(started.status === 'started' ? await started.done : null, { status: 'locked' });
        assert.equal(app.scheduler.status().lastCheck, null);
      } finally {
        await release?.();
        await app.shutdown();
      }
    });
  });

  it('refuses a server directory that does not exist', async () => {
    const missing = { ...config, serverPath: join(dir, 'missing') };

    await assert.rejects(
      createAppContext(missing, { fetchImpl: fakeFetch }),
      (error: unknown) => error instanceof ConfigError && error.message.includes('Server directory does not exist')
    );
  });
});
