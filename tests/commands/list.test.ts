import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { renderModTable } from '../../src/commands/list.js';
import { installedMod } from '../helpers/installed-mod.js';

describe('renderModTable', () => {
  it('renders mods sorted by slug', () => {
    const installedAt = new Date(2026, 0, 1, 9, 30).toISOString();

    const lines = renderModTable([
      installedMod('sodium', { version: '0.5.3', fileSize: 2 * 1024 * 1024, installedAt }),
      installedMod('lithium', { version: '0.11.2', autoUpdate: false, fileSize: 1536, installedAt })
    ]);

    assert.deepEqual(lines, [
      'MOD      VERSION  AUTO  SIZE    INSTALLED',
      '---      -------  ----  ----    ---------',
      'lithium  0.11.2   no    1.50KB  2026-01-01 09:30',
      'sodium   0.5.3    yes   2.00MB  2026-01-01 09:30'
    ]);
  });
});
