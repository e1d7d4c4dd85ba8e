import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { displayInstallationResults } from '../../../src/core/install/install-reporting.js';
import { RecordingOutput } from '../../helpers/recording-output.js';

describe('displayInstallationResults', () => {
  it('lists installed, updated and current mods', () => {
    const output = new RecordingOutput();

    displayInstallationResults(
      'sodium',
      { success: true, data: { installed: ['sodium', 'fabric-api'], updated: ['indium'], skipped: ['lithium'] } },
      output
    );

    assert.deepEqual(output.lines, [
      'success: Installed sodium',
      'info: Installed: 2 mods',
      'info:   ├── sodium',
      'info:   └── fabric-api',
      'info: Updated: 1 mod',
      'info:   └── indium',
      'info: Already current: lithium'
    ]);
  });

  it('says so when nothing changed', () => {
    const output = new RecordingOutput();

    displayInstallationResults('sodium', { success: true, data: { installed: [], updated: [], skipped: ['sodium'] } }, output);

    assert.deepEqual(output.lines, ['success: sodium is already up to date']);
  });

  it('shows partial progress on failure', () => {
    const output = new RecordingOutput();

    displayInstallationResults(
      'sodium',
      {
        success: false,
        error: 'Failed to download file: indium-1.0.jar',
        data: { installed: ['sodium'], updated: [], skipped: [] }
      },
      output
    );

    assert.deepEqual(output.lines, [
      'error: Failed to install sodium: Failed to download file: indium-1.0.jar',
      'info: Completed before the failure: 1 mod',
      'info:   └── sodium'
    ]);
  });
});
