import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { filterCompatibleVersions, isCompatible, selectInstallableFile, stabilityRank } from '../../src/core/compatibility.js';
import { artifact, makeVersion } from '../helpers/fake-registry.js';

function numbers(versions: { versionNumber: string }[]): string[] {
  return versions.map(version => version.versionNumber);
}

describe('isCompatible', () => {
  it('requires both the game version and the loader', () => {
    const version = makeVersion('a', { versionNumber: '1', gameVersions: ['1.20.1', '1.20.2'], loaders: ['fabric', 'quilt'] });
    assert.equal(isCompatible(version, '1.20.2', 'quilt'), true);
    assert.equal(isCompatible(version, '1.19.4', 'fabric'), false);
    assert.equal(isCompatible(version, '1.20.1', 'forge'), false);
  });
});

describe('filterCompatibleVersions', () => {
  it('drops versions for other environments', () => {
    const versions = [
      makeVersion('a', { versionNumber: '1', gameVersions: ['1.19.4'] }),
      makeVersion('a', { versionNumber: '2', loaders: ['forge'] }),
      makeVersion('a', { versionNumber: '3' })
    ];
    assert.deepEqual(numbers(filterCompatibleVersions(versions, '1.20.1', 'fabric')), ['3']);
  });

  it('returns an empty list when nothing matches', () => {
    const versions = [makeVersion('a', { versionNumber: '1', gameVersions: ['1.19.4'] })];
    assert.deepEqual(filterCompatibleVersions(versions, '1.20.1', 'fabric'), []);
  });

  it('prefers releases over newer pre-releases', () => {
    const versions = [
      makeVersion('a', { versionNumber: '2.0-beta', versionType: 'beta', datePublished: '2024-03-01T00:00:00Z' }),
      makeVersion('a', { versionNumber: '1.0', datePublished: '2024-01-01T00:00:00Z' }),
      makeVersion('a', { versionNumber: '1.1', datePublished: '2024-02-01T00:00:00Z' })
    ];
    assert.deepEqual(numbers(filterCompatibleVersions(versions, '1.20.1', 'fabric')), ['1.1', '1.0']);
  });

  it('falls back to pre-releases, best tier first', () => {
    const versions = [
      makeVersion('a', { versionNumber: 'a1', versionType: 'alpha', datePublished: '2024-05-01T00:00:00Z' }),
      makeVersion('a', { versionNumber: 'b1', versionType: 'beta', datePublished: '2024-01-01T00:00:00Z' }),
      makeVersion('a', { versionNumber: 'x1', versionType: 'snapshot', datePublished: '2024-06-01T00:00:00Z' })
    ];
    assert.deepEqual(numbers(filterCompatibleVersions(versions, '1.20.1', 'fabric')), ['b1', 'a1', 'x1']);
  });

  it('keeps every tier when stable versions are not preferred', () => {
    const versions = [
      makeVersion('a', { versionNumber: 'b1', versionType: 'beta', datePublished: '2024-03-01T00:00:00Z' }),
      makeVersion('a', { versionNumber: 'r1', datePublished: '2024-01-01T00:00:00Z' })
    ];
    assert.deepEqual(numbers(filterCompatibleVersions(versions, '1.20.1', 'fabric', { preferStable: false })), ['r1', 'b1']);
  });

  it('keeps input order for equal publish dates', () => {
    const versions = [
      makeVersion('a', { versionNumber: 'first' }),
      makeVersion('a', { versionNumber: 'second' }),
      makeVersion('a', { versionNumber: 'undated', datePublished: '' })
    ];
    assert.deepEqual(numbers(filterCompatibleVersions(versions, '1.20.1', 'fabric')), ['first', 'second', 'undated']);
  });
});

describe('stabilityRank', () => {
  it('ranks unknown tiers below alpha', () => {
    assert.deepEqual(['release', 'beta', 'alpha', 'nightly'].map(stabilityRank), [0, 1, 2, 3]);
  });
});

describe('selectInstallableFile', () => {
  it('prefers the primary file', () => {
    const files = [artifact('a', '1', { filename: 'a-sources.jar', primary: false }), artifact('a', '1')];
    assert.equal(selectInstallableFile(makeVersion('a', { versionNumber: '1', files }))?.filename, 'a-1.jar');
  });

  it('falls back to the first archive, then the first file', () => {
    const withJar = [artifact('a', '1', { filename: 'readme.txt', primary: false }), artifact('a', '1', { filename: 'a.JAR', primary: false })];
    assert.equal(selectInstallableFile(makeVersion('a', { versionNumber: '1', files: withJar }))?.filename, 'a.JAR');

    const noJar = [artifact('a', '1', { filename: 'a.zip', primary: false })];
    assert.equal(selectInstallableFile(makeVersion('a', { versionNumber: '1', files: noJar }))?.filename, 'a.zip');
  });

  it('returns null for versions without files', () => {
    assert.equal(selectInstallableFile(makeVersion('a', { versionNumber: '1', files: [] })), null);
  });
});
