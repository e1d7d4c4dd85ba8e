import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractSlug, isUrlInput } from '../../../src/core/registry/project-url.js';
import { RegistryError } from '../../../src/utils/errors.js';

function isInvalidUrl(error: unknown): boolean {
  return error instanceof RegistryError && error.reason === 'invalid-url';
}

describe('extractSlug', () => {
  it('returns plain slugs trimmed', () => {
    assert.equal(extractSlug('sodium'), 'sodium');
    assert.equal(extractSlug('  lithium  '), 'lithium');
  });

  it('extracts the slug from project links', () => {
    assert.equal(extractSlug('https://modrinth.com/mod/sodium'), 'sodium');
    assert.equal(extractSlug('https://modrinth.com/mod/sodium/versions'), 'sodium');
    assert.equal(extractSlug('https://modrinth.com/plugin/luckperms?tab=files'), 'luckperms');
    assert.equal(extractSlug('https://www.modrinth.com/datapack/terralith'), 'terralith');
  });

  it('decodes escaped slugs', () => {
    assert.equal(extractSlug('https://modrinth.com/mod/fancy%20name'), 'fancy name');
  });

  it('honours a custom registry host', () => {
    assert.equal(extractSlug('https://mods.example.test/mod/foo', 'mods.example.test'), 'foo');
  });

  it('rejects links to other hosts', () => {
    assert.throws(() => extractSlug('https://example.com/mod/sodium'), isInvalidUrl);
    assert.throws(() => extractSlug('https://notmodrinth.com/mod/sodium'), isInvalidUrl);
  });

  it('rejects links without a project path', () => {
    assert.throws(() => extractSlug('https://modrinth.com/'), isInvalidUrl);
    assert.throws(() => extractSlug('https://modrinth.com/mod/'), isInvalidUrl);
    assert.throws(() => extractSlug('https://modrinth.com/user/someone'), isInvalidUrl);
  });
});

describe('isUrlInput', () => {
  it('recognises http and https links only', () => {
    assert.equal(isUrlInput('https://modrinth.com/mod/a'), true);
    assert.equal(isUrlInput('HTTP://modrinth.com/mod/a'), true);
    assert.equal(isUrlInput('modrinth.com/mod/a'), false);
    assert.equal(isUrlInput('sodium'), false);
  });
});
