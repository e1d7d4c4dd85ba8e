import type { InstalledMod } from '../../src/types/index.js';

export function installedMod(slug: string, overrides: Partial<InstalledMod> = {}): InstalledMod {
  return {
    slug,
    name: slug.toUpperCase(),
    version: '1.0.0',
    fileName: `${slug}-1.0.0.jar`,
    installedAt: '2026-01-01T00:00:00.000Z',
    autoUpdate: true,
    dependencies: [],
    gameVersions: ['1.20.1'],
    loader: 'fabric',
    projectId: `P-${slug}`,
    versionId: `V-${slug}`,
    fileSize: 2048,
    ...overrides
  };
}
