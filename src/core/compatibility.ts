import { FILE_PATTERNS } from '../constants/index.js';
import type { Version, VersionFile, VersionType } from '../types/index.js';

export interface CompatibilityOptions {
  /** Narrow to release-tier versions when at least one is compatible */
  preferStable?: boolean;
}

const STABILITY_RANK: Record<string, number> = {
  release: 0,
  beta: 1,
  alpha: 2
};

export function stabilityRank(versionType: VersionType): number {
  return STABILITY_RANK[versionType] ?? 3;
}

function publishedAt(version: Version): number {
  const time = Date.parse(version.datePublished);
  return Number.isNaN(time) ? 0 : time;
}

export function isCompatible(version: Version, gameVersion: string, loader: string): boolean {
  return version.gameVersions.includes(gameVersion) && version.loaders.includes(loader);
}

/**
 * Select the versions usable on the target environment, best first.
 *
 * Order is stability rank (release, beta, alpha, other) then newest publish
 * date. The sort is stable, so equal timestamps keep their input order.
 */
export function filterCompatibleVersions(
  versions: readonly Version[],
  gameVersion: string,
  loader: string,
  options: CompatibilityOptions = {}
): Version[] {
  const { preferStable = true } = options;

  let candidates = versions.filter(version => isCompatible(version, gameVersion, loader));
  if (candidates.length === 0) {
    return [];
  }

  if (preferStable) {
    const releases = candidates.filter(version => version.versionType === 'release');
    if (releases.length > 0) {
      candidates = releases;
    }
  }

  return [...candidates].sort(
    (a, b) => stabilityRank(a.versionType) - stabilityRank(b.versionType) || publishedAt(b) - publishedAt(a)
  );
}

/**
 * Pick the file to install for a version: the primary file, else the first
 * package archive, else whatever comes first.
 */
export function selectInstallableFile(version: Version): VersionFile | null {
  return (
    version.files.find(file => file.primary) ??
    version.files.find(file => file.filename.toLowerCase().endsWith(FILE_PATTERNS.ARCHIVE_EXTENSION)) ??
    version.files[0] ??
    null
  );
}
