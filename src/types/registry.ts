/**
 * Registry domain types.
 *
 * These are the normalized shapes the rest of the application works with;
 * the raw registry payloads are mapped onto them in core/registry/payloads.ts.
 */

export type DependencyKind = 'required' | 'optional' | 'incompatible' | 'embedded';

/**
 * Stability tier of a release. Registries may report tiers beyond the three
 * known ones; those are kept verbatim and rank below alpha.
 */
export type VersionType = 'release' | 'beta' | 'alpha' | (string & {});

export interface Project {
  id: string;
  slug: string;
  title: string;
  description?: string;
  projectType?: string;
}

export interface VersionFile {
  url: string;
  filename: string;
  size: number;
  primary: boolean;
  hashes?: {
    sha1?: string;
    sha512?: string;
  };
}

export interface VersionDependency {
  projectId: string | null;
  versionId: string | null;
  kind: DependencyKind;
}

export interface Version {
  id: string;
  projectId: string;
  versionNumber: string;
  name: string;
  gameVersions: string[];
  loaders: string[];
  versionType: VersionType;
  /** ISO-8601 publish timestamp */
  datePublished: string;
  dependencies: VersionDependency[];
  files: VersionFile[];
}

export interface VersionFilters {
  gameVersions?: string[];
  loaders?: string[];
}

export interface SearchOptions extends VersionFilters {
  limit?: number;
}

export interface SearchHit {
  projectId: string;
  slug: string;
  title: string;
  description: string;
  downloads: number;
  latestVersion?: string;
}

/**
 * Read/download surface of a package registry. The HTTP client implements it;
 * tests substitute an in-memory registry.
 */
export interface PackageRegistry {
  getProject(idOrSlug: string): Promise<Project>;
  getVersions(slug: string, filters?: VersionFilters): Promise<Version[]>;
  getVersion(versionId: string): Promise<Version>;
  download(file: VersionFile, destPath: string): Promise<boolean>;
}
