import type { Project, Version, VersionFile } from '../../types/index.js';

/**
 * One package in a resolution plan with the version and file chosen for it.
 */
export interface ResolutionNode {
  project: Project;
  version: Version;
  /** null when the chosen version ships no files */
  file: VersionFile | null;
}

export interface DependencyResolverOptions {
  /**
   * Walk `optional` dependencies as well as `required` ones.
   * Defaults to true.
   */
  includeOptionalDependencies?: boolean;
  preferStable?: boolean;
  /** Upper bound on plan size for one resolution call */
  maxNodes?: number;
}

/**
 * Pending entry on the resolver's work stack. A dependency may reference its
 * project directly or only through a pinned version id.
 */
export interface WorkItem {
  ref: string | null;
  projectId: string | null;
  versionId: string | null;
  isRoot: boolean;
  /** Slug of the node that declared this dependency, for diagnostics */
  requiredBy?: string;
}
