import { RESOLVER } from '../../constants/index.js';
import type { DependencyKind, PackageRegistry, Project } from '../../types/index.js';
import { RegistryError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { filterCompatibleVersions, selectInstallableFile } from '../compatibility.js';
import type { DependencyResolverOptions, ResolutionNode, WorkItem } from './types.js';

/**
 * Resolves a package's transitive dependency graph into an install plan.
 *
 * The walk uses an explicit work stack instead of recursion and yields the
 * same pre-order a recursive walk would: every parent before its children,
 * children in declaration order. Each project id is visited at most once per
 * `resolve` call.
 */
export class DependencyResolver {
  private readonly includeOptional: boolean;
  private readonly preferStable: boolean;
  private readonly maxNodes: number;

  constructor(
    private readonly registry: PackageRegistry,
    options: DependencyResolverOptions = {}
  ) {
    this.includeOptional = options.includeOptionalDependencies ?? true;
    this.preferStable = options.preferStable ?? true;
    this.maxNodes = options.maxNodes ?? RESOLVER.DEFAULT_MAX_NODES;
  }

  /**
   * Build the ordered, deduplicated plan for `rootSlug`.
   *
   * An empty plan means the root has no compatible version. Registry errors
   * for the root propagate; for any other node they drop that branch only.
   */
  async resolve(rootSlug: string, gameVersion: string, loader: string): Promise<ResolutionNode[]> {
    const plan: ResolutionNode[] = [];
    const visited = new Set<string>();
    const stack: WorkItem[] = [{ ref: rootSlug, projectId: null, versionId: null, isRoot: true }];

    while (stack.length > 0) {
      const item = stack.pop();
      if (!item) break;

      if (plan.length >= this.maxNodes) {
        logger.warn(`Dependency graph of '${rootSlug}' exceeds ${this.maxNodes} packages; remaining dependencies skipped`);
        break;
      }

      let children: WorkItem[];
      try {
        children = await this.visit(item, gameVersion, loader, visited, plan);
      } catch (error) {
        if (item.isRoot || !(error instanceof RegistryError)) {
          throw error;
        }
        logger.warn(`Could not resolve dependency ${describeItem(item)}: ${error.message}`);
        continue;
      }

      // Reverse so the first declared dependency is expanded first
      stack.push(...children.reverse());
    }

    logger.debug(`Resolved ${plan.length} package(s) for '${rootSlug}'`, {
      plan: plan.map(node => `${node.project.slug}@${node.version.versionNumber}`)
    });
    return plan;
  }

  /**
   * Process one work item: append its node to the plan and return the
   * dependencies still to walk.
   */
  private async visit(
    item: WorkItem,
    gameVersion: string,
    loader: string,
    visited: Set<string>,
    plan: ResolutionNode[]
  ): Promise<WorkItem[]> {
    if (item.projectId && visited.has(item.projectId)) {
      return [];
    }

    const project = await this.loadProject(item);
    if (!project || visited.has(project.id)) {
      return [];
    }
    visited.add(project.id);

    const versions = await this.registry.getVersions(project.slug, {
      gameVersions: [gameVersion],
      loaders: [loader]
    });
    const compatible = filterCompatibleVersions(versions, gameVersion, loader, { preferStable: this.preferStable });
    const best = compatible[0];
    if (!best) {
      logger.warn(`No compatible version of '${project.slug}' for ${gameVersion}/${loader}`);
      return [];
    }

    plan.push({ project, version: best, file: selectInstallableFile(best) });

    return best.dependencies
      .filter(dep => this.shouldFollow(dep.kind))
      .filter(dep => dep.projectId !== null || dep.versionId !== null)
      .filter(dep => dep.projectId === null || !visited.has(dep.projectId))
      .map(dep => ({
        ref: dep.projectId,
        projectId: dep.projectId,
        versionId: dep.versionId,
        isRoot: false,
        requiredBy: project.slug
      }));
  }

  private async loadProject(item: WorkItem): Promise<Project | null> {
    if (item.ref) {
      return this.registry.getProject(item.ref);
    }
    if (item.versionId) {
      // Dependency pinned by version only: learn its project from the version
      const pinned = await this.registry.getVersion(item.versionId);
      return this.registry.getProject(pinned.projectId);
    }
    return null;
  }

  private shouldFollow(kind: DependencyKind): boolean {
    return kind === 'required' || (kind === 'optional' && this.includeOptional);
  }
}

function describeItem(item: WorkItem): string {
  const ref = item.ref ?? `version ${item.versionId ?? '?'}`;
  return item.requiredBy ? `${ref} (required by ${item.requiredBy})` : ref;
}
