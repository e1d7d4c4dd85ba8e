/**
 * In-memory PackageRegistry for resolver, installer and scheduler tests.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { PackageRegistry, Project, Version, VersionDependency, VersionFile, VersionFilters } from '../../src/types/index.js';
import { RegistryError } from '../../src/utils/errors.js';

export const GAME_VERSION = '1.20.1';
export const LOADER = 'fabric';

export interface VersionSpec {
  versionNumber: string;
  gameVersions?: string[];
  loaders?: string[];
  versionType?: string;
  datePublished?: string;
  dependencies?: VersionDependency[];
  files?: VersionFile[];
}

export function projectId(slug: string): string {
  return `P-${slug}`;
}

export function artifact(slug: string, versionNumber: string, overrides: Partial<VersionFile> = {}): VersionFile {
  return {
    url: `https://cdn.example.test/${slug}/${versionNumber}.jar`,
    filename: `${slug}-${versionNumber}.jar`,
    size: 2048,
    primary: true,
    ...overrides
  };
}

export function makeVersion(slug: string, spec: VersionSpec): Version {
  return {
    id: `V-${slug}-${spec.versionNumber}`,
    projectId: projectId(slug),
    versionNumber: spec.versionNumber,
    name: spec.versionNumber,
    gameVersions: spec.gameVersions ?? [GAME_VERSION],
    loaders: spec.loaders ?? [LOADER],
    versionType: spec.versionType ?? 'release',
    datePublished: spec.datePublished ?? '2024-01-01T00:00:00.000Z',
    dependencies: spec.dependencies ?? [],
    files: spec.files ?? [artifact(slug, spec.versionNumber)]
  };
}

export function requires(slug: string): VersionDependency {
  return { projectId: projectId(slug), versionId: null, kind: 'required' };
}

export function optional(slug: string): VersionDependency {
  return { projectId: projectId(slug), versionId: null, kind: 'optional' };
}

export class FakeRegistry implements PackageRegistry {
  private readonly projects = new Map<string, Project>();
  private readonly versions = new Map<string, Version[]>();
  /** Project refs whose lookup fails with a network error */
  readonly unreachable = new Set<string>();
  /** File names whose download reports failure */
  readonly failingDownloads = new Set<string>();
  readonly downloads: string[] = [];
  readonly projectLookups: string[] = [];

  /** Register a project (slug `slug`, id `P-<slug>`) with its versions */
  add(slug: string, ...specs: VersionSpec[]): this {
    const project: Project = { id: projectId(slug), slug, title: slug.toUpperCase() };
    this.projects.set(slug, project);
    this.projects.set(project.id, project);
    this.versions.set(project.id, specs.map(spec => makeVersion(slug, spec)));
    return this;
  }

  /** Append a version to an already registered project */
  publish(slug: string, spec: VersionSpec): void {
    const list = this.versions.get(projectId(slug)) ?? [];
    list.push(makeVersion(slug, spec));
    this.versions.set(projectId(slug), list);
  }

  async getProject(idOrSlug: string): Promise<Project> {
    this.projectLookups.push(idOrSlug);
    if (this.unreachable.has(idOrSlug)) {
      throw new RegistryError(`Network error requesting ${idOrSlug}`, 'network');
    }
    const project = this.projects.get(idOrSlug);
    if (!project) {
      throw new RegistryError(`Project not found: ${idOrSlug}`, 'not-found', { status: 404 });
    }
    return project;
  }

  async getVersions(slug: string, _filters?: VersionFilters): Promise<Version[]> {
    const project = await this.getProject(slug);
    return [...(this.versions.get(project.id) ?? [])];
  }

  async getVersion(versionId: string): Promise<Version> {
    for (const list of this.versions.values()) {
      const match = list.find(version => version.id === versionId);
      if (match) return match;
    }
    throw new RegistryError(`Not found: version ${versionId}`, 'not-found', { status: 404 });
  }

  async download(file: VersionFile, destPath: string): Promise<boolean> {
    if (this.failingDownloads.has(file.filename)) {
      return false;
    }
    await mkdir(dirname(destPath), { recursive: true });
    await writeFile(destPath, `content of ${file.filename}`);
    this.downloads.push(file.filename);
    return true;
  }
}
