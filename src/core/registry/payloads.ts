import type {
  DependencyKind,
  Project,
  SearchHit,
  Version,
  VersionDependency,
  VersionFile
} from '../../types/index.js';
import { RegistryError } from '../../utils/errors.js';

/**
 * Mapping of raw registry JSON onto the application's domain types.
 *
 * Required fields that are missing or mistyped make the whole payload invalid;
 * optional fields fall back to empty values.
 */

const DEPENDENCY_KINDS: readonly DependencyKind[] = ['required', 'optional', 'incompatible', 'embedded'];

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(what: string, field: string): RegistryError {
  return new RegistryError(`Invalid ${what} payload: missing or malformed '${field}'`, 'invalid-response');
}

function requireString(record: JsonRecord, field: string, what: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw invalid(what, field);
  }
  return value;
}

function optionalString(record: JsonRecord, field: string): string | undefined {
  const value = record[field];
  return typeof value === 'string' ? value : undefined;
}

function stringArray(record: JsonRecord, field: string): string[] {
  const value = record[field];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

export function parseProject(raw: unknown): Project {
  if (!isRecord(raw)) {
    throw invalid('project', '<root>');
  }

  const project: Project = {
    id: requireString(raw, 'id', 'project'),
    slug: requireString(raw, 'slug', 'project'),
    title: optionalString(raw, 'title') ?? requireString(raw, 'slug', 'project')
  };
  const description = optionalString(raw, 'description');
  if (description !== undefined) project.description = description;
  const projectType = optionalString(raw, 'project_type');
  if (projectType !== undefined) project.projectType = projectType;
  return project;
}

function parseFile(raw: unknown): VersionFile {
  if (!isRecord(raw)) {
    throw invalid('file', '<root>');
  }

  const file: VersionFile = {
    url: requireString(raw, 'url', 'file'),
    filename: requireString(raw, 'filename', 'file'),
    size: typeof raw.size === 'number' && raw.size >= 0 ? raw.size : 0,
    primary: raw.primary === true
  };

  if (isRecord(raw.hashes)) {
    const sha1 = optionalString(raw.hashes, 'sha1');
    const sha512 = optionalString(raw.hashes, 'sha512');
    if (sha1 !== undefined || sha512 !== undefined) {
      file.hashes = {
        ...(sha1 !== undefined && { sha1 }),
        ...(sha512 !== undefined && { sha512 })
      };
    }
  }

  return file;
}

function parseDependency(raw: unknown): VersionDependency | null {
  if (!isRecord(raw)) {
    return null;
  }

  const kind = DEPENDENCY_KINDS.find(k => k === raw.dependency_type);
  if (!kind) {
    return null;
  }

  return {
    projectId: optionalString(raw, 'project_id') ?? null,
    versionId: optionalString(raw, 'version_id') ?? null,
    kind
  };
}

export function parseVersion(raw: unknown): Version {
  if (!isRecord(raw)) {
    throw invalid('version', '<root>');
  }

  const versionNumber = requireString(raw, 'version_number', 'version');
  const dependencies = Array.isArray(raw.dependencies)
    ? raw.dependencies.map(parseDependency).filter((dep): dep is VersionDependency => dep !== null)
    : [];
  const files = Array.isArray(raw.files) ? raw.files.map(parseFile) : [];

  return {
    id: requireString(raw, 'id', 'version'),
    projectId: requireString(raw, 'project_id', 'version'),
    versionNumber,
    name: optionalString(raw, 'name') ?? versionNumber,
    gameVersions: stringArray(raw, 'game_versions'),
    loaders: stringArray(raw, 'loaders'),
    versionType: optionalString(raw, 'version_type') ?? 'release',
    datePublished: optionalString(raw, 'date_published') ?? '',
    dependencies,
    files
  };
}

export function parseVersionList(raw: unknown): Version[] {
  if (!Array.isArray(raw)) {
    throw invalid('version list', '<root>');
  }
  return raw.map(parseVersion);
}

export function parseSearchHits(raw: unknown): SearchHit[] {
  if (!isRecord(raw) || !Array.isArray(raw.hits)) {
    throw invalid('search', 'hits');
  }

  return raw.hits.filter(isRecord).map(hit => {
    const result: SearchHit = {
      projectId: requireString(hit, 'project_id', 'search hit'),
      slug: requireString(hit, 'slug', 'search hit'),
      title: optionalString(hit, 'title') ?? '',
      description: optionalString(hit, 'description') ?? '',
      downloads: typeof hit.downloads === 'number' ? hit.downloads : 0
    };
    const latestVersion = optionalString(hit, 'latest_version');
    if (latestVersion !== undefined) result.latestVersion = latestVersion;
    return result;
  });
}
