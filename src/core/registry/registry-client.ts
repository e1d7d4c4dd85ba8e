import { createWriteStream } from 'fs';
import { dirname } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { FILE_PATTERNS, REGISTRY } from '../../constants/index.js';
import type {
  PackageRegistry,
  Project,
  SearchHit,
  SearchOptions,
  Version,
  VersionFile,
  VersionFilters
} from '../../types/index.js';
import { RegistryError } from '../../utils/errors.js';
import { ensureDir, remove, renamePath } from '../../utils/fs.js';
import { HttpClient } from '../../utils/http-client.js';
import { logger } from '../../utils/logger.js';
import { extractSlug } from './project-url.js';
import { parseProject, parseSearchHits, parseVersion, parseVersionList } from './payloads.js';
import { buildCacheKey, ResponseCache } from './response-cache.js';

export interface RegistryClientOptions {
  http: HttpClient;
  cacheTtlMs: number;
  downloadTimeoutMs: number;
  /** Host that project URLs must point at */
  registryHost?: string;
  now?: () => number;
}

/**
 * Client for a Modrinth-compatible registry API.
 *
 * Reads go through a TTL cache keyed by endpoint and sorted query parameters;
 * the cache holds raw JSON and parsing happens on every read.
 */
export class RegistryClient implements PackageRegistry {
  private readonly http: HttpClient;
  private readonly cache: ResponseCache;
  private readonly downloadTimeoutMs: number;
  private readonly registryHost: string;

  constructor(options: RegistryClientOptions) {
    this.http = options.http;
    this.cache = new ResponseCache(options.cacheTtlMs, options.now);
    this.downloadTimeoutMs = options.downloadTimeoutMs;
    this.registryHost = options.registryHost ?? REGISTRY.DEFAULT_HOST;
  }

  normalizeSlug(slugOrUrl: string): string {
    return extractSlug(slugOrUrl, this.registryHost);
  }

  async getProject(slugOrUrl: string): Promise<Project> {
    const slug = this.normalizeSlug(slugOrUrl);
    try {
      return parseProject(await this.request(`project/${encodeURIComponent(slug)}`));
    } catch (error) {
      if (error instanceof RegistryError && error.reason === 'not-found') {
        throw new RegistryError(`Project not found: ${slug}`, 'not-found', { status: error.status });
      }
      throw error;
    }
  }

  async getVersions(slugOrUrl: string, filters: VersionFilters = {}): Promise<Version[]> {
    const slug = this.normalizeSlug(slugOrUrl);
    const params: Record<string, string> = {};
    if (filters.gameVersions?.length) {
      params.game_versions = JSON.stringify(filters.gameVersions);
    }
    if (filters.loaders?.length) {
      params.loaders = JSON.stringify(filters.loaders);
    }
    return parseVersionList(await this.request(`project/${encodeURIComponent(slug)}/version`, params));
  }

  async getVersion(versionId: string): Promise<Version> {
    return parseVersion(await this.request(`version/${encodeURIComponent(versionId)}`));
  }

  async searchProjects(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    const facets: string[][] = [];
    for (const gameVersion of options.gameVersions ?? []) {
      facets.push([`versions:${gameVersion}`]);
    }
    if (options.loaders?.length) {
      facets.push(options.loaders.map(loader => `categories:${loader}`));
    }

    const params: Record<string, string> = {
      query,
      limit: String(options.limit ?? REGISTRY.DEFAULT_SEARCH_LIMIT)
    };
    if (facets.length > 0) {
      params.facets = JSON.stringify(facets);
    }
    return parseSearchHits(await this.request('search', params));
  }

  /**
   * Stream a file to `destPath`.
   *
   * Bytes land in a `.part` sibling that is renamed once complete. Returns
   * false on any failure so the caller decides whether to abort.
   */
  async download(file: VersionFile, destPath: string): Promise<boolean> {
    const partPath = `${destPath}${FILE_PATTERNS.PARTIAL_DOWNLOAD_SUFFIX}`;
    logger.info(`Downloading ${file.filename}`);

    try {
      await ensureDir(dirname(destPath));
      await this.http.stream(
        file.url,
        async (response) => {
          if (!response.body) {
            throw new RegistryError(`Empty response body for ${file.url}`, 'invalid-response');
          }
          await pipeline(Readable.fromWeb(response.body), createWriteStream(partPath));
        },
        { timeoutMs: this.downloadTimeoutMs }
      );
      await renamePath(partPath, destPath);
      logger.info(`Downloaded ${file.filename} -> ${destPath}`);
      return true;
    } catch (error) {
      logger.error(`Failed to download ${file.filename}`, { url: file.url, error });
      await this.discardPartial(partPath);
      return false;
    }
  }

  private async request(endpoint: string, params?: Record<string, string>): Promise<unknown> {
    const key = buildCacheKey(endpoint, params);
    return this.cache.getOrLoad(key, () => this.http.getJson(endpoint, params));
  }

  private async discardPartial(partPath: string): Promise<void> {
    try {
      await remove(partPath);
    } catch (error) {
      logger.warn(`Could not remove partial download ${partPath}`, { error });
    }
  }
}
