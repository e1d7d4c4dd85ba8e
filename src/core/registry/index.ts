export { RegistryClient, type RegistryClientOptions } from './registry-client.js';
export { ResponseCache, buildCacheKey } from './response-cache.js';
export { extractSlug, isUrlInput } from './project-url.js';
export { parseProject, parseVersion, parseVersionList, parseSearchHits } from './payloads.js';
