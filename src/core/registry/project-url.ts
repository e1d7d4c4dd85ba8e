import { REGISTRY } from '../../constants/index.js';
import { RegistryError } from '../../utils/errors.js';

const PROJECT_URL_KINDS: readonly string[] = REGISTRY.PROJECT_URL_KINDS;

export function isUrlInput(input: string): boolean {
  return /^https?:\/\//i.test(input.trim());
}

/**
 * Normalize a project reference to a slug (or id).
 *
 * Plain input is returned trimmed. A URL must point at `host` (or one of its
 * subdomains) and have the form `/<kind>/<slug>[/...]`.
 *
 * @example
 * extractSlug('https://modrinth.com/mod/sodium/versions', 'modrinth.com') // => 'sodium'
 */
export function extractSlug(input: string, host: string = REGISTRY.DEFAULT_HOST): string {
  const trimmed = input.trim();
  if (!isUrlInput(trimmed)) {
    return trimmed;
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch (error) {
    throw new RegistryError(`Could not parse URL: ${input}`, 'invalid-url', { cause: error });
  }

  const hostname = parsed.hostname.toLowerCase();
  const expected = host.toLowerCase();
  if (hostname !== expected && !hostname.endsWith(`.${expected}`)) {
    throw new RegistryError(`Unsupported URL: ${input} (expected a ${host} link)`, 'invalid-url');
  }

  const [kind, slug] = parsed.pathname.split('/').filter(Boolean);
  if (!kind || !slug || !PROJECT_URL_KINDS.includes(kind)) {
    throw new RegistryError(`Could not extract a project slug from URL: ${input}`, 'invalid-url');
  }

  return decodeURIComponent(slug);
}
