import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

let cachedVersion: string | undefined;

/**
 * Version from this package's package.json (two levels up from both
 * src/utils and dist/utils).
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  try {
    const manifestPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
    cachedVersion =
      typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string'
        ? manifest.version
        : '0.0.0';
  } catch {
    cachedVersion = '0.0.0';
  }
  return cachedVersion;
}
