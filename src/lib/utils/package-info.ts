import { readFileSync } from 'fs';
import { join } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Tries several relative paths because this file runs both from src/ and dist/src/.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = { name: 'nginx-le-helper', version: '0.0.0-dev' };

  const candidates = [
    '../../../package.json', // from src/lib/utils/
    '../../../../package.json', // from dist/src/lib/utils/
  ];

  for (const rel of candidates) {
    try {
      const raw = JSON.parse(readFileSync(join(__dirname, rel), 'utf-8')) as {
        name?: string;
        version?: string;
      };
      if (raw.name !== defaults.name) continue;
      cachedPkg = { name: raw.name, version: raw.version || defaults.version };
      return cachedPkg;
    } catch {
      // try next
    }
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** User-Agent sent with reachability checks */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
