import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const FALLBACK: PackageInfo = { name: 'handin', version: '0.0.0', description: '' };

/**
 * Finds our own package.json by walking up from this file, so the lookup works
 * from both src/ and dist/.
 */
export function getPackageInfo(startDir = dirname(fileURLToPath(import.meta.url))): PackageInfo {
  let dir = startDir;

  while (true) {
    try {
      const content = readFileSync(join(dir, 'package.json'), 'utf-8');
      const pkg = JSON.parse(content) as Record<string, unknown>;
      if (typeof pkg.version === 'string') {
        return {
          name: typeof pkg.name === 'string' ? pkg.name : FALLBACK.name,
          version: pkg.version,
          description: typeof pkg.description === 'string' ? pkg.description : '',
        };
      }
    } catch {
      // No readable package.json here; keep walking up
    }

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return FALLBACK;
}
