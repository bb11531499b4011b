/**
 * Version utility - reads version from package.json
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

let cachedVersion: string | null = null;

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  try {
    // src/interface/cli/ and dist/interface/cli/ are both three levels below the root
    const thisDir = dirname(fileURLToPath(import.meta.url));
    const pkgPath = resolve(thisDir, '..', '..', '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      cachedVersion = pkg.version;
      return cachedVersion;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
