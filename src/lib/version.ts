/**
 * Runtime package version, read from the package.json that ships beside
 * the compiled code (dist/lib -> ../../package.json, same from src/lib).
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { debugLog } from '../utils/debug.js';

let cachedVersion: string | undefined;

export function getRuntimePackageVersion(): string {
  if (cachedVersion !== undefined) return cachedVersion;

  const packagePath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      cachedVersion = pkg.version;
      return cachedVersion;
    }
  } catch (err) {
    debugLog('version', `could not read ${packagePath}`, err);
  }

  cachedVersion = 'unknown';
  return cachedVersion;
}
