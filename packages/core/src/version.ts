/**
 * Roster version, read from @roster/core's package.json at module load.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readManifest(): unknown {
  try {
    return JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  } catch {
    // Running from dist/; the manifest stays in the source tree
    const srcPath = join(__dirname, '..', '..', '..', '..', 'packages', 'core', 'package.json');
    return JSON.parse(readFileSync(srcPath, 'utf-8'));
  }
}

function readVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Full version string (e.g. "0.1.0") */
export const ROSTER_VERSION: string = readVersion(readManifest());
