import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/**
 * Read `version` from a package.json located relative to this module.
 */
function readPackageVersion(relativePath: string): string | undefined {
  try {
    const pkgPath = fileURLToPath(new URL(relativePath, import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Service version reported by /healthz and the shell banner.
 *
 * SERVICE_VERSION overrides; otherwise package.json is found one level up
 * (running from src/) or two levels up (running from dist/src/).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  readPackageVersion('../package.json') ??
  readPackageVersion('../../package.json') ??
  '0.0.0';
