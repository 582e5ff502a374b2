import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageManifest = z.object({ version: z.string() });

function readVersion(relative: string): string | undefined {
  const pkgPath = new URL(relative, import.meta.url);
  const parsed = PackageManifest.safeParse(JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8')));
  return parsed.success ? parsed.data.version : undefined;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json, with an env override. Used by /healthz.
 * Resolved relative to this file so both src/ (tsx, vitest) and dist/src/ work.
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    try {
      return readVersion('../package.json') ?? '0.0.0';
    } catch {
      // dist/src/version.js sits one level deeper
      try {
        return readVersion('../../package.json') ?? '0.0.0';
      } catch {
        return '0.0.0';
      }
    }
  })();
