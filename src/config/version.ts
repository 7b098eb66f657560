import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PACKAGE_JSON_SCHEMA = z.object({
  version: z.string(),
});

let cachedVersion: string | undefined;

// Nearest package.json above a directory; works from src/ and from the bundled dist/
function findPackageJson(startDir: string): string | undefined {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

export function getPackageVersion(): string {
  if (cachedVersion === undefined) {
    const pkgPath = findPackageJson(path.dirname(fileURLToPath(import.meta.url)));
    if (!pkgPath) {
      cachedVersion = '0.0.0';
    } else {
      const raw: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      cachedVersion = PACKAGE_JSON_SCHEMA.parse(raw).version;
    }
  }
  return cachedVersion;
}
