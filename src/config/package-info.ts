import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PACKAGE_JSON_SCHEMA = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof PACKAGE_JSON_SCHEMA>;

// Nearest package.json above this module; the bundle and the sources sit at different depths
function findPackageJson(startDir: string): string {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`package.json not found above ${startDir}`);
    }
    dir = parent;
  }
}

export const PACKAGE_INFO: PackageInfo = PACKAGE_JSON_SCHEMA.parse(
  JSON.parse(readFileSync(findPackageJson(path.dirname(fileURLToPath(import.meta.url))), 'utf-8'))
);
