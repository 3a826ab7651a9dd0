/**
 * Project version utilities
 *
 * Reads the tool's own version from package.json so the CLI `--version` stays in sync.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

let cachedVersion: string | null = null;

const PACKAGE_JSON_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../package.json'
);

const PackageJsonSchema = z.object({ version: z.string().min(1) });

export function getProjectVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  const result = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(PACKAGE_JSON_PATH, 'utf-8')));
  if (!result.success) {
    throw new Error('package.json missing version');
  }

  cachedVersion = result.data.version;
  return cachedVersion;
}
