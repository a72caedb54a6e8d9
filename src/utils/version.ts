/**
 * Version lookup
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const FALLBACK_VERSION = '0.0.0';

const PackageJsonSchema = z.object({ version: z.string().optional() });

/**
 * Version of this package, read from its package.json
 */
export function getVersion(): string {
  try {
    const packageJsonPath = path.join(__dirname, '../../package.json');
    const pkg = PackageJsonSchema.parse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf8')));
    return pkg.version ?? FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
}
