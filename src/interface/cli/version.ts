/**
 * Version utility - reads version from package.json
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const packageSchema = z.object({ version: z.string() });

let cachedVersion: string | null = null;

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  // src/interface/cli/ and dist/interface/cli/ are both three levels below the root
  const thisDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = resolve(thisDir, '..', '..', '..', 'package.json');

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  } catch {
    return '0.0.0';
  }

  const parsed = packageSchema.safeParse(raw);
  cachedVersion = parsed.success ? parsed.data.version : '0.0.0';
  return cachedVersion;
}
