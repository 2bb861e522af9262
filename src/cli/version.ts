import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Two levels up from both src/cli and dist/cli.
const PACKAGE_JSON = fileURLToPath(new URL('../../package.json', import.meta.url));

const PackageSchema = z.object({ version: z.string() }).passthrough();

let cached: string | null = null;

export function getPackageVersion(): string {
  if (cached === null) {
    cached = PackageSchema.parse(JSON.parse(readFileSync(PACKAGE_JSON, 'utf-8'))).version;
  }
  return cached;
}
