import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

// The package root is one level up from both core/ and dist/
function readVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
  if (!existsSync(packageJsonPath)) {
    return '0.0.0';
  }
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

export const version = readVersion();
