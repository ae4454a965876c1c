import { existsSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const repoRoot = join(__dirname, '..', '..');

function resolveSchemaRoot(): string {
  const envSchemaDir = process.env.COORDINATOR_SCHEMA_DIR ? resolve(process.env.COORDINATOR_SCHEMA_DIR) : null;
  if (envSchemaDir) {
    return envSchemaDir;
  }

  const candidates = [
    join(repoRoot, 'schemas'),
    // compiled layout: dist/src/utils -> <root>/schemas
    join(repoRoot, '..', 'schemas'),
    join(process.cwd(), 'schemas')
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return join(repoRoot, 'schemas');
}

export function resolveSchemaPath(...parts: string[]): string {
  return join(resolveSchemaRoot(), ...parts);
}
