import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';

/**
 * Load KEY=VALUE pairs from a dotenv file without overriding the real environment
 */
export function loadEnvFromFile(envPath = '.env', env: NodeJS.ProcessEnv = process.env): number {
  const resolvedPath = resolve(envPath);
  if (!existsSync(resolvedPath)) {
    return 0;
  }

  let loaded = 0;
  const content = readFileSync(resolvedPath, 'utf-8');
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const cleaned = line.startsWith('export ') ? line.slice(7).trim() : line;
    const eqIndex = cleaned.indexOf('=');
    if (eqIndex === -1) continue;

    const key = cleaned.slice(0, eqIndex).trim();
    let value = cleaned.slice(eqIndex + 1).trim();

    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    if (!key || key in env) continue;
    env[key] = value;
    loaded++;
  }

  return loaded;
}
