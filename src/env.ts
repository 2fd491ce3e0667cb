import fs from 'fs/promises';
import path from 'path';

function unquote(value: string): string {
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseDotEnv(content: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const withoutExport = trimmed.startsWith('export ') ? trimmed.slice('export '.length) : trimmed;
    const idx = withoutExport.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = withoutExport.slice(0, idx).trim();
    entries.push([key, unquote(withoutExport.slice(idx + 1).trim())]);
  }
  return entries;
}

/**
 * Copies `.env` entries into `env` without overriding variables that are
 * already set. Returns the keys it applied; a missing file applies nothing.
 */
export async function loadDotEnv(
  envPath: string = path.join(process.cwd(), '.env'),
  env: Record<string, string | undefined> = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const applied: string[] = [];
  for (const [key, value] of parseDotEnv(content)) {
    if (!env[key]) {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}
