import fs from 'fs';
import path from 'path';

function unquote(value: string): string {
  const first = value[0];
  if ((first === '"' || first === "'") && value.length >= 2 && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Values for `keys` from a dotenv-style file (default `./.env`). Accepts
 * `KEY=value`, `export KEY=value` and quoted values; blank values are
 * dropped. A missing or unreadable file yields `{}`. process.env is left
 * alone: Config decides precedence.
 */
export function readEnvFile(
  keys: readonly string[],
  envFile: string = path.join(process.cwd(), '.env'),
): Record<string, string> {
  let content: string;
  try {
    content = fs.readFileSync(envFile, 'utf-8');
  } catch {
    return {};
  }

  const wanted = new Set(keys);
  const result: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim().replace(/^export\s+/, '');
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    if (!wanted.has(key)) continue;

    const value = unquote(line.slice(eq + 1).trim());
    if (value) result[key] = value;
  }
  return result;
}
