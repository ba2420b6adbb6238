import fs from 'fs';
import path from 'path';

/**
 * Read the requested keys from a `.env` file in the working directory.
 *
 * Only keys listed in `keys` are returned, so unrelated entries never leak
 * into the process. A missing or unreadable file yields an empty record.
 * Values may be wrapped in single or double quotes.
 */
export function readEnvFile(
  keys: string[],
  file: string = path.join(process.cwd(), '.env'),
): Record<string, string> {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch {
    return {};
  }

  const wanted = new Set(keys);
  const result: Record<string, string> = {};
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq === -1) continue;
    const key = line.slice(0, eq).trim();
    if (!wanted.has(key)) continue;
    let value = line.slice(eq + 1).trim();
    if (
      value.length >= 2 &&
      (value[0] === '"' || value[0] === "'") &&
      value[value.length - 1] === value[0]
    ) {
      value = value.slice(1, -1);
    }
    result[key] = value;
  }
  return result;
}
