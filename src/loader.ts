/**
 * Template acquisition from a directory search path.
 */
import fs from 'fs';
import path from 'path';

import { FillInError } from './errors.js';

/** Reserved template name that loads as an empty template. */
export const NULL_TEMPLATE = 'null';

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate a template file. Absolute names are taken as-is; relative names
 * are tried against each directory of `searchPath` in order.
 *
 * @returns The path of the first regular file found, or undefined
 */
export function findTemplateFile(
  name: string,
  searchPath: string[],
): string | undefined {
  if (path.isAbsolute(name)) return isFile(name) ? name : undefined;
  for (const dir of searchPath) {
    const candidate = path.join(dir, name);
    if (isFile(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Read the text of the named template.
 *
 * @throws FillInError `TEMPLATE_NOT_FOUND` if no directory holds the file
 * @throws FillInError `TEMPLATE_UNREADABLE` if the file cannot be read
 */
export function loadTemplate(name: string, searchPath: string[]): string {
  if (name === NULL_TEMPLATE) return '';

  const file = findTemplateFile(name, searchPath);
  if (!file) {
    throw new FillInError(
      `Can't find file '${name}' in ${searchPath.join(' ')}`,
      'TEMPLATE_NOT_FOUND',
      name,
    );
  }

  try {
    return fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new FillInError(
      `Can't open ${file}: ${err instanceof Error ? err.message : String(err)}`,
      'TEMPLATE_UNREADABLE',
      file,
    );
  }
}
