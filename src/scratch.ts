import fs from 'fs';
import path from 'path';
import { log } from './log';
import { formatError } from './errors';

export function ensureDir(p: string): void {
  fs.mkdirSync(p, { recursive: true });
}

/**
 * Free path for `fileName` inside `dir`. A taken name gets `(n)` inserted
 * before its extension: `epg.xml.gz` -> `epg.xml(1).gz` -> `epg.xml(2).gz`.
 */
export function uniqueFilePath(dir: string, fileName: string): string {
  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);
  let candidate = path.join(dir, fileName);
  for (let i = 1; fs.existsSync(candidate); i++) {
    candidate = path.join(dir, `${base}(${i})${ext}`);
  }
  return candidate;
}

// Best effort: a file that cannot be removed is logged and left behind.
export function removeQuietly(p: string): boolean {
  try {
    fs.rmSync(p, { force: true, recursive: true });
    return true;
  } catch (e) {
    log.error(`File ${p} cannot be deleted`, e);
    return false;
  }
}

/**
 * Creates `dir` when missing and removes everything inside it.
 * Returns the entries that could not be removed.
 */
export function clearScratchDir(dir: string): string[] {
  let entries: string[];
  try {
    ensureDir(dir);
    entries = fs.readdirSync(dir);
  } catch (e) {
    log.error(`Temp directory ${dir} cannot be read: ${formatError(e)}`);
    return [];
  }
  const leftovers = entries.filter(entry => !removeQuietly(path.join(dir, entry)));
  log.info(leftovers.length ? `Temp directory ${dir} cleaned, ${leftovers.length} file(s) left` : `Temp directory ${dir} cleaned`);
  return leftovers;
}
