import fs from 'fs';
import path from 'path';
import zlib from 'zlib';
import { pipeline } from 'stream/promises';
import type { DecodeResult } from './types';
import { removeQuietly, uniqueFilePath } from '../scratch';
import { formatError } from '../errors';
import { log } from '../log';

export function isGzipPath(file: string): boolean {
  return file.toLowerCase().endsWith('.gz');
}

/**
 * Gunzips a staged `.gz` file into its sibling without the suffix and drops
 * the archive. Any other path is returned as it is.
 */
export async function decodeFeed(stagedPath: string): Promise<DecodeResult> {
  if (!isGzipPath(stagedPath)) return { ok: true, path: stagedPath, compressed: false };

  const dir = path.dirname(stagedPath);
  const target = uniqueFilePath(dir, path.basename(stagedPath).slice(0, -'.gz'.length));
  log.info(`Extract: ${stagedPath}`);
  try {
    await pipeline(fs.createReadStream(stagedPath), zlib.createGunzip(), fs.createWriteStream(target));
  } catch (e) {
    log.error(`It was not possible to extract ${stagedPath}`, e);
    removeQuietly(target);
    return { ok: false, reason: 'decompress', error: formatError(e) };
  }
  removeQuietly(stagedPath);
  log.info(`File extracted: ${target}`);
  return { ok: true, path: target, compressed: true };
}
