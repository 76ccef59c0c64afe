import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import fetch, { FetchError, Response } from 'node-fetch';
import type { FetchResult } from './types';
import { DEFAULT_FETCH_TIMEOUT_MS } from '../config';
import { ensureDir, removeQuietly, uniqueFilePath } from '../scratch';
import { formatError } from '../errors';
import { log } from '../log';

// Last segment of the URL path, '' when there is none.
export function feedFileName(url: string): string {
  try {
    return path.posix.basename(new URL(url).pathname);
  } catch {
    return '';
  }
}

/**
 * Downloads `url` into `scratchDir` under a name no other file there uses.
 * One attempt. A single deadline of `timeoutMs` covers the response and the
 * whole body; a feed still streaming when it passes is aborted.
 */
export async function downloadFeed(
  url: string,
  scratchDir: string,
  opts: { timeoutMs?: number } = {},
): Promise<FetchResult> {
  const fileName = feedFileName(url);
  if (!fileName) {
    log.error(`Url ${url} not valid`);
    return { ok: false, reason: 'invalid-url', error: `no file name in ${url}` };
  }

  log.info(`Downloading: ${url}`);
  const started = Date.now();
  const timeoutMs = opts.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  let target: string | undefined;
  try {
    let res: Response;
    try {
      res = await fetch(url, { signal: controller.signal });
    } catch (e) {
      log.error(`Error during download of ${url} (after ${Date.now() - started} ms)`, e);
      return { ok: false, reason: timedOut ? 'timeout' : 'network', error: formatError(e) };
    }
    if (!res.ok) {
      log.error(`Error during download of ${url}: HTTP ${res.status}`);
      return { ok: false, reason: 'http-status', error: `HTTP ${res.status} ${res.statusText}`, status: res.status };
    }

    try {
      ensureDir(scratchDir);
      target = uniqueFilePath(scratchDir, fileName);
      await pipeline(res.body, fs.createWriteStream(target));
      const elapsedMs = Date.now() - started;
      const bytes = fs.statSync(target).size;
      log.info(`File ${target} successfully saved (${bytes} bytes in ${elapsedMs} ms)`);
      return { ok: true, path: target, bytes, elapsedMs };
    } catch (e) {
      if (target) removeQuietly(target);
      if (timedOut || e instanceof FetchError) {
        log.error(`Error during download of ${url} (after ${Date.now() - started} ms)`, e);
        return { ok: false, reason: timedOut ? 'timeout' : 'network', error: formatError(e) };
      }
      log.error(`Error in writing ${url} data to file ${target ?? scratchDir}`, e);
      return { ok: false, reason: 'write', error: formatError(e) };
    }
  } finally {
    clearTimeout(timer);
  }
}
