import type { Extraction, XmlElement } from './types';
import { log } from '../log';

/** State shared by every feed of one run. `processed` only ever grows. */
export interface MergeContext {
  processed: Set<string>;
  channels: XmlElement[];
  programmes: XmlElement[];
}

export function createMergeContext(): MergeContext {
  return { processed: new Set(), channels: [], programmes: [] };
}

/** Splits `channelIds` into those still free and those an earlier feed already supplied. */
export function claimChannels(ctx: MergeContext, channelIds: readonly string[]): { toProcess: string[]; duplicates: string[] } {
  const toProcess: string[] = [];
  const duplicates: string[] = [];
  for (const id of channelIds) {
    if (ctx.processed.has(id)) {
      duplicates.push(id);
      log.info(`Channel ${id} skipped: duplicated`);
    } else {
      toProcess.push(id);
    }
  }
  return { toProcess, duplicates };
}

/**
 * Folds a successful extraction into the run. Every requested id becomes
 * processed, found or not, so no later feed can claim it.
 */
export function commitFeed(ctx: MergeContext, requested: readonly string[], extraction: Extraction): void {
  ctx.channels.push(...extraction.channels);
  ctx.programmes.push(...extraction.programmes);
  for (const id of requested) ctx.processed.add(id);
}
