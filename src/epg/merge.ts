import fs from 'fs';
import path from 'path';
import type { XmlElement } from './types';
import type { MergeContext } from './context';
import { attr, element, serializeXml } from './xml';

// Ordinal comparison after lower-casing, independent of locale.
export function compareIds(a: string, b: string): number {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

function compareRaw(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortChannels(channels: readonly XmlElement[]): XmlElement[] {
  return [...channels].sort((a, b) => compareIds(attr(a, 'id') ?? '', attr(b, 'id') ?? ''));
}

// `start` is compared as written; with mixed UTC offsets that is not chronological.
export function sortProgrammes(programmes: readonly XmlElement[]): XmlElement[] {
  return [...programmes].sort(
    (a, b) =>
      compareIds(attr(a, 'channel') ?? '', attr(b, 'channel') ?? '') ||
      compareRaw(attr(a, 'start') ?? '', attr(b, 'start') ?? ''),
  );
}

export function buildDocument(ctx: MergeContext): XmlElement {
  return element('tv', {}, [...sortChannels(ctx.channels), ...sortProgrammes(ctx.programmes)]);
}

export function serializeDocument(root: XmlElement, indent?: string): string {
  return serializeXml(root, indent);
}

export function writeDocument(file: string, xml: string): void {
  const dir = path.dirname(file);
  if (dir) fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(file, xml, 'utf8');
}
