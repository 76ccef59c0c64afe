import fs from 'fs';
import type { SourceEntry, SourceSpec } from './types';
import { SourceFileError } from '../errors';
import { DEFAULT_TIMEFRAME_HOURS } from '../config';
import { log } from '../log';

// Tail after the last '=' of the first non-empty line, e.g. `timeframe=24`.
function parseTimeFrame(firstLine: string | undefined): number | null {
  if (firstLine === undefined) return null;
  const eq = firstLine.lastIndexOf('=');
  const tail = firstLine.slice(eq + 1).trim();
  if (!/^\d+$/.test(tail)) return null;
  return parseInt(tail, 10);
}

export function parseSourceSpec(text: string, defaultTimeFrame: number = DEFAULT_TIMEFRAME_HOURS): SourceSpec {
  const lines = text.split(/\r?\n/);
  const parsedTimeFrame = parseTimeFrame(lines.find(l => l.trim() !== ''));

  const byUrl = new Map<string, SourceEntry>();
  let current: SourceEntry | null = null;
  for (const raw of lines) {
    const hash = raw.indexOf('#');
    const line = (hash === -1 ? raw : raw.slice(0, hash)).trim();
    if (!line) continue;

    if (line.startsWith('http')) {
      let entry = byUrl.get(line);
      if (!entry) {
        entry = { url: line, channelIds: [] };
        byUrl.set(line, entry);
      }
      current = entry;
    } else if (current && !current.channelIds.includes(line)) {
      current.channelIds.push(line);
    }
  }

  return {
    sources: [...byUrl.values()],
    timeFrame: parsedTimeFrame ?? defaultTimeFrame,
    timeFrameValid: parsedTimeFrame !== null,
  };
}

export function readSourceSpec(file: string, defaultTimeFrame: number = DEFAULT_TIMEFRAME_HOURS): SourceSpec {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (e) {
    throw new SourceFileError(file, e);
  }
  const spec = parseSourceSpec(text, defaultTimeFrame);
  if (spec.timeFrameValid) {
    log.info(`Timeframe: ${spec.timeFrame}`);
  } else {
    log.info(`No valid timeframe provided. Default value (${spec.timeFrame}h) will be used`);
  }
  return spec;
}
