import fs from 'fs';
import { TextDecoder } from 'util';
import { DateTime } from 'luxon';
import type { ExtractResult, FeedRequest, XmlElement } from './types';
import { attr, createRecordReader } from './xml';
import type { RecordReader } from './xml';
import { formatError } from '../errors';
import { log } from '../log';

const RECORD_TAGS: ReadonlySet<string> = new Set(['channel', 'programme']);
const HOUR_MS = 3600 * 1000;

const XMLTV_TIME = /^(\d{14}) (Z|[+-]\d{2}:?\d{2})$/;

/**
 * XMLTV time, `20240917101500 +0200`. The offset may also be written
 * `+02:00` or `Z`. Null when the value does not match.
 */
export function parseXmltvTime(value: string | undefined): DateTime | null {
  const m = value ? XMLTV_TIME.exec(value) : null;
  if (!m) return null;
  const offset = m[2] === 'Z' ? '+0000' : m[2].replace(':', '');
  const dt = DateTime.fromFormat(`${m[1]} ${offset}`, 'yyyyLLddHHmmss ZZZ', { setZone: true });
  return dt.isValid ? dt : null;
}

/**
 * True when [start, stop) overlaps [now, now + timeFrame hours).
 * Both bounds are strict: a programme ending at `now` or starting at the
 * window edge is outside.
 */
export function isWithinTimeFrame(start: DateTime, stop: DateTime, now: DateTime, timeFrame: number): boolean {
  const startDelta = (start.toMillis() - now.toMillis()) / HOUR_MS;
  const stopDelta = (stop.toMillis() - now.toMillis()) / HOUR_MS;
  return startDelta < timeFrame && stopDelta > 0;
}

function keepProgramme(programme: XmlElement, req: FeedRequest): boolean {
  const start = parseXmltvTime(attr(programme, 'start'));
  const stop = parseXmltvTime(attr(programme, 'stop'));
  // no filtering on what cannot be read
  if (!start || !stop) return true;
  return isWithinTimeFrame(start, stop, req.now, req.timeFrame);
}

/**
 * Keeps what a feed request asks for while records stream past: the first
 * channel element per requested id, and every programme of a requested id
 * inside the time frame.
 */
function createCollector(req: FeedRequest) {
  const requested = new Set(req.channelIds);
  const pending = new Set(req.channelIds);
  const channels: XmlElement[] = [];
  const programmes: XmlElement[] = [];

  const accept = (rec: XmlElement) => {
    if (rec.name === 'channel') {
      const id = attr(rec, 'id');
      if (id !== undefined && pending.has(id)) {
        channels.push(rec);
        pending.delete(id);
      }
      return;
    }
    const ch = attr(rec, 'channel');
    if (ch !== undefined && requested.has(ch) && keepProgramme(rec, req)) programmes.push(rec);
  };

  const result = (): ExtractResult => ({
    ok: true,
    channels,
    programmes,
    notFound: req.channelIds.filter(id => pending.has(id)),
    counts: { channels: channels.length, programmes: programmes.length },
  });

  return { accept, result };
}

export function extractFeed(xml: string, req: FeedRequest): ExtractResult {
  const collector = createCollector(req);
  try {
    const reader = createRecordReader(RECORD_TAGS, collector.accept);
    reader.write(xml);
    reader.close();
  } catch (e) {
    return { ok: false, reason: 'parse', error: formatError(e) };
  }
  return collector.result();
}

const DECLARED_ENCODING = /^\s*<\?xml\s[^>]*?encoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/;

/** Encoding label of a feed, from its byte order mark or XML declaration. UTF-8 otherwise. */
export function sniffEncoding(head: Buffer): string {
  if (head[0] === 0xff && head[1] === 0xfe) return 'utf-16le';
  if (head[0] === 0xfe && head[1] === 0xff) return 'utf-16be';
  const m = DECLARED_ENCODING.exec(head.toString('latin1', 0, 1024));
  const label = m ? m[1].toLowerCase() : 'utf-8';
  // a declaration readable as ASCII is not UTF-16
  return label.startsWith('utf-16') ? 'utf-8' : label;
}

function createDecoder(file: string, head: Buffer): TextDecoder {
  const label = sniffEncoding(head);
  try {
    return new TextDecoder(label);
  } catch (e) {
    log.warn(`File ${file} declares unknown encoding ${label}, reading it as UTF-8: ${formatError(e)}`);
    return new TextDecoder('utf-8');
  }
}

/** Streams `file` through the extraction, decoded with the encoding it declares. */
export async function extractFeedFile(file: string, req: FeedRequest): Promise<ExtractResult> {
  const collector = createCollector(req);
  const reader: RecordReader = createRecordReader(RECORD_TAGS, collector.accept);
  const parseFailure = (e: unknown): ExtractResult => ({ ok: false, reason: 'parse', error: formatError(e) });
  let decoder: TextDecoder | undefined;

  try {
    for await (const chunk of fs.createReadStream(file)) {
      if (!Buffer.isBuffer(chunk)) continue;
      if (!decoder) decoder = createDecoder(file, chunk);
      try {
        reader.write(decoder.decode(chunk, { stream: true }));
      } catch (e) {
        return parseFailure(e);
      }
    }
  } catch (e) {
    return { ok: false, reason: 'read', error: formatError(e) };
  }

  try {
    if (decoder) reader.write(decoder.decode());
    reader.close();
  } catch (e) {
    return parseFailure(e);
  }
  return collector.result();
}
