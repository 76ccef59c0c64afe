import type { DateTime } from 'luxon';

export interface XmlText {
  kind: 'text';
  text: string;
}

export interface XmlElement {
  kind: 'element';
  name: string;
  // insertion order is document order
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

export interface SourceEntry {
  url: string;
  channelIds: string[]; // unique, in order of first appearance
}

export interface SourceSpec {
  sources: SourceEntry[];
  timeFrame: number; // hours forward from the run start
  timeFrameValid: boolean; // false when the default was applied
}

export interface FeedRequest {
  channelIds: readonly string[];
  now: DateTime;
  timeFrame: number;
}

export interface Extraction {
  channels: XmlElement[];
  programmes: XmlElement[];
  notFound: string[];
  counts: { channels: number; programmes: number };
}

export type FetchFailureReason = 'invalid-url' | 'http-status' | 'timeout' | 'network' | 'write';

export type FetchResult =
  | { ok: true; path: string; bytes: number; elapsedMs: number }
  | { ok: false; reason: FetchFailureReason; error: string; status?: number };

export type DecodeResult =
  | { ok: true; path: string; compressed: boolean }
  | { ok: false; reason: 'decompress'; error: string };

export type ExtractResult =
  | ({ ok: true } & Extraction)
  | { ok: false; reason: 'parse' | 'read'; error: string };

export type FeedFailureReason = FetchFailureReason | 'decompress' | 'parse' | 'read';

export interface FeedReport {
  url: string;
  status: 'merged' | 'failed' | 'skipped';
  reason?: FeedFailureReason;
  channels: number;
  programmes: number;
  notFound: string[];
  duplicates: string[];
}

export interface MergeSummary {
  timeFrame: number;
  channels: number;
  programmes: number;
  outputFile: string;
  feeds: FeedReport[];
}

export type FeedDownloader = (url: string, scratchDir: string, opts: { timeoutMs: number }) => Promise<FetchResult>;

export interface EPGMergeOptions {
  sourceFile: string;
  outputFile: string;
  scratchDir: string;
  fetchTimeoutMs?: number; // default 10000
  defaultTimeFrame?: number; // default 48
  indent?: string; // default four spaces
  refreshCron?: string; // cron schedule for repeated runs
  cronTimeZone?: string; // default UTC
  download?: FeedDownloader; // default: HTTP download via node-fetch
}
