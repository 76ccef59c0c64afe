import { DateTime } from 'luxon';
import * as cron from 'node-cron';
import type { EPGMergeOptions, FeedDownloader, FeedReport, MergeSummary, SourceEntry } from './types';
import { readSourceSpec } from './sourceSpec';
import { downloadFeed } from './fetcher';
import { decodeFeed } from './decoder';
import { extractFeedFile } from './extractor';
import { type MergeContext, claimChannels, commitFeed, createMergeContext } from './context';
import { buildDocument, serializeDocument, writeDocument } from './merge';
import { clearScratchDir, removeQuietly } from '../scratch';
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_TIMEFRAME_HOURS } from '../config';
import { log } from '../log';

function stamp(dt: DateTime): string {
  return dt.toUTC().toFormat('yyyy-LL-dd HH:mm:ss');
}

function emptyReport(url: string, duplicates: string[] = []): FeedReport {
  return { url, status: 'skipped', channels: 0, programmes: 0, notFound: [], duplicates };
}

export class EPGMergeService {
  private sourceFile: string;
  private outputFile: string;
  private scratchDir: string;
  private timeoutMs: number;
  private defaultTimeFrame: number;
  private indent?: string;
  private refreshCron?: string;
  private cronTimeZone: string;
  private download: FeedDownloader;
  private schedule?: cron.ScheduledTask;
  private running = false;

  constructor(opts: EPGMergeOptions) {
    this.sourceFile = opts.sourceFile;
    this.outputFile = opts.outputFile;
    this.scratchDir = opts.scratchDir;
    this.timeoutMs = opts.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.defaultTimeFrame = opts.defaultTimeFrame ?? DEFAULT_TIMEFRAME_HOURS;
    this.indent = opts.indent;
    this.refreshCron = opts.refreshCron;
    this.cronTimeZone = opts.cronTimeZone || 'UTC';
    this.download = opts.download ?? downloadFeed;
  }

  public isRunning(): boolean { return this.running; }

  /** Starts the cron schedule, if one was configured. */
  public start(): boolean {
    if (!this.refreshCron || this.schedule) return false;
    this.schedule = cron.schedule(this.refreshCron, () => {
      if (this.running) {
        log.warn('Previous run still in progress, scheduled run skipped');
        return;
      }
      this.run().catch(e => log.error('Scheduled run failed', e));
    }, { timezone: this.cronTimeZone });
    log.info(`Scheduled runs: '${this.refreshCron}' (${this.cronTimeZone})`);
    return true;
  }

  public stop(): void {
    if (!this.schedule) return;
    this.schedule.stop();
    this.schedule = undefined;
  }

  /** One complete merge. Throws only when the source file cannot be read. */
  public async run(now: DateTime = DateTime.utc()): Promise<MergeSummary> {
    this.running = true;
    try {
      return await this.merge(now);
    } finally {
      this.running = false;
    }
  }

  private async merge(now: DateTime): Promise<MergeSummary> {
    log.info(`Start: ${stamp(now)}`);
    const spec = readSourceSpec(this.sourceFile, this.defaultTimeFrame);

    clearScratchDir(this.scratchDir);
    const ctx = createMergeContext();
    const feeds: FeedReport[] = [];
    for (const source of spec.sources) {
      feeds.push(await this.processSource(ctx, source, now, spec.timeFrame));
    }

    const xml = serializeDocument(buildDocument(ctx), this.indent);
    writeDocument(this.outputFile, xml);
    log.info(`File EPG XML successfully created: ${this.outputFile} (${ctx.channels.length} channels, ${ctx.programmes.length} programmes)`);

    clearScratchDir(this.scratchDir);
    log.info(`End: ${stamp(DateTime.utc())}`);
    return {
      timeFrame: spec.timeFrame,
      channels: ctx.channels.length,
      programmes: ctx.programmes.length,
      outputFile: this.outputFile,
      feeds,
    };
  }

  private async processSource(ctx: MergeContext, source: SourceEntry, now: DateTime, timeFrame: number): Promise<FeedReport> {
    if (!source.channelIds.length) {
      log.info(`No channels listed for source: ${source.url}`);
      return emptyReport(source.url);
    }
    const { toProcess, duplicates } = claimChannels(ctx, source.channelIds);
    if (!toProcess.length) {
      log.info(`All channels of ${source.url} already merged, download skipped`);
      return emptyReport(source.url, duplicates);
    }
    const failed = (reason: FeedReport['reason']): FeedReport =>
      ({ url: source.url, status: 'failed', reason, channels: 0, programmes: 0, notFound: [], duplicates });

    const fetched = await this.download(source.url, this.scratchDir, { timeoutMs: this.timeoutMs });
    if (!fetched.ok) return failed(fetched.reason);

    const decoded = await decodeFeed(fetched.path);
    if (!decoded.ok) {
      removeQuietly(fetched.path);
      return failed(decoded.reason);
    }

    try {
      const extracted = await extractFeedFile(decoded.path, { channelIds: toProcess, now, timeFrame });
      if (!extracted.ok) {
        log.error(`File ${decoded.path} not valid: ${extracted.error}`);
        return failed(extracted.reason);
      }
      commitFeed(ctx, toProcess, extracted);
      for (const id of extracted.notFound) log.info(`Channel ${id} not found`);
      log.info(`Channels extracted: ${extracted.counts.channels}`);
      log.info(`Programs extracted: ${extracted.counts.programmes}`);
      return {
        url: source.url,
        status: 'merged',
        channels: extracted.counts.channels,
        programmes: extracted.counts.programmes,
        notFound: extracted.notFound,
        duplicates,
      };
    } finally {
      removeQuietly(decoded.path);
    }
  }
}
