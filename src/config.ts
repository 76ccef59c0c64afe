import * as cron from 'node-cron';
import { ConfigError } from './errors';

export type MergeConfig = {
  sourceFile: string; // list of feeds and the channels wanted from each
  outputFile: string;
  scratchDir: string; // staging area for downloads, swept before and after each run
  fetchTimeoutMs: number;
  defaultTimeFrame: number; // hours, used when the source file carries none
  indent: string;
  refreshCron?: string; // e.g. '0 4 * * *'; unset means a single run
  cronTimeZone: string;
  logFile?: string;
};

export const DEFAULT_TIMEFRAME_HOURS = 48;
export const DEFAULT_FETCH_TIMEOUT_MS = 10000;

type Env = Record<string, string | undefined>;

function envInt(val: string | undefined, fallback: number): number {
  const v = (val || '').trim();
  if (!/^\d+$/.test(v)) return fallback;
  return parseInt(v, 10);
}

function envString(val: string | undefined, fallback: string): string {
  const v = (val || '').trim();
  return v || fallback;
}

export function getMergeConfig(env: Env = process.env): MergeConfig {
  const refreshCron = (env.EPG_REFRESH_CRON || '').trim() || undefined;
  if (refreshCron && !cron.validate(refreshCron)) {
    throw new ConfigError(`invalid cron expression '${refreshCron}'`, 'EPG_REFRESH_CRON');
  }
  return {
    sourceFile: envString(env.EPG_SOURCE_FILE, 'source_epg.txt'),
    outputFile: envString(env.EPG_OUTPUT_FILE, 'epg.xml'),
    scratchDir: envString(env.EPG_TEMP_DIR, 'temp_epg_files'),
    fetchTimeoutMs: envInt(env.EPG_FETCH_TIMEOUT_MS, DEFAULT_FETCH_TIMEOUT_MS) || DEFAULT_FETCH_TIMEOUT_MS,
    defaultTimeFrame: envInt(env.EPG_DEFAULT_TIMEFRAME, DEFAULT_TIMEFRAME_HOURS),
    indent: ' '.repeat(envInt(env.EPG_INDENT, 4)),
    refreshCron,
    cronTimeZone: envString(env.EPG_CRON_TZ, 'UTC'),
    logFile: (env.EPG_LOG_FILE || '').trim() || undefined,
  };
}

export function isScheduled(config: MergeConfig): boolean {
  return !!config.refreshCron;
}
