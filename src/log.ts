import fs from 'fs';
import { DateTime } from 'luxon';
import { formatError } from './errors';

type Level = 'INFO' | 'WARN' | 'ERROR';

const PREFIX = '[EPG]';
let logFile: string | undefined;

function infoEnabled(): boolean {
  return process.env.EPG_DEBUG !== '0';
}

// Mirror every printed line into `file`; undefined turns the mirror off.
export function setLogFile(file: string | undefined): void {
  logFile = file;
}

function mirror(level: Level, message: string): void {
  if (!logFile) return;
  const stamp = DateTime.local().toFormat('yyyy-LL-dd HH:mm:ss');
  try {
    fs.appendFileSync(logFile, `${stamp} ${level}: ${message}\n`, 'utf8');
  } catch (e) {
    const target = logFile;
    logFile = undefined;
    console.error(PREFIX, `Log file ${target} disabled: ${formatError(e)}`);
  }
}

export const log = {
  info(message: string): void {
    if (!infoEnabled()) return;
    console.log(PREFIX, message);
    mirror('INFO', message);
  },
  warn(message: string): void {
    console.warn(PREFIX, message);
    mirror('WARN', message);
  },
  error(message: string, err?: unknown): void {
    const line = err === undefined ? message : `${message}: ${formatError(err)}`;
    console.error(PREFIX, line);
    mirror('ERROR', line);
  },
};
