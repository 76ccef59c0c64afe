import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { log, setLogFile } from './log';

describe('log', () => {
  let dir: string;
  const debug = process.env.EPG_DEBUG;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'epg-log-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    setLogFile(undefined);
    if (debug === undefined) delete process.env.EPG_DEBUG;
    else process.env.EPG_DEBUG = debug;
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('prefixes console lines', () => {
    delete process.env.EPG_DEBUG;
    log.info('Timeframe: 24');
    log.error('Error during download of http://a.example/x.xml', new Error('socket hang up'));
    expect(console.log).toHaveBeenCalledWith('[EPG]', 'Timeframe: 24');
    expect(console.error).toHaveBeenCalledWith('[EPG]', 'Error during download of http://a.example/x.xml: socket hang up');
  });

  it('silences informational lines with EPG_DEBUG=0', () => {
    process.env.EPG_DEBUG = '0';
    log.info('hidden');
    log.error('shown');
    expect(console.log).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('[EPG]', 'shown');
  });

  it('mirrors lines into the log file', () => {
    delete process.env.EPG_DEBUG;
    const file = path.join(dir, 'epg_log.log');
    setLogFile(file);
    log.info('Start');
    log.error('File x.xml not valid');

    const lines = fs.readFileSync(file, 'utf8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} INFO: Start$/);
    expect(lines[1]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} ERROR: File x\.xml not valid$/);
  });

  it('turns the mirror off when the file cannot be written', () => {
    setLogFile(path.join(dir, 'missing-dir', 'epg.log'));
    log.error('first');
    log.error('second');
    expect(console.error).toHaveBeenCalledTimes(3);
  });
});
