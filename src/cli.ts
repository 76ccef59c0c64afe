#!/usr/bin/env node
import { EPGMergeService } from './epg/service';
import { getMergeConfig, isScheduled } from './config';
import { setLogFile, log } from './log';

process.on('uncaughtException', (err: unknown) => log.error('uncaughtException', err));
process.on('unhandledRejection', (reason: unknown) => log.error('unhandledRejection', reason));

async function main(argv: string[]): Promise<void> {
  const config = getMergeConfig();
  setLogFile(config.logFile);
  const service = new EPGMergeService({
    ...config,
    // positional argument wins over EPG_SOURCE_FILE
    sourceFile: argv[0] || config.sourceFile,
  });

  await service.run();

  if (isScheduled(config)) {
    service.start();
    const shutdown = (signal: string) => {
      log.info(`Received ${signal}, stopping schedule`);
      service.stop();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  }
}

main(process.argv.slice(2)).catch((e: unknown) => {
  log.error('Fatal error', e);
  process.exitCode = 1;
});
