export { EPGMergeService } from './epg/service';
export { parseSourceSpec, readSourceSpec } from './epg/sourceSpec';
export { downloadFeed, feedFileName } from './epg/fetcher';
export { decodeFeed, isGzipPath } from './epg/decoder';
export { extractFeed, extractFeedFile, isWithinTimeFrame, parseXmltvTime, sniffEncoding } from './epg/extractor';
export { claimChannels, commitFeed, createMergeContext } from './epg/context';
export type { MergeContext } from './epg/context';
export { buildDocument, compareIds, serializeDocument, sortChannels, sortProgrammes, writeDocument } from './epg/merge';
export { createRecordReader, readTopLevelElements, serializeXml } from './epg/xml';
export type { RecordReader } from './epg/xml';
export { getMergeConfig } from './config';
export type { MergeConfig } from './config';
export { ConfigError, SourceFileError, formatError } from './errors';
export type * from './epg/types';
