export type { Logger, LogLevel } from './log';
export { setLogger, ConsoleLogger, LOG_LEVELS } from './log';
export { default as version } from './version';
export * from './query';
export * from './source/queries';
export * from './source/resource';
export * from './source/repository';
export * from './source/solr';
export * from './iiif/image';
export * from './iiif/manifest';
export { encodePathSegment } from './util';
