export { CONTENT_SOURCES } from './types.js';
export type {
  ContentSource,
  RawContent,
  ParsedJob,
  ExistingRecordView,
  RecordLookup,
  RecordStore,
  ProviderManifest,
  ContentProvider,
} from './types.js';
export { defineProvider } from './factory.js';
export { MAX_STORED_PAY, parsedJobSchema, validateParsedJobs } from './schema.js';
export type { ValidatedParsedJob, ValidateParsedJobsOptions } from './schema.js';
