export {
  checkStatusSchema,
  historyFileSchema,
  historyRecordSchema,
  historyRecordsSchema,
  serializeDbJson,
  type CheckStatus,
  type HistoryRecord,
} from './json';
export { readJsonFile, writeFileAtomic, type JsonReadResult } from './file';
export {
  bucketValue,
  sanitizeTargetName,
  type Bucket,
  type BucketState,
  type BucketValue,
  type BucketedSeries,
  type History,
  type Observation,
  type Target,
  type TargetId,
} from './series';
