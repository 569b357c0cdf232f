export {
  type CacheCandidate,
  PartialCacheStore,
  assertPercent,
  documentKey,
  snapshotFileName,
} from './partialCache';
export { parseSnapshot, serializeSnapshot, snapshotSchema } from './snapshot.codec';
