export { downloadDocumentCache, type SyncSummary, uploadDocumentCache } from './cacheSync';
export type { RemoteFile, RemoteSyncClient } from './remote.interface';
