export interface RemoteFile {
  name: string;
  path: string;
}

/**
 * File transport used to mirror a document's cache.
 * Status codes follow HTTP conventions.
 */
export interface RemoteSyncClient {
  listRemoteFiles(folder: string): Promise<RemoteFile[]>;
  uploadFile(localPath: string, remotePath: string): Promise<number>;
  downloadFile(remotePath: string, localPath: string): Promise<number>;
}
