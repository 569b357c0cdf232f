import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, posix } from 'node:path';
import type { RemoteFile, RemoteSyncClient } from '../../services/sync';

/**
 * In-process stand-in for a remote file store.
 * `statusFor` lets a test force a status code for a given remote path.
 */
export class MemoryRemote implements RemoteSyncClient {
  readonly files = new Map<string, string>();
  statusFor: (remotePath: string) => number | undefined = () => undefined;

  async listRemoteFiles(folder: string): Promise<RemoteFile[]> {
    const prefix = `${folder}/`;
    return Array.from(this.files.keys())
      .filter((path) => path.startsWith(prefix) && !path.slice(prefix.length).includes('/'))
      .map((path) => ({ name: posix.basename(path), path }));
  }

  async uploadFile(localPath: string, remotePath: string): Promise<number> {
    const forced = this.statusFor(remotePath);
    if (forced !== undefined) return forced;
    this.files.set(remotePath, await readFile(localPath, 'utf8'));
    return 201;
  }

  async downloadFile(remotePath: string, localPath: string): Promise<number> {
    const forced = this.statusFor(remotePath);
    if (forced !== undefined) return forced;
    const content = this.files.get(remotePath);
    if (content === undefined) return 404;
    await mkdir(dirname(localPath), { recursive: true });
    await writeFile(localPath, content);
    return 200;
  }
}
