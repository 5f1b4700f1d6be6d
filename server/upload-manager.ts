import * as fs from 'fs';
import * as path from 'path';
import { nanoid } from 'nanoid';
import { errorMessage } from './errors';
import { forSource } from './logger';

const log = forSource('uploads');

export interface UploadSession {
  id: string;
  dir: string;
}

/**
 * Per-request staging folders for multipart uploads. A session lives from the
 * moment a run is admitted until the pipeline has copied its files into the
 * study tree.
 */
export class UploadManager {
  private readonly tempDir: string;
  private readonly maxTempAge: number = 24 * 60 * 60 * 1000; // 24 hours

  constructor(uploadDir: string) {
    this.tempDir = path.join(uploadDir, 'temp');
  }

  async createSession(): Promise<UploadSession> {
    const id = nanoid();
    const dir = path.join(this.tempDir, id);
    await fs.promises.mkdir(dir, { recursive: true });
    return { id, dir };
  }

  sessionDir(id: string): string {
    return path.join(this.tempDir, id);
  }

  async cleanupSession(id: string): Promise<void> {
    await fs.promises.rm(this.sessionDir(id), { recursive: true, force: true });
  }

  // Sessions left behind by a crash
  async cleanupStaleSessions(now: number = Date.now()): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.tempDir);
    } catch {
      return 0;
    }

    let removed = 0;
    for (const entry of entries) {
      const dir = path.join(this.tempDir, entry);
      try {
        const stats = await fs.promises.stat(dir);
        if (now - stats.mtimeMs > this.maxTempAge) {
          await fs.promises.rm(dir, { recursive: true, force: true });
          log.info(`Cleaned up old upload session: ${entry}`);
          removed++;
        }
      } catch (error) {
        log.warn(`Could not inspect upload session ${entry}: ${errorMessage(error)}`);
      }
    }
    return removed;
  }
}
