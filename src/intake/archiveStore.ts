import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { validateFileWithinDir, describeError } from '../utils/sanitizer';
import { logger, Logger } from '../utils/logger';

export class ArchiveStagingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArchiveStagingError';
  }
}

/**
 * Temporary home for uploaded archives, confined to a single base directory.
 */
export class ArchiveStore {
  readonly baseDir: string;
  private readonly log: Logger;

  constructor(baseDir: string, log: Logger = logger.child({ component: 'archive-store' })) {
    this.baseDir = path.resolve(baseDir);
    this.log = log;
  }

  async init(): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    this.log.info({ dir: this.baseDir }, 'Temporary build directory ensured');
  }

  resolve(fileName: string): string {
    try {
      return validateFileWithinDir(path.join(this.baseDir, fileName), this.baseDir);
    } catch {
      this.log.error({ baseDir: this.baseDir, fileName }, 'Path traversal attempt detected');
      throw new ArchiveStagingError('Potential path traversal attempt');
    }
  }

  async stage(contents: Buffer, fileName = `${randomUUID()}.zip`): Promise<string> {
    const target = this.resolve(fileName);
    try {
      await fs.writeFile(target, contents, { flag: 'wx' });
    } catch (error) {
      throw new ArchiveStagingError(describeError(error), { cause: error });
    }
    this.log.info({ file: target }, 'Saved temp file');
    return target;
  }

  async discard(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
      this.log.info({ file: filePath }, 'Deleted temp file');
    } catch (error) {
      this.log.warn({ file: filePath, error: describeError(error) }, 'Could not delete temporary file');
    }
  }
}
