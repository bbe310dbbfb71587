// Atomic file writes for encoded images

import * as fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../../types';
import { FileWriteResult } from './types';
import { PathUtils } from './path-utils';

/**
 * Writes content to a sibling temp file and renames it into place, so a failed
 * write never leaves a partial file at the final path
 */
export class FileWriter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async writeAtomic(filePath: string, content: Buffer): Promise<FileWriteResult> {
    const tempPath = PathUtils.createTempPath(filePath, uuidv4());
    const overwritten = await this.exists(filePath);

    try {
      await fs.writeFile(tempPath, content);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Atomic write failed for ${filePath}: ${message}`);
      return { success: false, filePath, error: this.describeWriteError(error, filePath) };
    }

    if (overwritten) {
      this.logger.debug(`Overwrote existing file: ${filePath}`);
    }

    return { success: true, filePath, size: content.length, overwritten };
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  private describeWriteError(error: unknown, filePath: string): string {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;

    switch (code) {
      case 'EACCES':
      case 'EPERM':
        return `Permission denied: cannot write ${filePath}`;
      case 'ENOSPC':
        return `No space left on device: cannot write ${filePath}`;
      case 'EROFS':
        return `Read-only file system: cannot write ${filePath}`;
      default:
        return `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`;
    }
  }
}
