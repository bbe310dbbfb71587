// Destination checks and source directory scanning

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../../types';
import { DirectoryCheckResult, DirectoryScanOptions } from './types';
import { PathUtils } from './path-utils';

export class DirectoryManager {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Confirm an existing directory accepts new files. Nothing is created; the test
   * file is removed before returning.
   */
  async verifyWritableDirectory(directoryPath: string): Promise<DirectoryCheckResult> {
    this.logger.debug(`Checking destination directory: ${directoryPath}`);

    if (!PathUtils.isValidPath(directoryPath)) {
      return {
        success: false,
        directoryPath,
        error: `Invalid destination path: ${directoryPath}`
      };
    }

    let stats: Stats;
    try {
      stats = await fs.stat(directoryPath);
    } catch {
      return {
        success: false,
        directoryPath,
        error: `Destination directory does not exist: ${directoryPath}`
      };
    }

    if (!stats.isDirectory()) {
      return {
        success: false,
        directoryPath,
        error: `Destination path exists but is not a directory: ${directoryPath}`
      };
    }

    const testFile = path.join(directoryPath, `.write_test_${uuidv4()}`);
    try {
      await fs.writeFile(testFile, '');
    } catch {
      return {
        success: false,
        directoryPath,
        error: `No write permission in destination directory: ${directoryPath}`
      };
    }
    await fs.rm(testFile, { force: true });

    return { success: true, directoryPath, created: false };
  }

  /**
   * Create the directory (and parents) when missing, then verify it
   */
  async ensureDirectory(directoryPath: string): Promise<DirectoryCheckResult> {
    let created = false;
    try {
      const madePath = await fs.mkdir(directoryPath, { recursive: true });
      created = madePath !== undefined;
    } catch (error) {
      const errorMessage = `Failed to create directory ${directoryPath}: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error(errorMessage);
      return { success: false, directoryPath, error: errorMessage };
    }

    if (created) {
      this.logger.info(`Created destination directory: ${directoryPath}`);
    }

    const result = await this.verifyWritableDirectory(directoryPath);
    return { ...result, created };
  }

  /**
   * List files under a directory whose extension matches, sorted by path
   */
  async scanDirectory(directoryPath: string, options: DirectoryScanOptions): Promise<string[]> {
    const found: string[] = [];
    await this.collectFiles(directoryPath, options, found);
    found.sort((a, b) => a.localeCompare(b));

    this.logger.debug(`Found ${found.length} image files in ${directoryPath}`);
    return found;
  }

  private async collectFiles(
    directoryPath: string,
    options: DirectoryScanOptions,
    found: string[]
  ): Promise<void> {
    const entries = await fs.readdir(directoryPath, { withFileTypes: true });

    for (const entry of entries) {
      const entryPath = path.join(directoryPath, entry.name);

      if (entry.isDirectory()) {
        if (options.recursive) {
          await this.collectFiles(entryPath, options, found);
        }
      } else if (entry.isFile() && PathUtils.hasExtension(entry.name, options.extensions)) {
        found.push(entryPath);
      }
    }
  }
}
