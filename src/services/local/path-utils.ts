// Path helpers for deriving output names

import * as path from 'path';
import { TargetFormat } from '../../types';
import { FORMAT_EXTENSIONS } from '../../core/constants';

/**
 * Characters rejected in a user-supplied directory path
 */
const INVALID_PATH_CHARS = /[<>"|?*\x00-\x1f]/;

export class PathUtils {
  /**
   * Base name of a file without its last extension: `/a/cat.final.png` -> `cat.final`
   */
  static getBaseName(filePath: string): string {
    return path.parse(filePath).name;
  }

  static getExtensionForFormat(format: TargetFormat): string {
    return FORMAT_EXTENSIONS[format];
  }

  /**
   * `<destinationDirectory>/<source base name><target extension>`
   */
  static deriveOutputPath(destinationDirectory: string, sourcePath: string, format: TargetFormat): string {
    return path.join(destinationDirectory, this.getBaseName(sourcePath) + this.getExtensionForFormat(format));
  }

  /**
   * Sibling temp path used for write-then-rename
   */
  static createTempPath(finalPath: string, token: string): string {
    const { dir, base } = path.parse(finalPath);
    return path.join(dir, `.${base}.${token}.tmp`);
  }

  static hasExtension(filePath: string, extensions: readonly string[]): boolean {
    const ext = path.extname(filePath).toLowerCase();
    return ext.length > 0 && extensions.includes(ext);
  }

  static isValidPath(dirPath: string): boolean {
    if (!dirPath || dirPath.trim().length === 0) {
      return false;
    }
    // Windows drive letters are the only place a colon is allowed
    const withoutDrive = dirPath.replace(/^[a-zA-Z]:/, '');
    return !INVALID_PATH_CHARS.test(withoutDrive);
  }
}
