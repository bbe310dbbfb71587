// Local file management types and interfaces

export interface DirectoryCheckResult {
  success: boolean;
  directoryPath: string;
  created?: boolean;
  error?: string;
}

export interface DirectoryScanOptions {
  recursive: boolean;
  extensions: readonly string[];
}

export interface FileWriteResult {
  success: boolean;
  filePath: string;
  size?: number;
  overwritten?: boolean;
  error?: string;
}
