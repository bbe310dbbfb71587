import { Logger, LogLevel } from '../types';
import * as fs from 'fs';
import * as path from 'path';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  enableFileLogging: boolean;
  logDirectory: string;
  maxFileSize: number; // in bytes
  maxFiles: number;
  enableConsole: boolean;
}

const LEVEL_ORDER: LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVEL_ORDER.some((level) => level === value);
}

/**
 * Parse a level name from the environment or a settings file, falling back to INFO
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  if (!value) return fallback;
  const upper = value.trim().toUpperCase();
  return isLogLevel(upper) ? upper : fallback;
}

function shouldLog(configured: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(configured);
}

/**
 * Console logger with an optional JSON-lines log file that rotates by size
 */
export class EnhancedLogger implements Logger {
  private readonly config: LoggerConfig;
  private currentLogFile?: string;
  private logFileSize: number = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: 'INFO',
      enableFileLogging: false,
      logDirectory: './logs',
      maxFileSize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      enableConsole: true,
      ...config
    };

    if (this.config.enableFileLogging) {
      this.initializeFileLogging();
    }
  }

  error(message: string, meta?: unknown): void {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.log('DEBUG', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!shouldLog(this.config.level, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta
    };

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }

    if (this.config.enableFileLogging) {
      this.logToFile(entry);
    }
  }

  private logToConsole(entry: LogEntry): void {
    const metaStr = entry.meta !== undefined ? ` ${JSON.stringify(entry.meta)}` : '';
    const fullMessage = `[${entry.level}] ${entry.timestamp} ${entry.message}${metaStr}`;

    switch (entry.level) {
      case 'ERROR':
        console.error(fullMessage);
        break;
      case 'WARN':
        console.warn(fullMessage);
        break;
      case 'INFO':
        console.info(fullMessage);
        break;
      case 'DEBUG':
        console.debug(fullMessage);
        break;
    }
  }

  private logToFile(entry: LogEntry): void {
    if (!this.currentLogFile) {
      return;
    }

    const logLine = JSON.stringify(entry) + '\n';

    try {
      fs.appendFileSync(this.currentLogFile, logLine);
      this.logFileSize += Buffer.byteLength(logLine);

      if (this.logFileSize > this.config.maxFileSize) {
        this.rotateLogFile();
      }
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private createLogFileName(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    return path.join(this.config.logDirectory, `converter-${timestamp}.log`);
  }

  private initializeFileLogging(): void {
    try {
      fs.mkdirSync(this.config.logDirectory, { recursive: true });
      this.currentLogFile = this.createLogFileName();
      fs.writeFileSync(this.currentLogFile, '');
      this.logFileSize = 0;
    } catch (error) {
      console.error('Failed to initialize file logging:', error);
      this.config.enableFileLogging = false;
    }
  }

  private rotateLogFile(): void {
    if (!this.currentLogFile) return;

    try {
      this.cleanupOldLogFiles();

      this.currentLogFile = this.createLogFileName();
      fs.writeFileSync(this.currentLogFile, '');
      this.logFileSize = 0;
    } catch (error) {
      console.error('Failed to rotate log file:', error);
    }
  }

  private cleanupOldLogFiles(): void {
    try {
      const files = fs.readdirSync(this.config.logDirectory)
        .filter(file => file.startsWith('converter-') && file.endsWith('.log'))
        .map(file => ({
          path: path.join(this.config.logDirectory, file),
          mtime: fs.statSync(path.join(this.config.logDirectory, file)).mtime
        }))
        .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

      // Keep only the most recent files
      for (const file of files.slice(this.config.maxFiles - 1)) {
        fs.unlinkSync(file.path);
      }
    } catch (error) {
      console.error('Failed to cleanup old log files:', error);
    }
  }
}

/**
 * Plain console logger, used by tests and library consumers
 */
export class ConsoleLogger implements Logger {
  private readonly logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;
  }

  error(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'ERROR')) {
      console.error(`[ERROR] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  warn(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'WARN')) {
      console.warn(`[WARN] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  info(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'INFO')) {
      console.info(`[INFO] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  debug(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'DEBUG')) {
      console.debug(`[DEBUG] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }
}

// Default logger instance
export const logger = new EnhancedLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  enableFileLogging: false
});
