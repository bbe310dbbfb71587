import * as fs from 'fs/promises';
import * as path from 'path';
import { BatchReport, ConversionOutcome, FailureCategory, Logger } from '../types';

export interface ConversionSummary {
  total: number;
  succeeded: number;
  failed: number;
  successRate: number;
  durationMs: number;
  targetFormat: string;
  destinationDirectory: string;
  failuresByCategory: Partial<Record<FailureCategory, number>>;
}

export type ReportFormat = 'text' | 'json';

export interface SaveReportResult {
  success: boolean;
  filePath: string;
  format: ReportFormat;
  error?: string;
}

/**
 * Renders a finished batch for the terminal or a report file
 */
export class ConversionReporter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  public summarize(report: BatchReport): ConversionSummary {
    const failuresByCategory: Partial<Record<FailureCategory, number>> = {};

    for (const outcome of report.outcomes) {
      if (outcome.status.kind === 'failed') {
        const category = outcome.category ?? 'unknown';
        failuresByCategory[category] = (failuresByCategory[category] ?? 0) + 1;
      }
    }

    return {
      total: report.total,
      succeeded: report.succeeded,
      failed: report.failed,
      successRate: report.total > 0 ? (report.succeeded / report.total) * 100 : 0,
      durationMs: report.durationMs,
      targetFormat: report.targetFormat,
      destinationDirectory: report.destinationDirectory,
      failuresByCategory,
    };
  }

  /**
   * One line per file, then the totals
   */
  public generateTextReport(report: BatchReport): string {
    const summary = this.summarize(report);
    const lines = report.outcomes.map((outcome) => this.formatOutcomeLine(outcome));

    lines.push('');
    lines.push(`Converted ${summary.succeeded} of ${summary.total} file(s) to ${summary.targetFormat.toUpperCase()}`);
    lines.push(`Destination: ${summary.destinationDirectory}`);
    if (summary.failed > 0) {
      lines.push(`Failed: ${summary.failed}`);
    }
    lines.push(`Success Rate: ${summary.successRate.toFixed(1)}%`);
    lines.push(`Total Time: ${formatDuration(summary.durationMs)}`);

    return lines.join('\n');
  }

  public generateJsonReport(report: BatchReport): string {
    return JSON.stringify(
      {
        summary: this.summarize(report),
        startedAt: report.startedAt.toISOString(),
        outcomes: report.outcomes.map((outcome) => ({
          sourcePath: outcome.sourcePath,
          destinationPath: outcome.destinationPath,
          status: outcome.status.kind,
          reason: outcome.status.kind === 'failed' ? outcome.status.reason : undefined,
          category: outcome.category,
          durationMs: outcome.durationMs,
        })),
      },
      null,
      2
    );
  }

  public formatOutcomeLine(outcome: ConversionOutcome): string {
    if (outcome.status.kind === 'success') {
      return `✓ ${outcome.sourcePath} -> ${outcome.destinationPath}`;
    }
    return `✗ ${outcome.sourcePath}: ${outcome.status.reason}`;
  }

  /**
   * `.json` paths get the JSON rendering, anything else the text one
   */
  public async saveReport(report: BatchReport, filePath: string): Promise<SaveReportResult> {
    const format: ReportFormat = path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'text';
    const content = format === 'json' ? this.generateJsonReport(report) : this.generateTextReport(report);

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content + '\n', 'utf8');
      this.logger.debug(`Conversion report saved to ${filePath}`);
      return { success: true, filePath, format };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Failed to save conversion report', { filePath, error: message });
      return { success: false, filePath, format, error: message };
    }
  }
}

export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else if (seconds > 0) {
    return `${seconds}s`;
  }
  return `${milliseconds}ms`;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}
