import { BatchReport, ConversionOutcome } from '../types';
import { formatDuration } from './conversion-reporter';

export interface ProgressDisplayOptions {
  showDestination: boolean;
}

export type OutputWriter = (line: string) => void;

/**
 * Line-per-file progress for the convert command
 */
export class CLIProgressDisplay {
  private readonly write: OutputWriter;
  private readonly writeError: OutputWriter;
  private readonly options: ProgressDisplayOptions;

  constructor(
    write: OutputWriter = (line) => console.log(line),
    writeError: OutputWriter = (line) => console.error(line),
    options: Partial<ProgressDisplayOptions> = {}
  ) {
    this.write = write;
    this.writeError = writeError;
    this.options = {
      showDestination: true,
      ...options,
    };
  }

  public handleOutcome(outcome: ConversionOutcome, index: number, total: number): void {
    const counter = `[${index + 1}/${total}]`;

    if (outcome.status.kind === 'success') {
      const target = this.options.showDestination ? ` -> ${outcome.destinationPath}` : '';
      this.write(`${counter} ✓ ${outcome.sourcePath}${target}`);
    } else {
      this.write(`${counter} ✗ ${outcome.sourcePath}: ${outcome.status.reason}`);
    }
  }

  public displayFinalSummary(report: BatchReport): void {
    const successRate = report.total > 0 ? ((report.succeeded / report.total) * 100).toFixed(1) : '0';

    this.write('='.repeat(60));
    this.write('CONVERSION COMPLETE');
    this.write('='.repeat(60));
    this.write(`Total Files: ${report.total}`);
    this.write(`Successful: ${report.succeeded}`);
    this.write(`Failed: ${report.failed}`);
    this.write(`Total Time: ${formatDuration(report.durationMs)}`);
    this.write(`Success Rate: ${successRate}%`);
    this.write('='.repeat(60));
  }

  public displayRecommendations(recommendations: string[]): void {
    if (recommendations.length === 0) {
      return;
    }

    this.write('💡 Recommendations:');
    recommendations.forEach((recommendation) => this.write(`   • ${recommendation}`));
  }

  public displayError(error: Error, context?: string): void {
    if (context) {
      this.writeError(`✗ ${context}: ${error.message}`);
    } else {
      this.writeError(`✗ ${error.message}`);
    }
  }

  public displayWarning(message: string): void {
    this.writeError(`⚠️  WARNING: ${message}`);
  }

  public displayInfo(message: string): void {
    this.write(`ℹ️  ${message}`);
  }

  public displaySuccess(message: string): void {
    this.write(`✅ ${message}`);
  }
}
