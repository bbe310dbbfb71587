import { CLIProgressDisplay } from '../../progress/cli-progress-display';
import { BatchReport } from '../../types';

describe('CLIProgressDisplay', () => {
  let lines: string[];
  let errorLines: string[];
  let display: CLIProgressDisplay;

  beforeEach(() => {
    lines = [];
    errorLines = [];
    display = new CLIProgressDisplay(
      (line) => lines.push(line),
      (line) => errorLines.push(line)
    );
  });

  it('should print one counted line per outcome', () => {
    display.handleOutcome(
      { sourcePath: '/in/cat.png', destinationPath: '/out/cat.jpg', status: { kind: 'success' }, durationMs: 5 },
      0,
      2
    );
    display.handleOutcome(
      {
        sourcePath: '/in/missing.jpg',
        destinationPath: '/out/missing.jpg',
        status: { kind: 'failed', reason: 'source not found' },
        durationMs: 0,
      },
      1,
      2
    );

    expect(lines).toEqual(['[1/2] ✓ /in/cat.png -> /out/cat.jpg', '[2/2] ✗ /in/missing.jpg: source not found']);
  });

  it('should omit destinations when configured', () => {
    const compact = new CLIProgressDisplay((line) => lines.push(line), undefined, { showDestination: false });

    compact.handleOutcome(
      { sourcePath: '/in/cat.png', destinationPath: '/out/cat.jpg', status: { kind: 'success' }, durationMs: 5 },
      0,
      1
    );

    expect(lines).toEqual(['[1/1] ✓ /in/cat.png']);
  });

  it('should print a final summary', () => {
    const report: BatchReport = {
      targetFormat: 'png',
      destinationDirectory: '/out',
      outcomes: [],
      total: 3,
      succeeded: 2,
      failed: 1,
      startedAt: new Date(),
      durationMs: 2500,
    };

    display.displayFinalSummary(report);

    expect(lines).toEqual([
      '='.repeat(60),
      'CONVERSION COMPLETE',
      '='.repeat(60),
      'Total Files: 3',
      'Successful: 2',
      'Failed: 1',
      'Total Time: 2s',
      'Success Rate: 66.7%',
      '='.repeat(60),
    ]);
  });

  it('should send errors and warnings to the error stream', () => {
    display.displayError(new Error('boom'), 'Conversion failed');
    display.displayWarning('careful');

    expect(errorLines).toEqual(['✗ Conversion failed: boom', '⚠️  WARNING: careful']);
    expect(lines).toEqual([]);
  });

  it('should list recommendations under a heading', () => {
    display.displayRecommendations(['Check that every source path exists and is readable']);

    expect(lines).toEqual(['💡 Recommendations:', '   • Check that every source path exists and is readable']);
  });

  it('should print nothing without recommendations', () => {
    display.displayRecommendations([]);

    expect(lines).toEqual([]);
  });
});
