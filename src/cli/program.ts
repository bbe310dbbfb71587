// Command definitions for the imgconv CLI

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import * as path from 'path';
import { BatchReport, Logger, TiffCompression } from '../types';
import { ConverterConfig, ConverterConfigManager, isConfigKey } from '../core/config-manager';
import { SUPPORTED_TARGET_FORMATS, TIFF_COMPRESSIONS } from '../core/constants';
import { ConversionOrchestrator } from '../core/conversion-orchestrator';
import { ValidationError, toError } from '../core/errors';
import { FormatValidator } from '../core/format-validator';
import { EnhancedLogger } from '../core/logger';
import { CodecRegistry, ImageCodec } from '../services/codec';
import { DirectoryManager } from '../services/local/directory-manager';
import {
  CliRequestSource,
  InteractiveRequestSource,
  Prompter,
  RequestSource,
  inputDirectoryOf,
  readlinePrompter,
} from '../services/request-source';
import { CLIProgressDisplay, ConversionReporter, OutputWriter, formatBytes } from '../progress';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  PARTIAL_FAILURE: 2,
} as const;

export interface CliDependencies {
  configManager: ConverterConfigManager;
  codecRegistry: CodecRegistry;
  /** Built from the configured log level when omitted */
  logger?: Logger;
  prompt?: Prompter;
  write?: OutputWriter;
  writeError?: OutputWriter;
  env?: NodeJS.ProcessEnv;
}

interface RunOptions {
  codec?: string;
  mkdir?: boolean;
  json?: boolean;
  report?: string;
}

interface ConvertCommandOptions extends RunOptions {
  format?: string;
  output?: string;
  recursive?: boolean;
  quality?: number;
  lossless?: boolean;
  compression?: TiffCompression;
}

interface RunContext {
  config: ConverterConfig;
  logger: Logger;
}

function parseQuality(value: string): number {
  const quality = Number(value);
  if (!Number.isInteger(quality)) {
    throw new InvalidArgumentError('Quality must be an integer.');
  }
  return quality;
}

function isTiffCompression(value: string): value is TiffCompression {
  return TIFF_COMPRESSIONS.some((compression) => compression === value);
}

function parseCompression(value: string): TiffCompression {
  const compression = value.trim().toLowerCase();
  if (!isTiffCompression(compression)) {
    throw new InvalidArgumentError(`Allowed choices are ${TIFF_COMPRESSIONS.join(', ')}.`);
  }
  return compression;
}

/**
 * Build the CLI. Commands record their exit code through `setExitCode` instead of
 * exiting the process, so the same program runs under tests.
 */
export function createProgram(deps: CliDependencies, setExitCode: (code: number) => void): Command {
  const write = deps.write ?? ((line: string) => console.log(line));
  const writeError = deps.writeError ?? ((line: string) => console.error(line));
  const env = deps.env ?? process.env;
  const directoryManagerFor = (logger: Logger) => new DirectoryManager(logger);

  const program = new Command();

  program
    .name('imgconv')
    .description('Convert batches of images to a single target format')
    .version('1.0.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => write(text.replace(/\n$/, '')),
      writeErr: (text) => writeError(text.replace(/\n$/, '')),
    });

  async function loadContext(): Promise<RunContext> {
    const stored = await deps.configManager.load();
    const config = ConverterConfigManager.applyEnvOverrides(stored, env);
    const logger =
      deps.logger ??
      new EnhancedLogger({
        level: config.logLevel,
        enableFileLogging: Boolean(env.IMGCONV_LOG_DIR),
        logDirectory: env.IMGCONV_LOG_DIR || './logs',
      });
    return { config, logger };
  }

  function fail(error: unknown, context: string): void {
    const normalized = toError(error);
    writeError(`❌ ${context}: ${normalized.message}`);
    if (normalized instanceof ValidationError && normalized.details.length > 1) {
      normalized.details.forEach((detail) => writeError(`   • ${detail}`));
    }
    setExitCode(EXIT_CODES.ERROR);
  }

  async function rememberRun(
    config: ConverterConfig,
    report: BatchReport,
    sourcePaths: string[],
    logger: Logger
  ): Promise<void> {
    try {
      await deps.configManager.update({
        outputDirectory: report.destinationDirectory,
        outputFormat: report.targetFormat,
        lastInputDirectory: inputDirectoryOf(sourcePaths) ?? config.lastInputDirectory,
      });
    } catch (error) {
      logger.warn('Could not save settings', { error: toError(error).message });
    }
  }

  async function runConversion(
    createSource: (context: RunContext) => RequestSource,
    options: RunOptions
  ): Promise<void> {
    let context: RunContext;
    try {
      context = await loadContext();
    } catch (error) {
      fail(error, 'Failed to load settings');
      return;
    }

    const { config, logger } = context;
    const display = new CLIProgressDisplay(write, writeError);
    const reporter = new ConversionReporter(logger);

    try {
      const source = createSource(context);
      logger.debug(`Building request from ${source.describe()}`);
      const request = await source.createRequest();

      if (options.mkdir) {
        const created = await directoryManagerFor(logger).ensureDirectory(request.destinationDirectory);
        if (!created.success) {
          throw new ValidationError(created.error ?? `Cannot create ${request.destinationDirectory}`);
        }
      }

      const codec = deps.codecRegistry.getCodec(options.codec);
      const orchestrator = new ConversionOrchestrator(codec, logger);
      const report = await orchestrator.convertBatch(request, {
        onOutcome: options.json ? undefined : (outcome, index, total) => display.handleOutcome(outcome, index, total),
      });

      if (options.json) {
        write(reporter.generateJsonReport(report));
      } else {
        display.displayFinalSummary(report);
        if (report.failed > 0) {
          display.displayRecommendations(orchestrator.getErrorHandler().generateErrorReport().recommendations);
        }
      }

      if (options.report) {
        const saved = await reporter.saveReport(report, path.resolve(options.report));
        if (!saved.success) {
          display.displayWarning(`Report not saved: ${saved.error}`);
        } else if (!options.json) {
          display.displayInfo(`Report saved to ${saved.filePath}`);
        }
      }

      if (report.succeeded > 0) {
        await rememberRun(config, report, request.sourcePaths, logger);
      }

      setExitCode(report.failed > 0 ? EXIT_CODES.PARTIAL_FAILURE : EXIT_CODES.SUCCESS);
    } catch (error) {
      fail(error, error instanceof ValidationError ? 'Invalid request' : 'Conversion failed');
    }
  }

  program
    .command('convert')
    .description('Convert image files (or the images inside folders) to one format')
    .argument('[paths...]', 'Image files or folders to convert')
    .option('-f, --format <format>', `Target format (${SUPPORTED_TARGET_FORMATS.join(', ')})`)
    .option('-o, --output <dir>', 'Destination directory')
    .option('-r, --recursive', 'Include images in subfolders of folder arguments')
    .option('-q, --quality <number>', 'Quality for lossy formats (1-100)', parseQuality)
    .option('--lossless', 'Lossless encoding for webp and avif')
    .addOption(
      new Option('--compression <type>', `TIFF compression (${TIFF_COMPRESSIONS.join(', ')})`).argParser(parseCompression)
    )
    .option('--mkdir', 'Create the destination directory if it is missing')
    .option('--codec <name>', 'Codec to convert with')
    .option('--json', 'Print the batch report as JSON')
    .option('--report <file>', 'Save the batch report (.json for JSON, text otherwise)')
    .action(async (paths: string[], options: ConvertCommandOptions) => {
      await runConversion(
        ({ config, logger }) =>
          new CliRequestSource(
            {
              paths,
              format: options.format,
              output: options.output,
              recursive: options.recursive,
              quality: options.quality,
              lossless: options.lossless,
              compression: options.compression,
            },
            config,
            directoryManagerFor(logger)
          ),
        options
      );
    });

  program
    .command('interactive')
    .description('Choose files, format and destination at a prompt, then convert')
    .option('--mkdir', 'Create the destination directory if it is missing')
    .option('--codec <name>', 'Codec to convert with')
    .option('--report <file>', 'Save the batch report (.json for JSON, text otherwise)')
    .action(async (options: RunOptions) => {
      await runConversion(
        ({ config, logger }) =>
          new InteractiveRequestSource(config, directoryManagerFor(logger), deps.prompt ?? readlinePrompter),
        options
      );
    });

  program
    .command('formats')
    .description('List target formats and whether the codec can write them')
    .option('--codec <name>', 'Codec to check')
    .option('--json', 'Print as JSON')
    .action((options: { codec?: string; json?: boolean }) => {
      try {
        const codec = deps.codecRegistry.getCodec(options.codec);
        const capabilities = new FormatValidator(codec).getFormatCapabilities();

        if (options.json) {
          write(JSON.stringify(capabilities, null, 2));
          return;
        }

        write(`📋 Target formats (${codec.getName()} codec):`);
        for (const capability of capabilities) {
          const statusIcon = capability.available ? '✅' : '❌';
          const lossy = capability.lossy ? 'quality' : 'lossless';
          write(`${statusIcon} ${capability.format.padEnd(5)} ${capability.extension.padEnd(6)} ${lossy}`);
        }
        setExitCode(EXIT_CODES.SUCCESS);
      } catch (error) {
        fail(error, 'Failed to list formats');
      }
    });

  program
    .command('info')
    .description('Show dimensions, channels and format of an image')
    .argument('<file>', 'Image file')
    .option('--codec <name>', 'Codec to read with')
    .option('--json', 'Print as JSON')
    .action(async (file: string, options: { codec?: string; json?: boolean }) => {
      try {
        const codec: ImageCodec = deps.codecRegistry.getCodec(options.codec);
        const info = await codec.getImageInfo(path.resolve(file));

        if (options.json) {
          write(JSON.stringify(info, null, 2));
          return;
        }

        write(`📄 ${info.path}`);
        write(`   Format: ${info.format}`);
        write(`   Dimensions: ${info.width} x ${info.height}`);
        write(`   Channels: ${info.channels}${info.hasAlpha ? ' (alpha)' : ''}`);
        if (info.space) {
          write(`   Color Space: ${info.space}`);
        }
        write(`   Size: ${formatBytes(info.sizeBytes)}`);
        setExitCode(EXIT_CODES.SUCCESS);
      } catch (error) {
        fail(error, 'Failed to read image');
      }
    });

  const configCommand = program.command('config').description('Show or change saved settings');

  configCommand
    .command('show')
    .description('Show the current settings')
    .action(async () => {
      try {
        const { config } = await loadContext();
        write(`⚙️  Settings (${deps.configManager.getSettingsPath()}):`);
        for (const [key, value] of Object.entries(ConverterConfigManager.getConfigSummary(config))) {
          write(`   ${key}: ${value}`);
        }
        setExitCode(EXIT_CODES.SUCCESS);
      } catch (error) {
        fail(error, 'Failed to load settings');
      }
    });

  configCommand
    .command('set')
    .description('Change one setting')
    .argument('<key>', 'Setting name')
    .argument('<value>', 'New value')
    .action(async (key: string, value: string) => {
      try {
        await deps.configManager.load();
        const updated = await deps.configManager.setFromString(key, value);
        write(`✅ ${key} = ${isConfigKey(key) ? String(updated[key]) : value}`);
        setExitCode(EXIT_CODES.SUCCESS);
      } catch (error) {
        fail(error, 'Failed to update settings');
      }
    });

  configCommand
    .command('reset')
    .description('Restore default settings')
    .action(async () => {
      try {
        await deps.configManager.reset();
        write('✅ Settings restored to defaults');
        setExitCode(EXIT_CODES.SUCCESS);
      } catch (error) {
        fail(error, 'Failed to reset settings');
      }
    });

  return program;
}

/**
 * Parse user arguments (without the node and script entries) and resolve to the exit code
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  let exitCode: number = EXIT_CODES.SUCCESS;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
