import * as path from 'path';
import * as readline from 'readline';
import { ConversionRequest } from '../../types';
import { ConverterConfig } from '../../core/config-manager';
import { SUPPORTED_TARGET_FORMATS } from '../../core/constants';
import { ValidationError } from '../../core/errors';
import { DirectoryManager } from '../local/directory-manager';
import { Prompter, RequestSource } from './interfaces';
import { buildEncodeOptions, expandSourcePaths } from './request-builder';

/**
 * Prompt on stdin/stdout, one readline interface per question
 */
export const readlinePrompter: Prompter = (question) =>
  new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });

/**
 * Split a typed list of paths on commas or whitespace; quotes keep spaces together
 */
export function parsePathList(input: string): string[] {
  const matches = input.match(/"[^"]*"|'[^']*'|[^\s,]+/g) ?? [];
  return matches
    .map((match) => match.replace(/^["']|["']$/g, '').trim())
    .filter((match) => match.length > 0);
}

/**
 * Terminal stand-in for the file dialog. Relative answers resolve against the
 * last used input directory.
 */
export class InteractiveRequestSource implements RequestSource {
  private readonly config: ConverterConfig;
  private readonly directoryManager: DirectoryManager;
  private readonly prompt: Prompter;

  constructor(config: ConverterConfig, directoryManager: DirectoryManager, prompt: Prompter = readlinePrompter) {
    this.config = config;
    this.directoryManager = directoryManager;
    this.prompt = prompt;
  }

  describe(): string {
    return 'interactive prompt';
  }

  async createRequest(): Promise<ConversionRequest> {
    const baseDirectory = this.config.lastInputDirectory || process.cwd();

    const pathsAnswer = await this.prompt(`Image files or folders (relative to ${baseDirectory}): `);
    const inputs = parsePathList(pathsAnswer).map((input) => path.resolve(baseDirectory, input));
    if (inputs.length === 0) {
      throw new ValidationError('No source files were given');
    }

    const formatAnswer = await this.prompt(
      `Target format [${SUPPORTED_TARGET_FORMATS.join('/')}] (${this.config.outputFormat}): `
    );
    const targetFormat = formatAnswer || this.config.outputFormat;

    const defaultDestination = this.config.outputDirectory || baseDirectory;
    const destinationAnswer = await this.prompt(`Destination directory (${defaultDestination}): `);
    const destination = path.resolve(baseDirectory, destinationAnswer || defaultDestination);

    return {
      sourcePaths: await expandSourcePaths(inputs, this.directoryManager, this.config.recursive),
      targetFormat,
      destinationDirectory: destination,
      encodeOptions: buildEncodeOptions(targetFormat, this.config),
    };
  }
}
