import { ConversionRequest } from '../../types';

/**
 * Anything able to produce a conversion request: argument parser, prompt or test harness
 */
export interface RequestSource {
  describe(): string;
  createRequest(): Promise<ConversionRequest>;
}

/**
 * Asks a question and resolves with the trimmed answer
 */
export type Prompter = (question: string) => Promise<string>;
