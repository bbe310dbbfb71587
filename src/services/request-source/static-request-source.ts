import { ConversionRequest } from '../../types';
import { RequestSource } from './interfaces';

export class StaticRequestSource implements RequestSource {
  private readonly request: ConversionRequest;

  constructor(request: ConversionRequest) {
    this.request = request;
  }

  describe(): string {
    return `static request (${this.request.sourcePaths.length} file(s))`;
  }

  async createRequest(): Promise<ConversionRequest> {
    return {
      ...this.request,
      sourcePaths: [...this.request.sourcePaths],
      encodeOptions: this.request.encodeOptions ? { ...this.request.encodeOptions } : undefined,
    };
  }
}
