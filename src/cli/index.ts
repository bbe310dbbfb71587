#!/usr/bin/env node

// CLI entry point
import { ConverterConfigManager } from '../core/config-manager';
import { logger } from '../core/logger';
import { CodecRegistry, SharpCodec } from '../services/codec';
import { runCli } from './program';

const codecRegistry = new CodecRegistry();
codecRegistry.register(new SharpCodec(logger));

runCli(process.argv.slice(2), {
  configManager: new ConverterConfigManager(),
  codecRegistry,
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('❌ Unexpected error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
