#!/usr/bin/env tsx
import { loadConfig } from '@ces/config';
import { createChildLogger, createPinoLogger, toError } from '@ces/domain';
import { Scanner } from './application/orchestrator/scanner';
import { parseCliArgs, USAGE } from './cli/args';
import { APP_NAME } from './infrastructure/constants';
import { scannerModuleRegistry } from './infrastructure/di/module-registry';

const log = createChildLogger('main');

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const { options } = command;
  const { config, configPath } = loadConfig({ dataDir: options.dataDir, configPath: options.configPath });
  createPinoLogger({
    name: APP_NAME,
    logLevel: config.telemetry.logLevel,
    traceErrors: config.telemetry.traceErrors,
  });
  log.info(`${APP_NAME} starting...`, { configPath, dataDir: options.dataDir });

  const container = await scannerModuleRegistry(config, options);
  const scanner = new Scanner(container);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) {
      log.warn(`Received ${signal} again, exiting without waiting for the batch`);
      process.exit(1);
    }
    stopping = true;
    log.info(`Received ${signal}, finishing the current batch...`);
    scanner.stop();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await scanner.run();
  log.info('Shutdown complete');
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    log.fatal('Fatal error', toError(error));
    process.exit(1);
  },
);
