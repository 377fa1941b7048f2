#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { RunPipelineUseCase } from './application/use-cases';
import { CliCommand, USAGE, VERSION, PROGRAM_NAME, banner, parseCliArguments } from './cli/cli-options';
import { ExitCode, exitCodeFor, isPipelineError } from './domain/errors/pipeline.errors';

/**
 * Bootstrap the command line application
 * Resolves with the process exit code; never calls process.exit itself
 * unless the user interrupts twice.
 */
async function bootstrap(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArguments(argv, process.cwd());
  } catch (error) {
    process.stderr.write(`${PROGRAM_NAME}: ${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return exitCodeFor(error);
  }

  if (command.kind === 'help') {
    process.stdout.write(USAGE);
    return ExitCode.SUCCESS;
  }
  if (command.kind === 'version') {
    process.stdout.write(`${PROGRAM_NAME} release ${VERSION}\n`);
    return ExitCode.SUCCESS;
  }

  const { options } = command;
  process.stdout.write(banner());
  if (options.mode.verbose) {
    process.env.LOG_LEVEL = 'debug';
  }

  // Create NestJS application context (no HTTP server)
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  const logger = app.get(PinoLoggerService);
  app.useLogger(logger);

  const controller = new AbortController();
  let interruptions = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    interruptions++;
    if (interruptions > 1) {
      process.exit(ExitCode.INTERRUPTED);
    }
    logger.warn({ signal }, 'User interrupted! Stopping at the next safe point...');
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const result = await app.get(RunPipelineUseCase).execute({
      selection: options.selection,
      mode: options.mode,
      workDir: options.workDir,
      signal: controller.signal,
    });
    return result.cleanupError ? result.cleanupError.exitCode : ExitCode.SUCCESS;
  } catch (error) {
    if (!isPipelineError(error)) {
      logger.error(
        {
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        'Unexpected failure',
      );
    }
    return exitCodeFor(error);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Failed to start:', error);
    process.exitCode = ExitCode.INTERNAL_ERROR;
  },
);
