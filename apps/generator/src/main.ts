import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CliUsageError, USAGE, parseCliArgs, type CliArgs } from './cli/cli-args';
import { EXIT_CODES, exitCodeFor, exitCodeForChecks, formatChecks, formatSummary, writeSummary } from './cli/run-report';
import { redactEnv, validateEnv } from './config/env.config';
import { logLevelsFor } from './config/log-levels';

async function bootstrap(): Promise<number> {
  const logger = new Logger('Bootstrap');

  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    process.stderr.write(`${err.message}\n\n${USAGE}\n`);
    return EXIT_CODES.FATAL;
  }
  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return EXIT_CODES.OK;
  }

  const env = validateEnv(process.env);
  if (args.showConfig) {
    process.stdout.write(`${JSON.stringify(redactEnv(env), null, 2)}\n`);
    return EXIT_CODES.OK;
  }

  // Loaded only now: ConfigModule validates the environment as soon as the module is imported
  const { AppModule } = await import('./app.module');
  const { PipelineService } = await import('./modules/pipeline/pipeline.service');
  const { DiagnosticsService } = await import('./modules/diagnostics/diagnostics.service');
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFor(args.verbose ? 'debug' : env.LOG_LEVEL),
  });

  if (args.check) {
    try {
      const report = await app.get(DiagnosticsService).runChecks();
      process.stdout.write(formatChecks(report));
      return exitCodeForChecks(report);
    } finally {
      await app.close();
    }
  }

  // First Ctrl-C stops dispatch; a second one kills the process
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted: finishing rows in flight, no new rows will start');
    controller.abort();
  });

  try {
    const summary = await app.get(PipelineService).run({ dryRun: args.dryRun, signal: controller.signal });
    process.stdout.write(formatSummary(summary));

    const summaryPath = args.summaryPath ?? env.RUN_SUMMARY_PATH;
    if (summaryPath) {
      const written = await writeSummary(summaryPath, summary);
      logger.log(`Run summary written to ${written}`);
    }
    return exitCodeFor(summary);
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    new Logger('Bootstrap').fatal(`Run aborted: ${message}`);
    process.exitCode = EXIT_CODES.FATAL;
  });
