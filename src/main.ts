#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliLogger, logLevelsFor } from './cli/cli-logger';
import { USAGE, parseCliArgs } from './cli/cli-args';
import { ReportCommandService } from './cli/report-command.service';
import { IrpfReportError, UsageError } from './common/errors/report.errors';
import reportConfig from './config/report.config';

async function bootstrap(argv: string[]): Promise<number> {
  let command: ReturnType<typeof parseCliArgs>;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`irpf-report: ${error.message}\n\n${USAGE}`);
      return error.exitCode;
    }
    throw error;
  }

  if (command.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const { options } = command;
  const threshold = options.verbose ? 'verbose' : reportConfig().logLevel;
  const logger = new CliLogger('irpf-report', { logLevels: logLevelsFor(threshold) });

  const app = await NestFactory.createApplicationContext(AppModule, { logger, abortOnError: false });
  try {
    await app.get(ReportCommandService).run(options);
    return 0;
  } catch (error) {
    if (error instanceof IrpfReportError) {
      process.stderr.write(`irpf-report: ${error.message}\n`);
      return error.exitCode;
    }
    throw error;
  } finally {
    await app.close();
  }
}

bootstrap(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`irpf-report: unexpected failure: ${error instanceof Error ? error.stack : String(error)}\n`);
    process.exitCode = 1;
  });
