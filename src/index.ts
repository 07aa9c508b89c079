import { loadAppConfig, type AppConfig } from './shared/config/app-config';
import { createLogger, describeError, type ILogger } from './shared/logger';
import { CsvRecordStore } from './modules/employee/adapters/persistence/CsvRecordStore';
import { EventMatcher } from './modules/celebration/domain/services/EventMatcher';
import { FontResolver } from './modules/card-rendering/domain/services/FontResolver';
import { CanvasFontLoader } from './modules/card-rendering/adapters/canvas/CanvasFontLoader';
import { CanvasTextCompositor } from './modules/card-rendering/adapters/canvas/CanvasTextCompositor';
import { FileReportWriter } from './modules/reporting/adapters/filesystem/FileReportWriter';
import type { IEmailSender } from './modules/daily-run/application/ports/IEmailSender';
import {
  RunDailyCelebrationsUseCase,
  type DailyRunResult,
} from './modules/daily-run/application/use-cases/RunDailyCelebrationsUseCase';

/**
 * Wires the daily run from configuration
 *
 * @param emailSender - Delivery transport; cards are only saved when omitted
 */
export function createDailyRun(
  config: AppConfig,
  logger: ILogger,
  emailSender?: IEmailSender
): RunDailyCelebrationsUseCase {
  const fontResolver = new FontResolver(new CanvasFontLoader(), logger);

  return new RunDailyCelebrationsUseCase(
    new CsvRecordStore(logger),
    new EventMatcher(logger),
    new CanvasTextCompositor(fontResolver, logger),
    new FileReportWriter(logger),
    config,
    logger,
    { emailSender }
  );
}

/**
 * Runs today's celebrations once
 *
 * Sets `process.exitCode` to 1 when the configuration is invalid or the run
 * aborts; per-event failures only show up in the report.
 *
 * @returns the run result, or null when the run could not complete
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<DailyRunResult | null> {
  let config: AppConfig;
  try {
    config = loadAppConfig(env);
  } catch (error) {
    createLogger({ level: 'error', env: env.NODE_ENV }).error({
      msg: 'Invalid configuration',
      error: describeError(error),
    });
    process.exitCode = 1;
    return null;
  }

  const logger = createLogger({ level: config.logLevel, env: config.nodeEnv });
  logger.info({
    msg: 'Configuration loaded',
    employeeFile: config.employeeFile,
    outputDir: config.outputDir,
    timezone: config.timezone ?? 'system',
  });

  try {
    return await createDailyRun(config, logger).execute();
  } catch (error) {
    logger.error({
      msg: 'Daily run failed',
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
    return null;
  }
}

if (require.main === module) {
  void main();
}
