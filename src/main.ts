import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AnalyticsService } from './analytics/services/analytics.service';
import { ReportingService } from './analytics/services/reporting.service';

const LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'];

function parseLogLevels(setting: string | undefined): LogLevel[] {
  if (!setting) {
    return ['log', 'warn', 'error'];
  }
  return LOG_LEVELS.filter((level) => setting.split(',').map((s) => s.trim()).includes(level));
}

async function bootstrap() {
  // Standalone application context: no HTTP server is started
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: parseLogLevels(process.env.LOG_LEVEL),
  });

  try {
    const configService = app.get(ConfigService);
    const analyticsService = app.get(AnalyticsService);
    const reportingService = app.get(ReportingService);

    // The engine never reads the clock; "today" is resolved here
    const evaluationDate =
      configService.get<string>('ANALYTICS_EVALUATION_DATE') ||
      new Date().toISOString().split('T')[0];

    const report = analyticsService.buildReport({ evaluationDate });
    const format = configService.get<string>('ANALYTICS_OUTPUT_FORMAT') || 'json';

    if (format === 'csv') {
      console.log(reportingService.generateReportCSV(report));
    } else {
      console.log(JSON.stringify(report, null, 2));
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Workforce report failed: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exitCode = 1;
});
