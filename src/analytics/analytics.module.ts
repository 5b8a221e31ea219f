import { Module } from '@nestjs/common';
import { AnalyticsEngine } from './analytics-engine';
import { AnalyticsService } from './services/analytics.service';
import { DatasetLoaderService } from './services/dataset-loader.service';
import { ReportingService } from './services/reporting.service';

/**
 * AnalyticsModule
 *
 * Handles:
 * - Loading the workforce dataset (employees, annual reviews)
 * - The read-only AnalyticsEngine built over it
 * - Report assembly and CSV export
 *
 * The engine is built once when the module initializes; a dataset that
 * fails validation aborts startup with a DataError.
 */
@Module({
  providers: [
    DatasetLoaderService,
    {
      provide: AnalyticsEngine,
      useFactory: (loader: DatasetLoaderService) => loader.loadEngine(),
      inject: [DatasetLoaderService],
    },
    AnalyticsService,
    ReportingService,
  ],
  exports: [AnalyticsEngine, AnalyticsService, ReportingService],
})
export class AnalyticsModule {}
