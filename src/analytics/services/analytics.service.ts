import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CalendarDate } from '../../common/calendar-date';
import { DataError } from '../../common/errors/data.error';
import { AnnualReview } from '../../entities/annual-review.entity';
import {
  AnalyticsEngine,
  ConcurrencyPeak,
  EmployeeName,
  NeverReviewedEmployee,
  StabilityPeriod,
  TenureSpan,
} from '../analytics-engine';

export const DEFAULT_NAME_PREFIX = 'Smith';

export interface WorkforceReportOptions {
  namePrefix?: string;
  evaluationDate?: CalendarDate;
}

/**
 * Workforce Report
 *
 * Answers to all five case-study questions for one evaluation date.
 */
export interface WorkforceReport {
  evaluationDate: CalendarDate;
  namePrefix: string;
  activeByLastNamePrefix: EmployeeName[];
  neverReviewed: NeverReviewedEmployee[];
  tenureSpan: TenureSpan;
  longestStabilityPeriod: StabilityPeriod | null;
  concurrencyPeaks: ConcurrencyPeak[];
  danglingReviews: AnnualReview[];
}

/**
 * AnalyticsService
 *
 * Runs the workforce queries against the loaded dataset. Parameters not
 * passed explicitly come from ANALYTICS_NAME_PREFIX and
 * ANALYTICS_EVALUATION_DATE.
 */
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(
    private engine: AnalyticsEngine,
    private configService: ConfigService,
  ) {}

  /**
   * Build the full report
   *
   * @throws DataError when no evaluation date is given or configured, or
   * when it is not a valid YYYY-MM-DD date
   */
  buildReport(options: WorkforceReportOptions = {}): WorkforceReport {
    const namePrefix = this.resolveNamePrefix(options.namePrefix);
    const evaluationDate = this.resolveEvaluationDate(options.evaluationDate);

    this.logger.debug(
      `Building workforce report: prefix "${namePrefix}", evaluation date ${evaluationDate}`,
    );

    const concurrencyPeaks = this.engine.maxConcurrentEmployeesPerTenure(evaluationDate);
    const report: WorkforceReport = {
      evaluationDate,
      namePrefix,
      activeByLastNamePrefix: this.engine.findActiveByLastNamePrefix(namePrefix),
      neverReviewed: this.engine.findNeverReviewed(),
      tenureSpan: this.engine.tenureSpan(),
      longestStabilityPeriod: this.engine.longestStabilityPeriod(),
      concurrencyPeaks,
      danglingReviews: this.engine.findDanglingReviews(),
    };

    this.logger.debug(
      `Report built: ${report.activeByLastNamePrefix.length} prefix matches, ` +
        `${report.neverReviewed.length} never reviewed, ` +
        `${report.danglingReviews.length} dangling reviews`,
    );

    return report;
  }

  private resolveNamePrefix(namePrefix?: string): string {
    if (namePrefix !== undefined) {
      return namePrefix;
    }
    return this.configService.get<string>('ANALYTICS_NAME_PREFIX') ?? DEFAULT_NAME_PREFIX;
  }

  private resolveEvaluationDate(evaluationDate?: CalendarDate): CalendarDate {
    const resolved =
      evaluationDate ?? this.configService.get<string>('ANALYTICS_EVALUATION_DATE');
    if (!resolved) {
      throw new DataError(
        'An evaluation date is required: pass evaluationDate or set ANALYTICS_EVALUATION_DATE',
      );
    }
    return resolved;
  }
}
