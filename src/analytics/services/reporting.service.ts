import { Injectable } from '@nestjs/common';
import { WorkforceReport } from './analytics.service';

type CsvCell = string | number | null;

/**
 * Quote text cells, doubling embedded quotes. Numbers are written as-is and
 * null becomes an empty cell.
 */
function toCsvCell(value: CsvCell): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return `"${value.replace(/"/g, '""')}"`;
}

function toCsvLine(cells: CsvCell[]): string {
  return cells.map(toCsvCell).join(',');
}

/**
 * ReportingService
 *
 * Converts workforce report sections to CSV.
 */
@Injectable()
export class ReportingService {
  generateActiveByPrefixCSV(report: WorkforceReport): string {
    const lines: string[] = ['First Name,Last Name'];
    report.activeByLastNamePrefix.forEach((item) => {
      lines.push(toCsvLine([item.firstName, item.lastName]));
    });
    return lines.join('\n');
  }

  generateNeverReviewedCSV(report: WorkforceReport): string {
    const lines: string[] = ['First Name,Last Name,Hire Date'];
    report.neverReviewed.forEach((item) => {
      lines.push(toCsvLine([item.firstName, item.lastName, item.hireDate]));
    });
    return lines.join('\n');
  }

  generateTenureSpanCSV(report: WorkforceReport): string {
    const { tenureSpan } = report;
    return [
      'Active Employees,Earliest Hire Date,Latest Hire Date,Span Days',
      toCsvLine([
        tenureSpan.activeEmployees,
        tenureSpan.earliestHireDate,
        tenureSpan.latestHireDate,
        tenureSpan.days,
      ]),
    ].join('\n');
  }

  generateStabilityPeriodCSV(report: WorkforceReport): string {
    const period = report.longestStabilityPeriod;
    return [
      'Start Date,End Date,Days',
      toCsvLine([period?.startDate ?? null, period?.endDate ?? null, period?.days ?? 0]),
    ].join('\n');
  }

  generateConcurrencyCSV(report: WorkforceReport): string {
    const lines: string[] = [
      'Employee ID,First Name,Last Name,Max Concurrent Employees,First Date Reached',
    ];
    report.concurrencyPeaks.forEach((item) => {
      lines.push(
        toCsvLine([
          item.employeeId,
          item.firstName,
          item.lastName,
          item.maxConcurrentCount,
          item.firstDateMaxReached,
        ]),
      );
    });
    return lines.join('\n');
  }

  generateDanglingReviewsCSV(report: WorkforceReport): string {
    const lines: string[] = ['Review ID,Employee ID,Review Date'];
    report.danglingReviews.forEach((item) => {
      lines.push(toCsvLine([item.id, item.employeeId, item.reviewDate]));
    });
    return lines.join('\n');
  }

  /**
   * All sections, each under a `# name` line, separated by blank lines
   */
  generateReportCSV(report: WorkforceReport): string {
    const sections: Array<[string, string]> = [
      [`active_by_last_name_prefix (${report.namePrefix})`, this.generateActiveByPrefixCSV(report)],
      ['never_reviewed', this.generateNeverReviewedCSV(report)],
      ['tenure_span', this.generateTenureSpanCSV(report)],
      ['longest_stability_period', this.generateStabilityPeriodCSV(report)],
      [`concurrency_peaks (${report.evaluationDate})`, this.generateConcurrencyCSV(report)],
      ['dangling_reviews', this.generateDanglingReviewsCSV(report)],
    ];
    return sections.map(([name, csv]) => `# ${name}\n${csv}`).join('\n\n');
  }
}
