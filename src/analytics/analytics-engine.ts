import { CalendarDate, formatDayNumber, parseCalendarDate } from '../common/calendar-date';
import { DataError } from '../common/errors/data.error';
import { AnnualReview } from '../entities/annual-review.entity';
import { Employee } from '../entities/employee.entity';

export interface EmployeeName {
  firstName: string;
  lastName: string;
}

export interface NeverReviewedEmployee extends EmployeeName {
  hireDate: CalendarDate;
}

/**
 * Spread of hire dates across active employees
 */
export interface TenureSpan {
  days: number;
  earliestHireDate: CalendarDate | null;
  latestHireDate: CalendarDate | null;
  activeEmployees: number;
}

export type WorkforceEventType = 'hire' | 'termination';

export interface WorkforceEvent {
  type: WorkforceEventType;
  employeeId: number;
  date: CalendarDate;
}

/**
 * Gap between two consecutive hire/termination events
 */
export interface StabilityPeriod {
  days: number;
  startDate: CalendarDate;
  endDate: CalendarDate;
}

export interface ConcurrencyPeak {
  employeeId: number;
  firstName: string;
  lastName: string;
  maxConcurrentCount: number;
  firstDateMaxReached: CalendarDate;
}

interface EmployeeRow {
  employee: Readonly<Employee>;
  hireDay: number;
  terminationDay: number | null;
}

interface TimelineStep {
  day: number;
  count: number;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * AnalyticsEngine
 *
 * Read-only analytical queries over an employee/annual-review dataset.
 * Inputs are validated and frozen at construction; every query is pure and
 * returns a fresh array. Sorting relies on Array.prototype.sort being stable,
 * so equal keys keep insertion order.
 */
export class AnalyticsEngine {
  private readonly rows: ReadonlyArray<EmployeeRow>;
  private readonly reviews: ReadonlyArray<Readonly<AnnualReview>>;
  private readonly employeeIds: ReadonlySet<number>;
  private readonly reviewedEmployeeIds: ReadonlySet<number>;

  constructor(employees: readonly Employee[], reviews: readonly AnnualReview[]) {
    const issues: string[] = [];
    const rows: EmployeeRow[] = [];
    const employeeIds = new Set<number>();

    employees.forEach((employee, index) => {
      const label = `employees[${index}]`;

      if (!Number.isInteger(employee.id)) {
        issues.push(`${label}.id must be an integer, got ${String(employee.id)}`);
      } else if (employeeIds.has(employee.id)) {
        issues.push(`${label}.id ${employee.id} is already used by another employee`);
      }
      employeeIds.add(employee.id);

      if (!Number.isFinite(employee.salary) || employee.salary < 0) {
        issues.push(`${label}.salary must be a non-negative number, got ${String(employee.salary)}`);
      }

      const hireDay = parseCalendarDate(employee.hireDate);
      if (hireDay === null) {
        issues.push(`${label}.hireDate is not a valid YYYY-MM-DD date: ${String(employee.hireDate)}`);
      }

      let terminationDay: number | null = null;
      if (employee.terminationDate !== undefined && employee.terminationDate !== null) {
        terminationDay = parseCalendarDate(employee.terminationDate);
        if (terminationDay === null) {
          issues.push(
            `${label}.terminationDate is not a valid YYYY-MM-DD date: ${String(employee.terminationDate)}`,
          );
        } else if (hireDay !== null && terminationDay < hireDay) {
          issues.push(
            `${label}.terminationDate ${employee.terminationDate} is earlier than hireDate ${employee.hireDate}`,
          );
        }
      }

      if (hireDay !== null) {
        rows.push({
          employee: Object.freeze({ ...employee }),
          hireDay,
          terminationDay,
        });
      }
    });

    const reviewIds = new Set<number>();
    reviews.forEach((review, index) => {
      const label = `reviews[${index}]`;

      if (!Number.isInteger(review.id)) {
        issues.push(`${label}.id must be an integer, got ${String(review.id)}`);
      } else if (reviewIds.has(review.id)) {
        issues.push(`${label}.id ${review.id} is already used by another review`);
      }
      reviewIds.add(review.id);

      if (!Number.isInteger(review.employeeId)) {
        issues.push(`${label}.employeeId must be an integer, got ${String(review.employeeId)}`);
      }
      if (parseCalendarDate(review.reviewDate) === null) {
        issues.push(`${label}.reviewDate is not a valid YYYY-MM-DD date: ${String(review.reviewDate)}`);
      }
    });

    if (issues.length > 0) {
      throw new DataError('Invalid workforce dataset', issues);
    }

    this.rows = Object.freeze(rows);
    this.reviews = Object.freeze(reviews.map((review) => Object.freeze({ ...review })));
    this.employeeIds = employeeIds;
    this.reviewedEmployeeIds = new Set(reviews.map((review) => review.employeeId));
  }

  get employeeCount(): number {
    return this.rows.length;
  }

  get reviewCount(): number {
    return this.reviews.length;
  }

  /**
   * Active employees whose last name starts with `prefix`, like
   * `LIKE 'prefix%'` under a binary collation: the match is case-sensitive
   * and the empty prefix matches everyone.
   */
  findActiveByLastNamePrefix(prefix: string): EmployeeName[] {
    return this.activeRows()
      .filter((row) => row.employee.lastName.startsWith(prefix))
      .sort(
        (a, b) =>
          compareText(a.employee.lastName, b.employee.lastName) ||
          compareText(a.employee.firstName, b.employee.firstName),
      )
      .map(({ employee }) => ({
        firstName: employee.firstName,
        lastName: employee.lastName,
      }));
  }

  /**
   * Employees referenced by no review, oldest hire first.
   */
  findNeverReviewed(): NeverReviewedEmployee[] {
    return this.rows
      .filter((row) => !this.reviewedEmployeeIds.has(row.employee.id))
      .sort((a, b) => a.hireDay - b.hireDay)
      .map(({ employee }) => ({
        firstName: employee.firstName,
        lastName: employee.lastName,
        hireDate: employee.hireDate,
      }));
  }

  /**
   * Reviews whose employee id matches no loaded employee.
   */
  findDanglingReviews(): AnnualReview[] {
    return this.reviews
      .filter((review) => !this.employeeIds.has(review.employeeId))
      .map((review) => ({ ...review }));
  }

  tenureSpan(): TenureSpan {
    const active = this.activeRows();
    if (active.length === 0) {
      return { days: 0, earliestHireDate: null, latestHireDate: null, activeEmployees: 0 };
    }

    let earliest = active[0].hireDay;
    let latest = active[0].hireDay;
    for (const row of active) {
      earliest = Math.min(earliest, row.hireDay);
      latest = Math.max(latest, row.hireDay);
    }

    return {
      days: latest - earliest,
      earliestHireDate: formatDayNumber(earliest),
      latestHireDate: formatDayNumber(latest),
      activeEmployees: active.length,
    };
  }

  tenureSpanDays(): number {
    return this.tenureSpan().days;
  }

  /**
   * Hire and termination events in date order. On equal dates an
   * employee's hire comes before their termination, and employees keep
   * insertion order.
   */
  workforceEvents(): WorkforceEvent[] {
    return this.sortedEventDays().map(({ type, employeeId, day }) => ({
      type,
      employeeId,
      date: formatDayNumber(day),
    }));
  }

  /**
   * Longest gap between consecutive workforce events. The first gap wins
   * on ties; null when there are fewer than two events.
   */
  longestStabilityPeriod(): StabilityPeriod | null {
    const events = this.sortedEventDays();
    let longest: { days: number; start: number; end: number } | null = null;

    for (let i = 0; i + 1 < events.length; i++) {
      const days = events[i + 1].day - events[i].day;
      if (longest === null || days > longest.days) {
        longest = { days, start: events[i].day, end: events[i + 1].day };
      }
    }

    if (longest === null) {
      return null;
    }
    return {
      days: longest.days,
      startDate: formatDayNumber(longest.start),
      endDate: formatDayNumber(longest.end),
    };
  }

  longestStabilityPeriodDays(): number {
    return this.longestStabilityPeriod()?.days ?? 0;
  }

  /**
   * For each employee, the highest headcount reached on any day of their
   * tenure and the first day it was reached. Tenures are inclusive of both
   * ends; open tenures run through `evaluationDate` (or only the hire day
   * when the employee was hired after it). Results follow input order.
   */
  maxConcurrentEmployeesPerTenure(evaluationDate: CalendarDate): ConcurrencyPeak[] {
    const evaluationDay = parseCalendarDate(evaluationDate);
    if (evaluationDay === null) {
      throw new DataError('Invalid evaluation date', [
        `evaluationDate is not a valid YYYY-MM-DD date: ${String(evaluationDate)}`,
      ]);
    }

    const intervals = this.rows.map((row) => ({
      row,
      start: row.hireDay,
      end: row.terminationDay ?? Math.max(evaluationDay, row.hireDay),
    }));

    // Headcount changes on each hire day and on the day after each tenure ends
    const deltas = new Map<number, number>();
    for (const { start, end } of intervals) {
      deltas.set(start, (deltas.get(start) ?? 0) + 1);
      deltas.set(end + 1, (deltas.get(end + 1) ?? 0) - 1);
    }

    let running = 0;
    const timeline: TimelineStep[] = [...deltas.keys()]
      .sort((a, b) => a - b)
      .map((day) => {
        running += deltas.get(day) ?? 0;
        return { day, count: running };
      });

    return intervals.map(({ row, start, end }) => {
      let maxCount = 0;
      let firstDay = start;

      for (let i = this.firstStepAtOrAfter(timeline, start); i < timeline.length; i++) {
        const step = timeline[i];
        if (step.day > end) break;
        if (step.count > maxCount) {
          maxCount = step.count;
          firstDay = step.day;
        }
      }

      return {
        employeeId: row.employee.id,
        firstName: row.employee.firstName,
        lastName: row.employee.lastName,
        maxConcurrentCount: maxCount,
        firstDateMaxReached: formatDayNumber(firstDay),
      };
    });
  }

  private activeRows(): EmployeeRow[] {
    return this.rows.filter((row) => row.terminationDay === null);
  }

  private sortedEventDays(): Array<{ type: WorkforceEventType; employeeId: number; day: number }> {
    const events: Array<{ type: WorkforceEventType; employeeId: number; day: number }> = [];
    for (const row of this.rows) {
      events.push({ type: 'hire', employeeId: row.employee.id, day: row.hireDay });
      if (row.terminationDay !== null) {
        events.push({ type: 'termination', employeeId: row.employee.id, day: row.terminationDay });
      }
    }
    return events.sort((a, b) => a.day - b.day);
  }

  private firstStepAtOrAfter(timeline: TimelineStep[], day: number): number {
    let low = 0;
    let high = timeline.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (timeline[mid].day < day) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
