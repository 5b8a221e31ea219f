import { CalendarDate } from '../common/calendar-date';

/**
 * AnnualReview
 *
 * A row of the annual_reviews table. `employeeId` is not a checked
 * foreign key: reviews may reference employees that were never loaded.
 */
export interface AnnualReview {
  id: number;
  employeeId: number;
  reviewDate: CalendarDate;
}
