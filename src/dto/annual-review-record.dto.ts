import { IsInt, IsISO8601, Matches } from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../common/calendar-date';

export class AnnualReviewRecordDto {
  @IsInt()
  id!: number;

  // Not checked against the employees array
  @IsInt()
  employee_id!: number;

  @Matches(CALENDAR_DATE_PATTERN, { message: 'review_date must be in YYYY-MM-DD format' })
  @IsISO8601({ strict: true })
  review_date!: string;
}
