import {
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Min,
} from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../common/calendar-date';

/**
 * EmployeeRecordDto
 *
 * One row of the `employees` array in a dataset file.
 */
export class EmployeeRecordDto {
  @IsInt()
  id!: number;

  @IsString()
  @IsNotEmpty()
  first_name!: string;

  @IsString()
  @IsNotEmpty()
  last_name!: string;

  @Matches(CALENDAR_DATE_PATTERN, { message: 'hire_date must be in YYYY-MM-DD format' })
  @IsISO8601({ strict: true })
  hire_date!: string;

  // null or absent while still employed
  @Matches(CALENDAR_DATE_PATTERN, { message: 'termination_date must be in YYYY-MM-DD format' })
  @IsISO8601({ strict: true })
  @IsOptional()
  termination_date?: string | null;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  salary!: number;
}
