import { IsArray, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { EmployeeRecordDto } from './employee-record.dto';
import { AnnualReviewRecordDto } from './annual-review-record.dto';

/**
 * DatasetDto
 *
 * Shape of a dataset file: the employees and annual_reviews tables as
 * arrays of snake_case rows.
 */
export class DatasetDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EmployeeRecordDto)
  employees!: EmployeeRecordDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AnnualReviewRecordDto)
  reviews!: AnnualReviewRecordDto[];
}
