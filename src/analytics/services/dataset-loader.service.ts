import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { readFileSync } from 'fs';
import * as path from 'path';
import { DataError } from '../../common/errors/data.error';
import { DatasetDto } from '../../dto/dataset.dto';
import { AnnualReview } from '../../entities/annual-review.entity';
import { Employee } from '../../entities/employee.entity';
import { AnalyticsEngine } from '../analytics-engine';

export const DEFAULT_DATASET_PATH = 'data/case-study.json';

export interface Dataset {
  employees: Employee[];
  reviews: AnnualReview[];
}

/**
 * Flatten nested class-validator errors into `path: message` lines
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const propertyPath = parentPath ? `${parentPath}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {}).map(
      (message) => `${propertyPath}: ${message}`,
    );
    return [...messages, ...flattenValidationErrors(error.children ?? [], propertyPath)];
  });
}

/**
 * DatasetLoaderService
 *
 * Reads a workforce dataset from a JSON file, validates it with the
 * dataset DTOs and builds the AnalyticsEngine over it.
 *
 * The file path comes from ANALYTICS_DATASET_PATH and is resolved against
 * the working directory.
 */
@Injectable()
export class DatasetLoaderService {
  private readonly logger = new Logger(DatasetLoaderService.name);

  constructor(private configService: ConfigService) {}

  getDatasetPath(): string {
    const configured =
      this.configService.get<string>('ANALYTICS_DATASET_PATH') || DEFAULT_DATASET_PATH;
    return path.resolve(process.cwd(), configured);
  }

  /**
   * Load the configured dataset and construct the engine
   */
  loadEngine(): AnalyticsEngine {
    const datasetPath = this.getDatasetPath();
    const dataset = this.readFile(datasetPath);
    const engine = new AnalyticsEngine(dataset.employees, dataset.reviews);

    this.logger.log(
      `Loaded ${engine.employeeCount} employees and ${engine.reviewCount} reviews from ${datasetPath}`,
    );

    const dangling = engine.findDanglingReviews();
    if (dangling.length > 0) {
      this.logger.warn(
        `${dangling.length} reviews reference unknown employees: ${dangling
          .map((review) => review.employeeId)
          .join(', ')}`,
      );
    }

    return engine;
  }

  readFile(datasetPath: string): Dataset {
    this.logger.debug(`Reading dataset from ${datasetPath}`);
    let contents: string;
    try {
      contents = readFileSync(datasetPath, 'utf8');
    } catch (error) {
      throw new DataError(`Dataset file ${datasetPath} could not be read`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      throw new DataError(`Dataset file ${datasetPath} is not valid JSON`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    return this.parse(raw);
  }

  /**
   * Validate a parsed dataset and map its rows to entities
   */
  parse(raw: unknown): Dataset {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new DataError('Dataset must be a JSON object with employees and reviews arrays');
    }

    const dto = plainToInstance(DatasetDto, raw);
    const errors = validateSync(dto, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });

    if (errors.length > 0) {
      throw new DataError('Dataset failed validation', flattenValidationErrors(errors));
    }

    return {
      employees: dto.employees.map((row) => ({
        id: row.id,
        firstName: row.first_name,
        lastName: row.last_name,
        hireDate: row.hire_date,
        terminationDate: row.termination_date ?? null,
        salary: row.salary,
      })),
      reviews: dto.reviews.map((row) => ({
        id: row.id,
        employeeId: row.employee_id,
        reviewDate: row.review_date,
      })),
    };
  }
}
