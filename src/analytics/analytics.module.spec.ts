import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import * as path from 'path';
import { AnalyticsModule } from './analytics.module';
import { AnalyticsEngine } from './analytics-engine';
import { clearAnalyticsEnv } from './testing/analytics-env';
import { AnalyticsService } from './services/analytics.service';
import { ReportingService } from './services/reporting.service';

describe('AnalyticsModule', () => {
  let module: TestingModule;
  let restoreEnv: () => void;

  beforeAll(async () => {
    restoreEnv = clearAnalyticsEnv();
    module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [
            () => ({
              ANALYTICS_DATASET_PATH: path.resolve(__dirname, '../../data/case-study.json'),
              ANALYTICS_EVALUATION_DATE: '2020-01-01',
            }),
          ],
        }),
        AnalyticsModule,
      ],
    }).compile();
  });

  afterAll(async () => {
    await module.close();
    restoreEnv();
  });

  it('builds the engine from the configured dataset', () => {
    const engine = module.get(AnalyticsEngine);
    expect(engine.employeeCount).toBe(6);
    expect(engine.reviewCount).toBe(9);
  });

  it('renders the configured report as CSV', () => {
    const report = module.get(AnalyticsService).buildReport();
    const csv = module.get(ReportingService).generateConcurrencyCSV(report);

    expect(csv.split('\n')).toEqual([
      'Employee ID,First Name,Last Name,Max Concurrent Employees,First Date Reached',
      '1,"Bob","Smith",5,"2013-10-09"',
      '2,"Joe","Jarrod",5,"2013-10-09"',
      '3,"Nancy","Soley",5,"2013-10-09"',
      '4,"Keith","Widjaja",5,"2013-10-09"',
      '5,"Kelly","Smalls",5,"2013-10-09"',
      '6,"Frank","Nguyen",5,"2015-10-04"',
    ]);
  });
});
