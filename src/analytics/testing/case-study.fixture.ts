import { AnnualReview } from '../../entities/annual-review.entity';
import { Employee } from '../../entities/employee.entity';

/**
 * Case-study dataset, as loaded from data/case-study.json.
 * Reviews 30-70 reference employees 10, 22, 11, 12 and 13, which do not exist.
 */
export const CASE_STUDY_EMPLOYEES: Employee[] = [
  { id: 1, firstName: 'Bob', lastName: 'Smith', hireDate: '2009-06-20', terminationDate: '2016-01-01', salary: 10000 },
  { id: 2, firstName: 'Joe', lastName: 'Jarrod', hireDate: '2010-12-02', terminationDate: null, salary: 20000 },
  { id: 3, firstName: 'Nancy', lastName: 'Soley', hireDate: '2012-03-14', terminationDate: null, salary: 30000 },
  { id: 4, firstName: 'Keith', lastName: 'Widjaja', hireDate: '2013-10-09', terminationDate: '2014-01-01', salary: 20000 },
  { id: 5, firstName: 'Kelly', lastName: 'Smalls', hireDate: '2013-10-09', terminationDate: null, salary: 20000 },
  { id: 6, firstName: 'Frank', lastName: 'Nguyen', hireDate: '2015-10-04', terminationDate: '2016-03-01', salary: 60000 },
];

export const CASE_STUDY_REVIEWS: AnnualReview[] = [
  { id: 10, employeeId: 1, reviewDate: '2016-01-01' },
  { id: 20, employeeId: 2, reviewDate: '2016-04-12' },
  { id: 30, employeeId: 10, reviewDate: '2015-02-13' },
  { id: 40, employeeId: 22, reviewDate: '2010-10-12' },
  { id: 50, employeeId: 11, reviewDate: '2009-01-01' },
  { id: 60, employeeId: 12, reviewDate: '2009-03-03' },
  { id: 70, employeeId: 13, reviewDate: '2008-12-01' },
  { id: 80, employeeId: 1, reviewDate: '2003-04-12' },
  { id: 90, employeeId: 1, reviewDate: '2014-04-30' },
];
