import { CalendarDate } from '../common/calendar-date';

/**
 * Employee
 *
 * A row of the employees table. A missing or null `terminationDate`
 * means the employee is still employed.
 */
export interface Employee {
  id: number;
  firstName: string;
  lastName: string;
  hireDate: CalendarDate;
  terminationDate?: CalendarDate | null;
  salary: number;
}
