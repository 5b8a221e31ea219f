import { formatDayNumber, parseCalendarDate } from './calendar-date';

describe('calendar-date', () => {
  describe('parseCalendarDate', () => {
    it('returns days since the epoch', () => {
      expect(parseCalendarDate('1970-01-01')).toBe(0);
      expect(parseCalendarDate('1970-01-02')).toBe(1);
      expect(parseCalendarDate('1969-12-31')).toBe(-1);
    });

    it('accepts leap days only in leap years', () => {
      expect(parseCalendarDate('2012-02-29')).not.toBeNull();
      expect(parseCalendarDate('2013-02-29')).toBeNull();
    });

    it.each([
      ['2013-02-30'],
      ['2013-13-01'],
      ['2013-10-9'],
      ['09/10/2013'],
      ['2013-10-09T00:00:00Z'],
      [''],
    ])('rejects %p', (value) => {
      expect(parseCalendarDate(value)).toBeNull();
    });

    it('rejects non-strings', () => {
      expect(parseCalendarDate(20131009)).toBeNull();
      expect(parseCalendarDate(null)).toBeNull();
      expect(parseCalendarDate(undefined)).toBeNull();
    });
  });

  it('formats day numbers back to dates', () => {
    expect(formatDayNumber(0)).toBe('1970-01-01');
    expect(formatDayNumber(parseCalendarDate('2013-10-09') ?? NaN)).toBe('2013-10-09');
  });

  it('gives whole-day differences across a leap year', () => {
    const hired = parseCalendarDate('2010-12-02') ?? NaN;
    expect((parseCalendarDate('2013-10-09') ?? NaN) - hired).toBe(1042);
    expect((parseCalendarDate('2012-03-01') ?? NaN) - (parseCalendarDate('2012-02-28') ?? NaN)).toBe(2);
  });
});
