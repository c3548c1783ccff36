import { isoWeekKey, isoWeekOf, previousWeekStart, weekStartLabel, weekStartsBetween } from './iso-week.util';

describe('iso-week utils', () => {
  describe('isoWeekKey', () => {
    const cases: Array<[Date, string]> = [
      [new Date(2024, 0, 17), '2024-W03'],
      [new Date(2021, 0, 3), '2020-W53'],
      [new Date(2021, 0, 4), '2021-W01'],
      [new Date(2024, 11, 30), '2025-W01'],
    ];

    it.each(cases)('should key %s as %s', (date, key) => {
      expect(isoWeekKey(date)).toBe(key);
    });
  });

  describe('isoWeekOf', () => {
    it('should use the week-numbering year', () => {
      expect(isoWeekOf(new Date(2021, 0, 1))).toEqual({ year: 2020, week: 53 });
    });
  });

  describe('previousWeekStart', () => {
    it('should return the Monday of the week before', () => {
      expect(previousWeekStart(new Date(2024, 0, 17, 15, 30))).toEqual(new Date(2024, 0, 8));
    });
  });

  describe('weekStartsBetween', () => {
    it('should include both end weeks when the range crosses a Monday', () => {
      // Sunday then the next Monday
      expect(weekStartsBetween(new Date(2024, 0, 7), new Date(2024, 0, 8))).toEqual([
        new Date(2024, 0, 1),
        new Date(2024, 0, 8),
      ]);
    });

    it('should return a single week for dates in the same week', () => {
      expect(weekStartsBetween(new Date(2024, 0, 9), new Date(2024, 0, 14))).toEqual([new Date(2024, 0, 8)]);
    });

    it('should be empty when the range is reversed', () => {
      expect(weekStartsBetween(new Date(2024, 0, 15), new Date(2024, 0, 1))).toEqual([]);
    });
  });

  describe('weekStartLabel', () => {
    it('should label a Sunday with the preceding Monday', () => {
      expect(weekStartLabel(new Date(2024, 0, 7))).toBe('2024-01-01');
    });
  });
});
