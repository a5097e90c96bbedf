import { describe, it, expect } from 'vitest';
import { parseCalendarDate, currencySymbol, mean, daysInMonth, DEFAULT_DATE_FORMATS } from '../services/helpers.ts';

describe('parseCalendarDate', () => {
  it('pads single-digit parts', () => {
    expect(parseCalendarDate('2024-3-5', ['YYYY-MM-DD'])).toBe('2024-03-05');
    expect(parseCalendarDate('5/3/2024', ['DD/MM/YYYY'])).toBe('2024-03-05');
    expect(parseCalendarDate('2024/03/05', ['YYYY/MM/DD'])).toBe('2024-03-05');
  });

  it('tries formats in order', () => {
    expect(parseCalendarDate('04/03/2024', ['MM/DD/YYYY', 'DD/MM/YYYY'])).toBe('2024-04-03');
    expect(parseCalendarDate('04/03/2024', ['DD/MM/YYYY', 'MM/DD/YYYY'])).toBe('2024-03-04');
    expect(parseCalendarDate('13/03/2024', ['MM/DD/YYYY', 'DD/MM/YYYY'])).toBe('2024-03-13');
  });

  it('returns null for text that matches nothing', () => {
    expect(parseCalendarDate('March 5th', DEFAULT_DATE_FORMATS)).toBeNull();
    expect(parseCalendarDate('2024-13-01', DEFAULT_DATE_FORMATS)).toBeNull();
    expect(parseCalendarDate('2024-04-31', DEFAULT_DATE_FORMATS)).toBeNull();
  });

  it('accepts only real clock times in timestamps', () => {
    expect(parseCalendarDate('2024-01-01 23:59:59', ['YYYY-MM-DD HH:mm:ss'])).toBe('2024-01-01');
    expect(parseCalendarDate('2024-01-01T00:00:00', ['YYYY-MM-DD HH:mm:ss'])).toBe('2024-01-01');
    expect(parseCalendarDate('2024-01-01 99:99:99', ['YYYY-MM-DD HH:mm:ss'])).toBeNull();
    expect(parseCalendarDate('2024-01-01 24:00:00', ['YYYY-MM-DD HH:mm:ss'])).toBeNull();
    expect(parseCalendarDate('2024-01-01 12:60:00', ['YYYY-MM-DD HH:mm:ss'])).toBeNull();
  });

  it('knows century leap years', () => {
    expect(daysInMonth(2000, 2)).toBe(29);
    expect(daysInMonth(1900, 2)).toBe(28);
  });
});

describe('currencySymbol', () => {
  it('maps country suffixes', () => {
    expect(currencySymbol('PKN.PL')).toBe('PLN');
    expect(currencySymbol('SAP.EU')).toBe('€');
    expect(currencySymbol('KO.US')).toBe('$');
    expect(currencySymbol('KO')).toBe('$');
    expect(currencySymbol('BHP.AX')).toBe('$');
  });
});

describe('mean', () => {
  it('is null for no values', () => {
    expect(mean([])).toBeNull();
    expect(mean([1, 2, 3])).toBe(2);
  });
});
