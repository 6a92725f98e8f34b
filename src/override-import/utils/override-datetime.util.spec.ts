import { formatOverrideDateTime, isValidTimeZone, parseOverrideDateTime } from './override-datetime.util';

describe('override date-time format', () => {
  describe('parseOverrideDateTime', () => {
    it('parses a well-formed value with a positive offset', () => {
      const parsed = parseOverrideDateTime('2024-01-01 08:00 +10:00');
      expect(parsed?.toISOString()).toBe('2023-12-31T22:00:00.000Z');
    });

    it('parses negative and zero offsets', () => {
      expect(parseOverrideDateTime('2024-03-15 17:45 -05:30')?.toISOString()).toBe('2024-03-15T23:15:00.000Z');
      expect(parseOverrideDateTime('2024-03-15 17:45 +00:00')?.toISOString()).toBe('2024-03-15T17:45:00.000Z');
    });

    it.each([
      ['free text', 'invalid date'],
      ['missing offset', '2024-01-01 08:00'],
      ['12-hour clock with zone name', '2024-01-01 08:00 AM GMT'],
      ['unpadded month', '2024-1-01 08:00 +10:00'],
      ['impossible day', '2024-02-30 08:00 +10:00'],
      ['hour out of range', '2024-01-01 24:00 +10:00'],
      ['compact offset', '2024-01-01 08:00 +1000'],
      ['leading text', 'x2024-01-01 08:00 +10:00'],
      ['trailing space', '2024-01-01 08:00 +10:00 '],
    ])('rejects %s', (_label, text) => {
      expect(parseOverrideDateTime(text)).toBeNull();
    });
  });

  describe('formatOverrideDateTime', () => {
    it('renders in the requested zone', () => {
      const value = new Date('2023-12-31T22:00:00.000Z');
      expect(formatOverrideDateTime(value, 'UTC')).toBe('2023-12-31 22:00 +00:00');
      expect(formatOverrideDateTime(value, 'UTC+10')).toBe('2024-01-01 08:00 +10:00');
    });

    it('produces text that parses back to the same instant', () => {
      const value = new Date('2024-06-30T23:59:00.000Z');
      const text = formatOverrideDateTime(value, 'UTC');
      expect(parseOverrideDateTime(text)?.getTime()).toBe(value.getTime());
    });
  });

  it('recognises time zones', () => {
    expect(isValidTimeZone('UTC')).toBe(true);
    expect(isValidTimeZone('Not/AZone')).toBe(false);
  });
});
