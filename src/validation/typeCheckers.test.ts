import { describe, expect, it } from 'vitest';

import { conformsToType, matchDateFormat } from './typeCheckers';

describe('typeCheckers', () => {
  describe('integer', () => {
    it.each(['0', '42', '-7', '+3', '007'])('should accept %s', value => {
      expect(conformsToType(value, 'integer')).toBe(true);
    });

    it.each(['3.5', '1e3', 'abc', '1 000', '--1', '+'])('should reject %s', value => {
      expect(conformsToType(value, 'integer')).toBe(false);
    });
  });

  describe('float', () => {
    it.each(['3.14', '-0.5', '.5', '5.', '42', '1e10', '1.5E-3', 'inf', '-Infinity', 'NaN'])(
      'should accept %s',
      value => {
        expect(conformsToType(value, 'float')).toBe(true);
      }
    );

    it.each(['abc', '1.2.3', 'e5', '1e', '.', '1,5'])('should reject %s', value => {
      expect(conformsToType(value, 'float')).toBe(false);
    });
  });

  describe('boolean', () => {
    it.each(['true', 'FALSE', 'Yes', 'no', '1', '0'])('should accept %s', value => {
      expect(conformsToType(value, 'boolean')).toBe(true);
    });

    it.each(['y', 'n', '2', 'truthy', 'on'])('should reject %s', value => {
      expect(conformsToType(value, 'boolean')).toBe(false);
    });
  });

  describe('string', () => {
    it('should accept any text', () => {
      expect(conformsToType('anything at all', 'string')).toBe(true);
    });
  });

  describe('matchDateFormat', () => {
    it('should match ISO dates with and without a time', () => {
      expect(matchDateFormat('2024-01-15')).toBe('YYYY-MM-DD');
      expect(matchDateFormat('2024-1-5')).toBe('YYYY-MM-DD');
      expect(matchDateFormat('2024-01-15 13:45:00')).toBe('YYYY-MM-DD HH:MM:SS');
      expect(matchDateFormat('2024-01-15 23:59:59')).toBe('YYYY-MM-DD HH:MM:SS');
    });

    it('should allow any run of whitespace between the date and the time', () => {
      expect(matchDateFormat('2024-01-01  12:00:00')).toBe('YYYY-MM-DD HH:MM:SS');
      expect(matchDateFormat('2024-01-01\t12:00:00')).toBe('YYYY-MM-DD HH:MM:SS');
    });

    it('should prefer month-first for ambiguous slash dates', () => {
      expect(matchDateFormat('01/02/2024')).toBe('MM/DD/YYYY');
    });

    it('should fall back to day-first when the month would be out of range', () => {
      expect(matchDateFormat('13/02/2024')).toBe('DD/MM/YYYY');
    });

    it('should honour leap years', () => {
      expect(matchDateFormat('2024-02-29')).toBe('YYYY-MM-DD');
      expect(matchDateFormat('2023-02-29')).toBeNull();
    });

    it.each([
      '2024-02-30',
      '2024-13-01',
      '13/13/2024',
      '2024-01-15T13:45:00',
      '2024-01-15 24:00:00',
      '2024-01-15 12:60:00',
      '2024-01-15 12:00:60',
      '2024-01-15 23:59:61',
      '15-01-2024',
      '24-01-15',
      '0000-01-01',
      'yesterday',
    ])('should reject %s', value => {
      expect(matchDateFormat(value)).toBeNull();
      expect(conformsToType(value, 'date')).toBe(false);
    });
  });
});
