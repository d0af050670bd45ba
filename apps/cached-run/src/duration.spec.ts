import { toSeconds } from './duration';
import { ConfigurationException } from './exceptions/configuration.exception';
import { InvalidDurationException } from './exceptions/invalid-duration.exception';

describe('toSeconds', () => {
  it('should convert single units', () => {
    expect(toSeconds('10s')).toBe(10);
    expect(toSeconds('5m')).toBe(300);
    expect(toSeconds('2h')).toBe(7200);
    expect(toSeconds('1d')).toBe(86400);
  });

  it('should sum combined units', () => {
    expect(toSeconds('1h30m')).toBe(5400);
    expect(toSeconds('7m30s')).toBe(450);
    expect(toSeconds('1d 2h 3m 4s')).toBe(93784);
  });

  it('should accept surrounding whitespace', () => {
    expect(toSeconds('  45s ')).toBe(45);
  });

  it('should accept units in any order', () => {
    expect(toSeconds('30s1m')).toBe(90);
  });

  describe('invalid input', () => {
    it.each([
      [''],
      ['   '],
      ['10'],
      ['s'],
      ['10x'],
      ['10ss'],
      ['10sec'],
      ['1h30'],
      ['-5s'],
      ['1.5h'],
    ])('should reject %p', (input) => {
      expect(() => toSeconds(input)).toThrow(InvalidDurationException);
    });

    it('should report the offending token', () => {
      expect(() => toSeconds('1h 10sec')).toThrow("Invalid duration: '1h 10sec' (token: ec)");
    });

    it('should be a configuration error', () => {
      expect(() => toSeconds('soon')).toThrow(ConfigurationException);
    });
  });
});
