import { InvalidArgumentError } from 'commander';
import { parseTimeoutOption } from '../src/utils/cli-options';

describe('parseTimeoutOption', () => {
  test('accepts milliseconds and zero', () => {
    expect(parseTimeoutOption('250')).toBe(250);
    expect(parseTimeoutOption('0')).toBe(0);
  });

  test('rejects non-numeric and negative values', () => {
    expect(() => parseTimeoutOption('soon')).toThrow(InvalidArgumentError);
    expect(() => parseTimeoutOption('')).toThrow(InvalidArgumentError);
    expect(() => parseTimeoutOption('-5')).toThrow(/non-negative/);
  });
});
