import { describe, it, expect } from 'vitest';
import { parseDuration, formatDuration } from '../src/lib/duration.js';
import { ConfigError } from '../src/lib/errors.js';

describe('parseDuration', () => {
  it('parses single units', () => {
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('2m')).toBe(120_000);
    expect(parseDuration('1h')).toBe(3_600_000);
  });

  it('parses compound and fractional values', () => {
    expect(parseDuration('1m30s')).toBe(90_000);
    expect(parseDuration('1.5h')).toBe(5_400_000);
    expect(parseDuration('1h2m3s')).toBe(3_723_000);
  });

  it('accepts a bare zero and a sign', () => {
    expect(parseDuration('0')).toBe(0);
    expect(parseDuration('-5s')).toBe(-5000);
    expect(parseDuration('+5s')).toBe(5000);
  });

  it('rejects numbers without units and garbage', () => {
    expect(() => parseDuration('30')).toThrow(ConfigError);
    expect(() => parseDuration('abc')).toThrow(ConfigError);
    expect(() => parseDuration('')).toThrow(ConfigError);
    expect(() => parseDuration('5 s')).toThrow(ConfigError);
    expect(() => parseDuration('10d')).toThrow(ConfigError);
  });
});

describe('formatDuration', () => {
  it('formats like the input grammar', () => {
    expect(formatDuration(30_000)).toBe('30s');
    expect(formatDuration(90_000)).toBe('1m30s');
    expect(formatDuration(3_600_000)).toBe('1h0m0s');
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(0)).toBe('0s');
  });
});
