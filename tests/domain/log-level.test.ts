import { describe, it, expect } from 'vitest';
import { LogLevel, InvalidLogLevelError } from '../../src/domain/log-level.js';

describe('LogLevel', () => {
  it('orders levels debug < info < warn < error < critical', () => {
    expect(LogLevel.all.map((l) => l.name)).toEqual(['debug', 'info', 'warn', 'error', 'critical']);
    expect(LogLevel.debug.isBelow(LogLevel.info)).toBe(true);
    expect(LogLevel.warn.isBelow(LogLevel.error)).toBe(true);
    expect(LogLevel.error.isBelow(LogLevel.critical)).toBe(true);
  });

  it('isBelow is strict', () => {
    expect(LogLevel.warn.isBelow(LogLevel.warn)).toBe(false);
    expect(LogLevel.critical.isBelow(LogLevel.debug)).toBe(false);
  });

  it('isLevel accepts only the level constants', () => {
    expect(LogLevel.isLevel(LogLevel.info)).toBe(true);
    expect(LogLevel.isLevel('info')).toBe(false);
    expect(LogLevel.isLevel({ name: 'info', rank: 1 })).toBe(false);
    expect(LogLevel.isLevel(null)).toBe(false);
    expect(LogLevel.isLevel(undefined)).toBe(false);
  });

  it('levelWithName returns the constant for a known name', () => {
    expect(LogLevel.levelWithName('warn')).toBe(LogLevel.warn);
  });

  it('levelWithName rejects unknown names', () => {
    expect(() => LogLevel.levelWithName('verbose')).toThrow(InvalidLogLevelError);
    expect(() => LogLevel.levelWithName('verbose')).toThrow('Invalid log level: "verbose"');
  });

  it('serialises to its name', () => {
    expect(JSON.stringify({ level: LogLevel.error })).toBe('{"level":"error"}');
    expect(String(LogLevel.debug)).toBe('LogLevel.debug');
  });
});
