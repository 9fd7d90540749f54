import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { createPinoSink } from '../../src/infrastructure/bridge/pino-sink.js';
import type { CallerFrame } from '../../src/infrastructure/bridge/caller.js';
import { memoryDestination } from '../helpers.js';

function sinkAt(level: string) {
  const destination = memoryDestination();
  const sink = createPinoSink(pino({ level, base: undefined, timestamp: false }, destination));
  return { sink, records: destination.records };
}

describe('createPinoSink', () => {
  it('writes the message at the matching pino level', () => {
    const { sink, records } = sinkAt('trace');

    sink.log(20, { toString: () => 'debugging' }, () => undefined);
    sink.log(50, { toString: () => 'failing' }, () => undefined);

    expect(records).toEqual([
      { level: 20, msg: 'debugging' },
      { level: 50, msg: 'failing' },
    ]);
  });

  it('falls back to info for severities pino does not know', () => {
    const { sink, records } = sinkAt('info');
    sink.log(35, { toString: () => 'odd' }, () => undefined);
    expect(records).toEqual([{ level: 30, msg: 'odd' }]);
  });

  it('attaches the caller frame when one is found', () => {
    const { sink, records } = sinkAt('info');
    const caller: CallerFrame = { file: '/srv/a.ts', line: 3, column: 1, functionName: 'main' };

    sink.log(30, { toString: () => 'started' }, () => caller);

    expect(records).toEqual([{ level: 30, caller, msg: 'started' }]);
  });

  it('skips stringification and caller lookup below the logger level', () => {
    const { sink, records } = sinkAt('warn');
    const toString = vi.fn(() => 'quiet');
    const findCaller = vi.fn(() => undefined);

    sink.log(30, { toString }, findCaller);

    expect(toString).not.toHaveBeenCalled();
    expect(findCaller).not.toHaveBeenCalled();
    expect(records).toHaveLength(0);
  });
});
