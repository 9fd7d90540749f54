import { describe, it, expect } from 'vitest';
import { createLogPipeline } from '../src/pipeline.js';
import type { CallerFrame, ExternalSink } from '../src/infrastructure/bridge/index.js';
import { ROOT_NAMESPACE } from '../src/application/index.js';
import { LogLevel } from '../src/domain/index.js';
import { constantPredicate, fakeLogger } from './helpers.js';

function recordingSink() {
  const entries: { severity: number; text: string; caller: CallerFrame | undefined }[] = [];
  const sink: ExternalSink = {
    log(severity, message, findCaller) {
      entries.push({ severity, text: message.toString(), caller: findCaller() });
    },
  };
  return { sink, entries };
}

describe('createLogPipeline', () => {
  it('filters by namespace threshold and bridges what passes', () => {
    const { sink, entries } = recordingSink();
    const pipeline = createLogPipeline({
      configPath: '/nonexistent/log-filter.json',
      env: { LOG_FILTER_LEVELS: '*=warn,app.db=debug' },
      bridge: { sink },
      log: fakeLogger(),
    });

    pipeline.logger('app.http').info('request {path}', { path: '/health' });
    pipeline.logger('app.http').error('request {path} failed', { path: '/orders' });
    pipeline.logger('app.db.pool').debug('acquired connection');

    expect(entries.map((e) => [e.severity, e.text])).toEqual([
      [50, 'request /orders failed'],
      [20, 'acquired connection'],
    ]);
  });

  it('exposes the filter for later reconfiguration', () => {
    const { sink, entries } = recordingSink();
    const pipeline = createLogPipeline({
      configPath: '/nonexistent/log-filter.json',
      env: {},
      bridge: { sink },
      log: fakeLogger(),
    });

    pipeline.logger('jobs').debug('tick');
    pipeline.filter.setThreshold(ROOT_NAMESPACE, LogLevel.debug);
    pipeline.logger('jobs').debug('tock');

    expect(entries.map((e) => e.text)).toEqual(['tock']);
  });

  it('runs extra predicates after the namespace filter', () => {
    const { sink, entries } = recordingSink();
    const pipeline = createLogPipeline({
      configPath: '/nonexistent/log-filter.json',
      env: {},
      predicates: [constantPredicate('no')],
      bridge: { sink },
      log: fakeLogger(),
    });

    pipeline.logger('jobs').critical('dropped anyway');

    expect(entries).toHaveLength(0);
  });

  it('attributes records to the code that called the logger', () => {
    const { sink, entries } = recordingSink();
    const pipeline = createLogPipeline({
      configPath: '/nonexistent/log-filter.json',
      env: {},
      bridge: { sink },
      log: fakeLogger(),
    });
    const log = pipeline.logger('billing');

    function chargeCard(): void {
      log.info('charged');
    }
    chargeCard();

    expect(pipeline.bridge.stackDepth).toBe(5);
    expect(entries[0]?.caller?.functionName).toBe('chargeCard');
  });

  it('keeps the computed stack depth when the bridge options leave it undefined', () => {
    const { sink, entries } = recordingSink();
    const pipeline = createLogPipeline({
      configPath: '/nonexistent/log-filter.json',
      env: {},
      bridge: { sink, stackDepth: undefined },
      log: fakeLogger(),
    });
    const log = pipeline.logger('billing');

    function refundOrder(): void {
      log.warn('refunded');
    }
    refundOrder();

    expect(pipeline.bridge.stackDepth).toBe(5);
    expect(entries[0]?.caller?.functionName).toBe('refundOrder');
  });
});
