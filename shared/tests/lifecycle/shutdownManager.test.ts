/**
 * Tests for ShutdownManager
 *
 * Covers:
 * - Priority ordering
 * - Per-handler deadlines and the signal handed to handlers
 * - Failures, the total budget and repeated calls
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import { ShutdownManager, ShutdownPriority, createShutdownHandler } from '../../src/lifecycle/index.js';
import { AlreadyShutdownError } from '../../src/utils/errorTypes.js';
import { RecordingLogger } from '../helpers/recordingLogger.js';

describe('ShutdownManager', () => {
  let log: RecordingLogger;
  let manager: ShutdownManager;

  beforeEach(() => {
    log = new RecordingLogger();
    manager = new ShutdownManager(log);
  });

  it('should run handlers lowest priority first, then in registration order', async () => {
    const order: string[] = [];
    manager.register(createShutdownHandler('metrics', () => void order.push('metrics'), ShutdownPriority.FLUSH_TELEMETRY));
    manager.register(createShutdownHandler('cache', () => void order.push('cache')));
    manager.register(createShutdownHandler('intake', () => void order.push('intake'), ShutdownPriority.STOP_ACCEPTING));
    manager.register(createShutdownHandler('files', () => void order.push('files'), ShutdownPriority.CLEANUP));

    const report = await manager.shutdown('SIGTERM');

    assert.deepStrictEqual(order, ['intake', 'cache', 'files', 'metrics']);
    assert.strictEqual(report.success, true);
    assert.deepStrictEqual(
      report.outcomes.map((outcome) => [outcome.name, outcome.priority]),
      [
        ['intake', 100],
        ['cache', 600],
        ['files', 600],
        ['metrics', 800],
      ]
    );
    assert.deepStrictEqual(report.skipped, []);
  });

  it('should hand each handler a signal that is live while it runs', async () => {
    const states: boolean[] = [];
    manager.register(createShutdownHandler('pipeline', (signal) => void states.push(signal?.aborted ?? true)));

    await manager.shutdown('SIGTERM');

    assert.deepStrictEqual(states, [false]);
  });

  it('should abort the signal and move on when a handler times out', async () => {
    const signals: AbortSignal[] = [];
    const order: string[] = [];
    manager.register({
      name: 'stuck',
      priority: ShutdownPriority.STOP_BACKGROUND,
      shutdown: (context) => {
        if (context?.signal) {
          signals.push(context.signal);
        }
        return new Promise<void>(() => {});
      },
    });
    manager.register(createShutdownHandler('metrics', () => void order.push('metrics'), ShutdownPriority.FLUSH_TELEMETRY));

    const report = await manager.shutdown('SIGTERM', { handlerTimeoutMs: 30 });

    assert.strictEqual(signals.length, 1);
    assert.strictEqual(signals[0].aborted, true);
    assert.deepStrictEqual(order, ['metrics']);
    assert.strictEqual(report.success, false);
    assert.strictEqual(report.outcomes[0].timedOut, true);
    assert.strictEqual(report.outcomes[0].error, 'Deadline exceeded during shutdown of stuck');
    assert.deepStrictEqual(log.messages('error'), ['Shutdown handler timed out']);
  });

  it('should report a failing handler and still run the rest', async () => {
    const order: string[] = [];
    manager.register(
      createShutdownHandler(
        'intake',
        () => {
          throw new Error('listener already closed');
        },
        ShutdownPriority.STOP_ACCEPTING
      )
    );
    manager.register(createShutdownHandler('metrics', () => void order.push('metrics'), ShutdownPriority.FLUSH_TELEMETRY));

    const report = await manager.shutdown('SIGTERM');

    assert.deepStrictEqual(order, ['metrics']);
    assert.strictEqual(report.success, false);
    assert.deepStrictEqual(report.outcomes[0], {
      name: 'intake',
      priority: ShutdownPriority.STOP_ACCEPTING,
      durationMs: report.outcomes[0].durationMs,
      error: 'listener already closed',
      timedOut: false,
    });
    assert.strictEqual(report.outcomes[1].error, undefined);
    assert.deepStrictEqual(log.messages('error'), ['Shutdown handler failed']);
  });

  it('should skip handlers once the total budget is spent', async () => {
    manager.register(
      createShutdownHandler(
        'slow',
        () => {
          const until = Date.now() + 80;
          while (Date.now() < until) {
            // hold the event loop so the deadline timer cannot fire
          }
        },
        ShutdownPriority.STOP_ACCEPTING
      )
    );
    manager.register(createShutdownHandler('metrics', () => {}, ShutdownPriority.FLUSH_TELEMETRY));

    const report = await manager.shutdown('SIGTERM', { totalTimeoutMs: 50, handlerTimeoutMs: 1000 });

    assert.strictEqual(report.success, false);
    assert.deepStrictEqual(
      report.outcomes.map((outcome) => outcome.name),
      ['slow']
    );
    assert.deepStrictEqual(report.skipped, ['metrics']);
    assert.deepStrictEqual(log.messages('warn'), ['Shutdown budget spent before every handler ran']);
  });

  it('should run handlers once and give every caller the same report', async () => {
    let calls = 0;
    manager.register(createShutdownHandler('metrics', () => void calls++));

    const first = manager.shutdown('SIGTERM');
    const second = manager.shutdown('SIGINT');

    assert.strictEqual(first, second);
    assert.strictEqual(await first, await manager.shutdown('SIGTERM'));
    assert.strictEqual(calls, 1);
  });

  it('should refuse registrations once shutdown has started', async () => {
    assert.strictEqual(manager.isShuttingDown(), false);

    const running = manager.shutdown('SIGTERM');

    assert.strictEqual(manager.isShuttingDown(), true);
    assert.throws(() => manager.register(createShutdownHandler('late', () => {})), AlreadyShutdownError);
    await running;
  });
});

describe('createShutdownHandler', () => {
  it('should default to the cleanup priority', () => {
    const handler = createShutdownHandler('cache', () => {});

    assert.strictEqual(handler.name, 'cache');
    assert.strictEqual(handler.priority, ShutdownPriority.CLEANUP);
  });

  it('should pass the context signal to the cleanup function', async () => {
    const received: Array<AbortSignal | undefined> = [];
    const handler = createShutdownHandler('poller', (signal) => void received.push(signal));
    const controller = new AbortController();

    await handler.shutdown({ signal: controller.signal });

    assert.deepStrictEqual(received, [controller.signal]);
  });
});
