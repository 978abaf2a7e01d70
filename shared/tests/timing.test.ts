/**
 * Tests for sleep and deadline helpers.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { createDeadline, sleep } from '../src/utils/timing.js';
import { ConfigurationError, DeadlineExceededError } from '../src/utils/errorTypes.js';

describe('sleep', () => {
  it('should wait at least the given time', async () => {
    const start = Date.now();
    await sleep(30);
    assert.ok(Date.now() - start >= 25);
  });
});

describe('createDeadline', () => {
  it('should never expire without signal or timeout', async () => {
    const deadline = createDeadline();

    const value = await deadline.race(sleep(10).then(() => 'done'), 'noop');

    assert.strictEqual(value, 'done');
    assert.strictEqual(deadline.expired(), false);
    deadline.dispose();
  });

  it('should pass through the work rejection', async () => {
    const deadline = createDeadline({ timeoutMs: 1000 });

    await assert.rejects(deadline.race(Promise.reject(new Error('refused')), 'export'), {
      message: 'refused',
    });
    deadline.dispose();
  });

  it('should reject with DeadlineExceededError when the timeout fires first', async () => {
    const deadline = createDeadline({ timeoutMs: 20 });

    await assert.rejects(deadline.race(sleep(500), 'metrics flush'), (error: unknown) => {
      assert.ok(error instanceof DeadlineExceededError);
      assert.strictEqual(error.message, 'Deadline exceeded during metrics flush');
      assert.ok(error.cause instanceof Error);
      assert.strictEqual(error.cause.message, 'Timed out after 20ms');
      return true;
    });
    assert.strictEqual(deadline.expired(), true);
    deadline.dispose();
  });

  it('should be expired immediately for a non-positive timeout', async () => {
    const deadline = createDeadline({ timeoutMs: 0 });

    assert.strictEqual(deadline.expired(), true);
    await assert.rejects(deadline.race(Promise.resolve(1), 'export'), DeadlineExceededError);
    deadline.dispose();
  });

  it('should reject a timeout that is not a finite number', () => {
    for (const timeoutMs of [Number.NaN, Number.POSITIVE_INFINITY]) {
      assert.throws(
        () => createDeadline({ timeoutMs }),
        (error: unknown) => {
          assert.ok(error instanceof ConfigurationError);
          assert.strictEqual(error.field, 'timeoutMs');
          assert.strictEqual(error.message, 'Invalid timeoutMs: must be a finite number of milliseconds');
          return true;
        }
      );
    }
  });

  it('should follow an already-aborted caller signal', async () => {
    const deadline = createDeadline({ signal: AbortSignal.abort(new Error('cancelled')) });

    assert.strictEqual(deadline.expired(), true);
    assert.strictEqual(deadline.signal.reason instanceof Error && deadline.signal.reason.message, 'cancelled');
    await assert.rejects(deadline.race(sleep(10), 'export'), DeadlineExceededError);
    deadline.dispose();
  });

  it('should follow a caller signal aborted later', async () => {
    const controller = new AbortController();
    const deadline = createDeadline({ signal: controller.signal, timeoutMs: 1000 });

    setTimeout(() => controller.abort(), 10);

    await assert.rejects(deadline.race(sleep(500), 'export'), DeadlineExceededError);
    deadline.dispose();
  });

  it('should observe a work rejection that arrives after the deadline', async () => {
    const deadline = createDeadline({ timeoutMs: 0 });
    const late = sleep(10).then(() => {
      throw new Error('late failure');
    });

    await assert.rejects(deadline.race(late, 'export'), DeadlineExceededError);
    // Give the late rejection time to settle; an unobserved one would fail the run
    await sleep(20);
    deadline.dispose();
  });
});
