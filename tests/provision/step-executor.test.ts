import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import { PermanentError, TransientError } from '../../scripts/provision/errors.js';
import { createMemoryLogger } from '../../scripts/provision/logger.js';
import { executeStep, matchToleratedSignal, resolveRetryPolicy } from '../../scripts/provision/step-executor.js';
import type { Step } from '../../scripts/provision/types.js';
import { FakeClock } from './helpers.js';

function failingStep(times: number, error: () => Error, extra: Partial<Step> = {}): Step & { readonly calls: number } {
  let calls = 0;
  return {
    id: 'flaky',
    ...extra,
    get calls() {
      return calls;
    },
    action: async () => {
      calls++;
      if (calls <= times) throw error();
    }
  };
}

describe('executeStep', () => {
  test('succeeds on the first attempt without waiting', async () => {
    const clock = new FakeClock();
    const logger = createMemoryLogger();
    const outcome = await executeStep(failingStep(0, () => new Error('x')), { phaseId: 'p', logger, clock });

    assert.deepEqual(outcome, { status: 'succeeded', attempts: 1 });
    assert.deepEqual(clock.sleeps, []);
    assert.deepEqual(
      logger.records.map((r) => [r.msg, r.outcome]),
      [['step.attempt', 'ok']]
    );
  });

  test('an always-transient failure is attempted exactly maxAttempts times with linear backoff', async () => {
    const clock = new FakeClock();
    const logger = createMemoryLogger();
    const step = failingStep(Infinity, () => new TransientError('mirror unreachable'), {
      retry: { maxAttempts: 4, baseDelayMs: 100 }
    });

    const outcome = await executeStep(step, { phaseId: 'p', logger, clock });

    assert.equal(step.calls, 4);
    assert.deepEqual(outcome, { status: 'failed', attempts: 4, error: 'mirror unreachable' });
    assert.deepEqual(clock.sleeps, [100, 200, 300]);
    assert.deepEqual(
      logger.records.map((r) => r.outcome),
      ['retry', 'retry', 'retry', 'failed']
    );
    assert.deepEqual(
      logger.records.map((r) => r.attempt),
      [1, 2, 3, 4]
    );
  });

  test('recovers when a later attempt succeeds', async () => {
    const clock = new FakeClock();
    const step = failingStep(2, () => new Error('busy'), { retry: { maxAttempts: 5, baseDelayMs: 10 } });

    const outcome = await executeStep(step, { phaseId: 'p', logger: createMemoryLogger(), clock });

    assert.deepEqual(outcome, { status: 'succeeded', attempts: 3 });
    assert.deepEqual(clock.sleeps, [10, 20]);
  });

  test('a permanent error stops retrying at once', async () => {
    const clock = new FakeClock();
    const step = failingStep(Infinity, () => new PermanentError('binary missing'), {
      retry: { maxAttempts: 5, baseDelayMs: 10 }
    });

    const outcome = await executeStep(step, { phaseId: 'p', logger: createMemoryLogger(), clock });

    assert.equal(step.calls, 1);
    assert.deepEqual(outcome, { status: 'failed', attempts: 1, error: 'binary missing' });
    assert.deepEqual(clock.sleeps, []);
  });

  test('a tolerated signal turns the failure into a success with a warning', async () => {
    const clock = new FakeClock();
    const logger = createMemoryLogger();
    const step = failingStep(Infinity, () => new TransientError('ORA-01920: user name conflicts'), {
      id: 'create-user',
      retry: { maxAttempts: 3, baseDelayMs: 10 },
      toleratedSignals: ['ora-01920']
    });

    const outcome = await executeStep(step, { phaseId: 'configure-database', logger, clock });

    assert.deepEqual(outcome, {
      status: 'succeeded',
      attempts: 1,
      warning: 'create-user: tolerated "ora-01920": ORA-01920: user name conflicts'
    });
    assert.equal(logger.records[0].outcome, 'tolerated');
    assert.equal(logger.records[0].phase, 'configure-database');
  });

  test('a harmless report does not hide another error from the same run', async () => {
    const clock = new FakeClock();
    const reports = ["ORA-01920: user name 'VECTOR' conflicts with another user or role name", 'ORA-01031: insufficient privileges'];
    const step = failingStep(Infinity, () => new TransientError(reports.join('; '), reports), {
      id: 'create-user',
      retry: { maxAttempts: 2, baseDelayMs: 10 },
      toleratedSignals: ['ORA-01920']
    });

    const outcome = await executeStep(step, { phaseId: 'configure-database', logger: createMemoryLogger(), clock });

    assert.deepEqual(outcome, { status: 'failed', attempts: 2, error: reports.join('; ') });
    assert.deepEqual(clock.sleeps, [10]);
  });

  test('defaults from the sequence fill what the step leaves out', async () => {
    const clock = new FakeClock();
    const step = failingStep(Infinity, () => new Error('down'), { retry: { maxAttempts: 2 } });

    await executeStep(step, { phaseId: 'p', logger: createMemoryLogger(), clock, retry: { maxAttempts: 5, baseDelayMs: 7 } });

    assert.equal(step.calls, 2);
    assert.deepEqual(clock.sleeps, [7]);
  });
});

describe('resolveRetryPolicy', () => {
  test('falls back to a single attempt', () => {
    assert.deepEqual(resolveRetryPolicy({ id: 's', action: async () => {} }), { maxAttempts: 1, baseDelayMs: 0 });
  });

  test('clamps nonsense values', () => {
    assert.deepEqual(resolveRetryPolicy({ id: 's', action: async () => {}, retry: { maxAttempts: 0, baseDelayMs: -5 } }), {
      maxAttempts: 1,
      baseDelayMs: 0
    });
  });
});

describe('matchToleratedSignal', () => {
  test('matches case-insensitively and returns the matching pattern', () => {
    assert.equal(matchToleratedSignal(['Database configuration failed'], ['ORA-01920', 'database configuration failed']), 'database configuration failed');
    assert.equal(matchToleratedSignal(['ORA-00942: table does not exist'], ['ORA-01920']), null);
  });

  test('every report has to match some signal', () => {
    const signals = ['ORA-01920', 'ORA-01543'];
    assert.equal(matchToleratedSignal(['ORA-01543: tablespace exists', 'ORA-01920: user exists'], signals), 'ORA-01543');
    assert.equal(matchToleratedSignal(['ORA-01920: user exists', 'ORA-01031: insufficient privileges'], signals), null);
    assert.equal(matchToleratedSignal([], signals), null);
  });
});
