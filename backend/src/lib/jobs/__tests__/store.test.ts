import { beforeEach, describe, test } from 'node:test';
import assert from 'node:assert';
import { fixedClock } from '../../../__tests__/support.js';
import type { Db } from '../../db/client.js';
import { openDatabase } from '../../db/client.js';
import { ConflictError, InvalidTransitionError, NotFoundError } from '../../http/errors.js';
import { JOB_STATUSES } from '../model.js';
import { SqliteJobStore } from '../store.js';

let db: Db;
let clock: ReturnType<typeof fixedClock>;
let store: SqliteJobStore;

function newJob(jobId: string, created = '2026-01-01T00:00:00.000Z', processId = 'echo') {
  return { jobId, processId, inputs: { value: 1 }, created };
}

beforeEach(() => {
  db = openDatabase(':memory:');
  clock = fixedClock();
  store = new SqliteJobStore(db, { now: clock.now });
});

describe('create and get', () => {
  test('stores the job as accepted', async () => {
    const job = await store.create(newJob('job-1'));
    assert.strictEqual(job.status, 'accepted');
    assert.strictEqual(job.created, '2026-01-01T00:00:00.000Z');
    assert.strictEqual(job.result, null);
    assert.strictEqual(job.started, null);
    assert.deepStrictEqual(job.inputs, { value: 1 });

    const read = await store.get('job-1');
    assert.deepStrictEqual(read, job);
  });

  test('rejects a duplicate id', async () => {
    await store.create(newJob('job-1'));
    await assert.rejects(store.create(newJob('job-1')), ConflictError);
  });

  test('get of an unknown id is NotFound', async () => {
    await assert.rejects(store.get('missing'), NotFoundError);
  });
});

describe('transition', () => {
  test('walks accepted -> running -> successful', async () => {
    await store.create(newJob('job-1'));
    clock.advance(1000);
    const running = await store.transition('job-1', ['accepted'], 'running');
    assert.strictEqual(running.status, 'running');
    assert.strictEqual(running.started, '2026-01-01T00:00:01.000Z');
    assert.strictEqual(running.heartbeatAt, '2026-01-01T00:00:01.000Z');

    clock.advance(1000);
    const done = await store.transition('job-1', ['running'], 'successful', { result: { value: 42 } });
    assert.strictEqual(done.status, 'successful');
    assert.deepStrictEqual(done.result, { value: 42 });
    assert.strictEqual(done.progress, 100);
    assert.strictEqual(done.started, '2026-01-01T00:00:01.000Z');
    assert.strictEqual(done.finished, '2026-01-01T00:00:02.000Z');
    assert.strictEqual(done.heartbeatAt, null);
  });

  test('fails when the current status is not in the allowed set', async () => {
    await store.create(newJob('job-1'));
    await assert.rejects(
      store.transition('job-1', ['running'], 'successful', { result: {} }),
      (err: unknown) => err instanceof InvalidTransitionError && err.from === 'accepted'
    );
    assert.strictEqual((await store.get('job-1')).status, 'accepted');
  });

  test('terminal jobs reject every further transition', async () => {
    await store.create(newJob('job-1'));
    await store.transition('job-1', ['accepted'], 'running');
    await store.transition('job-1', ['running'], 'failed', { message: 'boom' });

    for (const to of JOB_STATUSES) {
      const patch = to === 'successful' ? { result: {} } : {};
      await assert.rejects(store.transition('job-1', JOB_STATUSES, to, patch), InvalidTransitionError);
    }
    const job = await store.get('job-1');
    assert.strictEqual(job.status, 'failed');
    assert.strictEqual(job.message, 'boom');
  });

  test('a target unreachable from every listed status is rejected before the write', async () => {
    await store.create(newJob('job-1'));
    await assert.rejects(
      store.transition('job-1', ['accepted'], 'successful', { result: {} }),
      (err: unknown) => err instanceof InvalidTransitionError && err.from === 'accepted'
    );
  });

  test('exactly one of two racing transitions wins', async () => {
    await store.create(newJob('job-1'));
    await store.transition('job-1', ['accepted'], 'running');

    const outcomes = await Promise.allSettled([
      store.transition('job-1', ['running'], 'successful', { result: { value: 1 } }),
      store.transition('job-1', ['accepted', 'running'], 'dismissed'),
    ]);
    const won = outcomes.filter(outcome => outcome.status === 'fulfilled');
    const lost = outcomes.filter(
      (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
    );
    assert.strictEqual(won.length, 1);
    assert.strictEqual(lost.length, 1);
    assert.ok(lost[0].reason instanceof InvalidTransitionError);
  });

  test('transition of a deleted job is NotFound', async () => {
    await store.create(newJob('job-1'));
    await store.delete('job-1');
    await assert.rejects(store.transition('job-1', ['accepted'], 'running'), NotFoundError);
  });

  test('a result is required for successful and refused otherwise', async () => {
    await store.create(newJob('job-1'));
    await store.transition('job-1', ['accepted'], 'running');
    await assert.rejects(store.transition('job-1', ['running'], 'successful'), /must attach a result/);
    await assert.rejects(
      store.transition('job-1', ['running'], 'failed', { result: { value: 1 } }),
      /cannot attach a result/
    );
    assert.strictEqual((await store.get('job-1')).status, 'running');
  });

  test('the schema refuses a successful row without results', async () => {
    await store.create(newJob('job-1'));
    assert.throws(() => db.prepare("UPDATE jobs SET status = 'successful' WHERE job_id = ?").run('job-1'));
  });
});

describe('delete', () => {
  test('removes a job whatever its status', async () => {
    await store.create(newJob('job-1'));
    await store.transition('job-1', ['accepted'], 'running');
    await store.transition('job-1', ['running'], 'successful', { result: {} });
    await store.delete('job-1');
    await assert.rejects(store.get('job-1'), NotFoundError);
  });

  test('is NotFound when the job is absent', async () => {
    await assert.rejects(store.delete('missing'), NotFoundError);
  });
});

describe('list', () => {
  test('orders by creation time, then id, and counts the whole match', async () => {
    await store.create(newJob('b', '2026-01-01T00:00:02.000Z'));
    await store.create(newJob('c', '2026-01-01T00:00:01.000Z'));
    await store.create(newJob('a', '2026-01-01T00:00:02.000Z'));
    await store.create(newJob('d', '2026-01-01T00:00:03.000Z'));

    const all = await store.list({}, { limit: 10, offset: 0 });
    assert.deepStrictEqual(all.jobs.map(job => job.jobId), ['c', 'a', 'b', 'd']);
    assert.strictEqual(all.total, 4);

    const page = await store.list({}, { limit: 2, offset: 1 });
    assert.deepStrictEqual(page.jobs.map(job => job.jobId), ['a', 'b']);
    assert.strictEqual(page.total, 4);
  });

  test('filters by process and status', async () => {
    await store.create(newJob('a', '2026-01-01T00:00:01.000Z', 'echo'));
    await store.create(newJob('b', '2026-01-01T00:00:02.000Z', 'sleep'));
    await store.create(newJob('c', '2026-01-01T00:00:03.000Z', 'echo'));
    await store.transition('c', ['accepted'], 'running');

    const echo = await store.list({ processId: 'echo' }, { limit: 10, offset: 0 });
    assert.deepStrictEqual(echo.jobs.map(job => job.jobId), ['a', 'c']);

    const running = await store.list({ processId: 'echo', status: ['running'] }, { limit: 10, offset: 0 });
    assert.deepStrictEqual(running.jobs.map(job => job.jobId), ['c']);
    assert.strictEqual(running.total, 1);
  });
});

describe('heartbeat and stalled jobs', () => {
  test('heartbeat only touches running jobs', async () => {
    await store.create(newJob('job-1'));
    assert.strictEqual(await store.heartbeat('job-1'), false);

    await store.transition('job-1', ['accepted'], 'running');
    clock.advance(5000);
    assert.strictEqual(await store.heartbeat('job-1', 42.4), true);
    const job = await store.get('job-1');
    assert.strictEqual(job.heartbeatAt, '2026-01-01T00:00:05.000Z');
    assert.strictEqual(job.progress, 42);
  });

  test('lists running jobs whose lease is older than the cutoff', async () => {
    await store.create(newJob('old'));
    await store.create(newJob('fresh'));
    await store.create(newJob('pending'));
    await store.transition('old', ['accepted'], 'running');
    clock.advance(60_000);
    await store.transition('fresh', ['accepted'], 'running');

    const stalled = await store.listStalled(new Date('2026-01-01T00:00:30.000Z'));
    assert.deepStrictEqual(stalled.map(job => job.jobId), ['old']);
  });
});
