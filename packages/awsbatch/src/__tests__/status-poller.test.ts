import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mock the logger — must come before imports of the module under test
// ---------------------------------------------------------------------------

vi.mock('@batchrun/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@batchrun/shared')>();
  return {
    ...actual,
    logger: { child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }) },
  };
});

import { DescribeJobsCommand, type BatchClient, type JobDetail, type JobStatus } from '@aws-sdk/client-batch';
import { DeleteObjectCommand } from '@aws-sdk/client-s3';
import { GetLogEventsCommand } from '@aws-sdk/client-cloudwatch-logs';
import {
  ConsistencyError,
  InvalidArgumentError,
  InvariantViolationError,
  type BatchTask,
  type RemoteJobRecord,
  type TaskOutcome,
} from '@batchrun/shared';
import { extractOutcome, filterCompleted, remoteStatuses, EXIT_NO_ATTEMPT, EXIT_UNKNOWN } from '../status-poller.js';
import { describeJobs } from '../describe-jobs.js';
import { OK, fakeClient, makeContext, makeTask, makeWorkDir, sentCommands } from './helpers.js';

function job(jobId: string, status: JobStatus, extra: Partial<JobDetail> = {}): JobDetail {
  return {
    jobId,
    jobName: `name-${jobId}`,
    jobQueue: 'default-queue',
    jobDefinition: 'arn:jd:1',
    status,
    startedAt: 1000,
    ...extra,
  };
}

function describeHandler(jobs: JobDetail[]) {
  return (command: object) => {
    if (!(command instanceof DescribeJobsCommand)) throw new Error('unexpected command');
    const wanted = new Set(command.input.jobs);
    return { ...OK, jobs: jobs.filter((j) => j.jobId !== undefined && wanted.has(j.jobId)) };
  };
}

function record(overrides: Partial<RemoteJobRecord>): RemoteJobRecord {
  return {
    jobId: 'job-1',
    status: 'succeeded',
    rawStatus: 'SUCCEEDED',
    attempts: [{ statusReason: 'Essential container in task exited', exitCode: 0 }],
    startedAt: 1000,
    stoppedAt: 13400,
    ...overrides,
  };
}

async function collect(gen: AsyncGenerator<[BatchTask, TaskOutcome]>): Promise<Array<[BatchTask, TaskOutcome]>> {
  const out: Array<[BatchTask, TaskOutcome]> = [];
  for await (const item of gen) out.push(item);
  return out;
}

// ---------------------------------------------------------------------------
// extractOutcome
// ---------------------------------------------------------------------------

describe('extractOutcome', () => {
  it('reports exit status, reason and rounded wall time', () => {
    expect(extractOutcome(record({}))).toEqual({
      status: 'succeeded',
      exitStatus: 0,
      wallTime: 12,
      statusReason: 'Essential container in task exited',
    });
  });

  it('appends the container reason', () => {
    const outcome = extractOutcome(
      record({
        status: 'failed',
        rawStatus: 'FAILED',
        attempts: [
          { statusReason: 'first try', exitCode: 1 },
          { statusReason: 'Essential container in task exited', exitCode: 137, containerReason: 'OutOfMemoryError' },
        ],
      }),
    );
    expect(outcome.exitStatus).toBe(137);
    expect(outcome.statusReason).toBe('Essential container in task exited -- container_reason: OutOfMemoryError');
  });

  it('uses a sentinel when the service sent no attempts', () => {
    const outcome = extractOutcome(record({ status: 'failed', rawStatus: 'FAILED', attempts: undefined }));
    expect(outcome.exitStatus).toBe(EXIT_NO_ATTEMPT);
    expect(outcome.statusReason).toBe('no_attempt');
  });

  it('uses a sentinel when the attempt has no exit code', () => {
    const outcome = extractOutcome(
      record({ status: 'failed', rawStatus: 'FAILED', attempts: [{ statusReason: 'Host EC2 terminated' }] }),
    );
    expect(outcome.exitStatus).toBe(EXIT_UNKNOWN);
    expect(outcome.statusReason).toBe('Host EC2 terminated');
  });

  it('refuses a failed job with exit status 0', () => {
    expect(() => extractOutcome(record({ status: 'failed', rawStatus: 'FAILED' }))).toThrow(
      'job job-1 failed, but has an exit status of 0',
    );
  });

  it('refuses an empty attempt list', () => {
    expect(() => extractOutcome(record({ attempts: [] }))).toThrow(InvariantViolationError);
  });

  it('refuses a job that has not finished', () => {
    expect(() => extractOutcome(record({ status: 'running', rawStatus: 'RUNNING' }))).toThrow(
      'job job-1 is RUNNING, not terminal',
    );
  });

  it('reports wall time 0 without timing info', () => {
    expect(extractOutcome(record({ stoppedAt: undefined })).wallTime).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// describeJobs
// ---------------------------------------------------------------------------

describe('describeJobs', () => {
  it('requests ids in chunks and keeps input order', async () => {
    const jobs = ['a', 'b', 'c', 'd', 'e'].map((id) => job(id, 'RUNNING'));
    const { client, send } = fakeClient<BatchClient>(describeHandler([...jobs].reverse()));

    const records = await describeJobs(client, ['a', 'b', 'c', 'd', 'e'], { batchSize: 2 });

    expect(sentCommands(send, DescribeJobsCommand).map((c) => c.input.jobs)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    expect(records.map((r) => r.jobId)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('rejects duplicate ids', async () => {
    const { client } = fakeClient<BatchClient>(describeHandler([]));
    await expect(describeJobs(client, ['a', 'a'])).rejects.toThrow(InvalidArgumentError);
  });

  it('fails when the service leaves a job out', async () => {
    const { client } = fakeClient<BatchClient>(describeHandler([job('a', 'RUNNING'), job('b', 'RUNNING')]));

    await expect(describeJobs(client, ['a', 'b', 'c'])).rejects.toThrow(
      'describe-jobs returned a different job set than requested (missing: c; unexpected: none)',
    );
  });

  it('fails when the service returns a job nobody asked for', async () => {
    const { client } = fakeClient<BatchClient>(() => ({ ...OK, jobs: [job('a', 'RUNNING'), job('z', 'RUNNING')] }));

    await expect(describeJobs(client, ['a'])).rejects.toThrow(ConsistencyError);
  });

  it('tolerates absent jobs with missingOk', async () => {
    const { client } = fakeClient<BatchClient>(describeHandler([job('a', 'RUNNING')]));
    const records = await describeJobs(client, ['a', 'b'], { missingOk: true });
    expect(records.map((r) => r.jobId)).toEqual(['a']);
  });
});

// ---------------------------------------------------------------------------
// filterCompleted
// ---------------------------------------------------------------------------

describe('filterCompleted', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeWorkDir();
  });

  function submittedTask(uid: string, jobId: string): BatchTask {
    return makeTask(dir, {
      uid,
      jobId,
      status: 'submitted',
      scriptUri: `s3://test-bucket/scripts/${uid}.script`,
      stdoutPath: join(dir, `${uid}.out`),
      stderrPath: join(dir, `${uid}.err`),
    });
  }

  const logsHandler = (command: object) => {
    if (!(command instanceof GetLogEventsCommand)) throw new Error('unexpected command');
    if (command.input.nextToken === undefined) {
      return { ...OK, events: [{ message: `log of ${command.input.logStreamName}` }], nextForwardToken: 'f/1' };
    }
    return { ...OK, events: [], nextForwardToken: 'f/1' };
  };

  it('yields only finished tasks after cleaning them up', async () => {
    const { ctx, s3Send } = makeContext({
      batch: describeHandler([
        job('job-1', 'SUCCEEDED', {
          stoppedAt: 4000,
          container: { logStreamName: 'stream-1' },
          attempts: [{ statusReason: 'Essential container in task exited', container: { exitCode: 0 } }],
        }),
        job('job-2', 'RUNNING'),
        job('job-3', 'FAILED', {
          stoppedAt: 2000,
          container: { logStreamName: 'stream-3' },
          attempts: [{ statusReason: 'Essential container in task exited', container: { exitCode: 3 } }],
        }),
      ]),
      s3: () => ({ $metadata: { httpStatusCode: 204 } }),
      logs: logsHandler,
    });
    const tasks = [submittedTask('t1', 'job-1'), submittedTask('t2', 'job-2'), submittedTask('t3', 'job-3')];

    const completed = await collect(filterCompleted(ctx, tasks));

    expect(completed.map(([task, outcome]) => [task.uid, outcome.status, outcome.exitStatus, outcome.wallTime])).toEqual([
      ['t1', 'succeeded', 0, 3],
      ['t3', 'failed', 3, 1],
    ]);
    expect(tasks.map((t) => t.status)).toEqual(['succeeded', 'submitted', 'failed']);

    expect(await readFile(tasks[0].stdoutPath, 'utf-8')).toBe(
      'log of stream-1\nWARNING: this might be truncated.  check log stream on the aws console for job: job-1',
    );
    expect(sentCommands(s3Send, DeleteObjectCommand).map((c) => c.input.Key)).toEqual([
      'scripts/t1.script',
      'scripts/t3.script',
    ]);
  });

  it('leaves a task submitted when its cleanup fails', async () => {
    const { ctx } = makeContext({
      batch: describeHandler([
        job('job-1', 'SUCCEEDED', {
          stoppedAt: 4000,
          container: { logStreamName: 'stream-1' },
          attempts: [{ statusReason: 'Essential container in task exited', container: { exitCode: 0 } }],
        }),
      ]),
      s3: () => {
        throw Object.assign(new Error('Access Denied'), { name: 'AccessDenied' });
      },
      logs: logsHandler,
    });
    const task = submittedTask('t1', 'job-1');
    const yielded: string[] = [];

    await expect(
      (async () => {
        for await (const [done] of filterCompleted(ctx, [task])) yielded.push(done.uid);
      })(),
    ).rejects.toThrow('Access Denied');

    expect(yielded).toEqual([]);
    expect(task.status).toBe('submitted');
  });

  it('yields nothing while every job is still running', async () => {
    const { ctx } = makeContext({ batch: describeHandler([job('job-1', 'RUNNABLE'), job('job-2', 'STARTING')]) });
    const tasks = [submittedTask('t1', 'job-1'), submittedTask('t2', 'job-2')];

    expect(await collect(filterCompleted(ctx, tasks))).toEqual([]);
  });

  it('fails on a failed job reporting exit status 0', async () => {
    const { ctx } = makeContext({
      batch: describeHandler([
        job('job-1', 'FAILED', { attempts: [{ statusReason: 'odd', container: { exitCode: 0 } }] }),
      ]),
    });

    await expect(collect(filterCompleted(ctx, [submittedTask('t1', 'job-1')]))).rejects.toThrow(
      'job job-1 failed, but has an exit status of 0',
    );
  });

  it('requires every task to have a job id', async () => {
    const { ctx, batchSend } = makeContext();
    const task = makeTask(dir, { status: 'submitted' });

    await expect(collect(filterCompleted(ctx, [task]))).rejects.toThrow('task t1: cannot poll a task without a job id');
    expect(batchSend).not.toHaveBeenCalled();
  });
});

describe('remoteStatuses', () => {
  it('maps job ids to statuses and skips unknown jobs', async () => {
    const dir = await makeWorkDir();
    const { ctx } = makeContext({ batch: describeHandler([job('job-1', 'PENDING')]) });
    const tasks = [makeTask(dir, { uid: 't1', jobId: 'job-1' }), makeTask(dir, { uid: 't2', jobId: 'job-2' })];

    expect(await remoteStatuses(ctx, tasks)).toEqual(new Map([['job-1', 'queued']]));
  });
});
