import {
  logger,
  withSpan,
  spanEvent,
  InvalidTaskError,
  InvariantViolationError,
  type BatchTask,
  type RemoteJobRecord,
  type RemoteStatus,
  type TaskOutcome,
} from '@batchrun/shared';
import type { DriverContext } from './context.js';
import { describeJobs } from './describe-jobs.js';
import { isTerminal } from './remote-status.js';
import { cleanupTask } from './cleanup.js';

const log = logger.child({ module: 'status-poller' });

/** Exit status when the service sent no attempt list for a terminal job. */
export const EXIT_NO_ATTEMPT = -1;
/** Exit status when the last attempt has no container exit code (e.g. the host went away). */
export const EXIT_UNKNOWN = -2;

function wallTimeSeconds(record: RemoteJobRecord): number {
  if (record.startedAt === undefined || record.stoppedAt === undefined) {
    log.warn({ jobId: record.jobId }, 'no timing info for job; reporting wall time 0');
    return 0;
  }
  return Math.round((record.stoppedAt - record.startedAt) / 1000);
}

/**
 * Exit status, reason and wall time for a job in a terminal state.
 * Raises when the service's answer contradicts itself.
 */
export function extractOutcome(record: RemoteJobRecord): TaskOutcome {
  if (!isTerminal(record.status)) {
    throw new InvariantViolationError(`job ${record.jobId} is ${record.rawStatus}, not terminal`);
  }

  let exitStatus: number;
  let statusReason: string | null;

  if (record.attempts === undefined) {
    exitStatus = EXIT_NO_ATTEMPT;
    statusReason = 'no_attempt';
  } else {
    const attempt = record.attempts.at(-1);
    if (!attempt) {
      throw new InvariantViolationError(
        `job ${record.jobId} is ${record.rawStatus} but its attempt list is empty`,
        record,
      );
    }
    statusReason = attempt.statusReason ?? null;
    if (statusReason && attempt.containerReason) {
      statusReason += ` -- container_reason: ${attempt.containerReason}`;
    }
    exitStatus = attempt.exitCode ?? EXIT_UNKNOWN;
  }

  if (record.status === 'failed' && exitStatus === 0) {
    throw new InvariantViolationError(`job ${record.jobId} failed, but has an exit status of 0`, record);
  }

  return {
    status: record.status,
    exitStatus,
    wallTime: wallTimeSeconds(record),
    statusReason,
  };
}

function requireJobIds(tasks: readonly BatchTask[]): string[] {
  return tasks.map((task) => {
    if (!task.jobId) {
      throw new InvalidTaskError(task.uid, 'cannot poll a task without a job id');
    }
    return task.jobId;
  });
}

/**
 * One polling pass. Yields `[task, outcome]` for each task whose job reached a
 * terminal state, after its logs are saved and its script is cleaned up.
 * Jobs still queued or running are skipped; call again for the next pass.
 */
export async function* filterCompleted(
  ctx: DriverContext,
  tasks: readonly BatchTask[],
  options: { signal?: AbortSignal } = {},
): AsyncGenerator<[BatchTask, TaskOutcome]> {
  if (tasks.length === 0) return;

  const jobIds = requireJobIds(tasks);
  const records = await withSpan('batchrun.describeJobs', { 'batchrun.jobs': jobIds.length }, () =>
    describeJobs(ctx.clients.batch, jobIds, { batchSize: ctx.config.describeBatchSize }),
  );
  const byId = new Map(records.map((record) => [record.jobId, record]));

  for (const [i, task] of tasks.entries()) {
    const record = byId.get(jobIds[i]);
    if (!record || !isTerminal(record.status)) continue;

    const outcome = extractOutcome(record);

    log.info(
      { uid: task.uid, jobId: record.jobId, exitStatus: outcome.exitStatus, wallTime: outcome.wallTime },
      'job finished; cleaning up',
    );
    await cleanupTask(ctx, task, { logStreamName: record.logStreamName, signal: options.signal });
    // Stays submitted until cleanup is done, so a failed cleanup is retried on the next pass
    task.status = outcome.status;
    spanEvent('batchrun.jobCompleted', { jobId: record.jobId, exitStatus: outcome.exitStatus });

    yield [task, outcome];
  }
}

/** Current remote status per job id. Jobs the service no longer knows are left out. */
export async function remoteStatuses(
  ctx: DriverContext,
  tasks: readonly BatchTask[],
): Promise<Map<string, RemoteStatus>> {
  if (tasks.length === 0) return new Map();
  const records = await describeJobs(ctx.clients.batch, requireJobIds(tasks), {
    batchSize: ctx.config.describeBatchSize,
    missingOk: true,
  });
  return new Map(records.map((record) => [record.jobId, record.status]));
}
