import { TerminateJobCommand } from '@aws-sdk/client-batch';
import { logger, withSpan, mapWithConcurrency, InvalidTaskError, type BatchTask } from '@batchrun/shared';
import type { DriverContext } from './context.js';
import { assertApiSuccess } from './responses.js';
import { cleanupTask } from './cleanup.js';

const log = logger.child({ module: 'terminator' });

export const TERMINATION_REASON = 'terminated by batchrun';

/**
 * Terminate the task's remote job and clean up without waiting for logs,
 * which may never be written for a job killed mid-flight.
 */
export async function killTask(ctx: DriverContext, task: BatchTask): Promise<void> {
  if (!task.jobId) {
    throw new InvalidTaskError(task.uid, 'cannot kill a task without a job id');
  }

  const response = await ctx.clients.batch.send(
    new TerminateJobCommand({ jobId: task.jobId, reason: TERMINATION_REASON }),
  );
  assertApiSuccess('TerminateJob', response);

  await cleanupTask(ctx, task, { logAttempts: 0 });
  task.status = 'killed';
  log.info({ uid: task.uid, jobId: task.jobId }, 'job terminated');
}

export async function killTasks(ctx: DriverContext, tasks: readonly BatchTask[]): Promise<void> {
  if (tasks.length === 0) return;
  await withSpan('batchrun.killTasks', { 'batchrun.tasks': tasks.length }, async () => {
    log.info({ count: tasks.length }, 'killing tasks');
    await mapWithConcurrency(tasks, ctx.config.maxConcurrency, (task) => killTask(ctx, task));
  });
}
