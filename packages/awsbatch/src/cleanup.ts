import { writeFile } from 'node:fs/promises';
import { logger, InvalidTaskError, type BatchTask } from '@batchrun/shared';
import type { DriverContext } from './context.js';
import { fetchJobLogs, fetchLogStream } from './log-retriever.js';
import { deleteStagedScript } from './script-staging.js';

const log = logger.child({ module: 'cleanup' });

export interface CleanupOptions {
  /** Skips the describe-jobs lookup when the stream is already known */
  logStreamName?: string;
  /** 0 skips log collection entirely */
  logAttempts?: number;
  logDelayMs?: number;
  signal?: AbortSignal;
}

function truncationNotice(jobId: string): string {
  return `WARNING: this might be truncated.  check log stream on the aws console for job: ${jobId}`;
}

/**
 * Persist the job's logs to the task's stdout file, then delete its staged
 * script unless the task asked to keep it. Only touches `task` itself, so it
 * may run concurrently for different tasks.
 */
export async function cleanupTask(
  ctx: DriverContext,
  task: BatchTask,
  options: CleanupOptions = {},
): Promise<void> {
  const attempts = options.logAttempts ?? ctx.config.logFetchAttempts;
  const jobId = task.jobId;
  if (!jobId) {
    throw new InvalidTaskError(task.uid, 'cannot clean up a task that was never submitted');
  }

  if (attempts > 0) {
    const fetchOptions = {
      logGroup: ctx.config.logGroup,
      attempts,
      delayMs: options.logDelayMs ?? ctx.config.logFetchDelayMs,
      signal: options.signal,
    };
    const logs = options.logStreamName
      ? await fetchLogStream(ctx.clients.logs, options.logStreamName, fetchOptions)
      : await fetchJobLogs(ctx.clients.batch, ctx.clients.logs, jobId, fetchOptions);

    await writeFile(task.stdoutPath, `${logs}\n${truncationNotice(jobId)}`);
  }

  if (task.keepCommandScript) {
    log.debug({ uid: task.uid, scriptUri: task.scriptUri }, 'keeping command script');
    return;
  }
  if (!task.scriptUri) {
    throw new InvalidTaskError(task.uid, 'no staged script recorded to delete');
  }
  await deleteStagedScript(ctx.clients.s3, task.scriptUri);
}
