import { setTimeout as sleep } from 'node:timers/promises';
import { logger, type BatchTask, type TaskOutcome, type TaskStatus } from '@batchrun/shared';
import type { AwsBatchDriver } from '@batchrun/awsbatch';

const log = logger.child({ module: 'runner' });

export type LifecycleDriver = Pick<AwsBatchDriver, 'submitJobs' | 'filterCompleted' | 'killTasks'>;

export interface RunOptions {
  pollIntervalMs: number;
  signal?: AbortSignal;
}

export interface TaskSummary {
  uid: string;
  status: TaskStatus;
  jobId?: string;
  exitStatus?: number;
  wallTime?: number;
  statusReason?: string | null;
}

export interface RunSummary {
  tasks: TaskSummary[];
  succeeded: number;
  failed: number;
  killed: number;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

function summarize(tasks: readonly BatchTask[], outcomes: ReadonlyMap<string, TaskOutcome>): RunSummary {
  const summaries = tasks.map((task): TaskSummary => {
    const outcome = outcomes.get(task.uid);
    return {
      uid: task.uid,
      status: task.status,
      jobId: task.jobId,
      exitStatus: outcome?.exitStatus,
      wallTime: outcome?.wallTime,
      statusReason: outcome?.statusReason,
    };
  });
  return {
    tasks: summaries,
    succeeded: summaries.filter((t) => t.status === 'succeeded').length,
    failed: summaries.filter((t) => t.status === 'failed').length,
    killed: summaries.filter((t) => t.status === 'killed').length,
  };
}

/** Terminate jobs left running by a failed run. The run's own error is what the caller sees. */
async function killSubmitted(driver: LifecycleDriver, tasks: readonly BatchTask[]): Promise<void> {
  const submitted = tasks.filter((task) => task.status === 'submitted');
  if (submitted.length === 0) return;
  log.error({ submitted: submitted.length }, 'run failed; terminating submitted jobs');
  try {
    await driver.killTasks(submitted);
  } catch (killErr) {
    log.error({ err: killErr }, 'failed to terminate submitted jobs');
  }
}

/**
 * Submit every task, then poll until each one finishes. When the signal
 * aborts, jobs still outstanding are terminated and reported as killed.
 */
export async function runManifest(driver: LifecycleDriver, tasks: BatchTask[], options: RunOptions): Promise<RunSummary> {
  const { pollIntervalMs, signal } = options;
  const outcomes = new Map<string, TaskOutcome>();

  try {
    await driver.submitJobs(tasks, { signal });
    let outstanding = tasks.filter((task) => task.status === 'submitted');
    log.info({ submitted: outstanding.length, total: tasks.length }, 'tasks submitted');

    while (outstanding.length > 0) {
      if (signal?.aborted) {
        log.warn({ outstanding: outstanding.length }, 'run aborted; terminating outstanding jobs');
        await driver.killTasks(outstanding);
        break;
      }

      for await (const [task, outcome] of driver.filterCompleted(outstanding, { signal })) {
        outcomes.set(task.uid, outcome);
        log.info({ uid: task.uid, status: outcome.status, exitStatus: outcome.exitStatus }, 'task finished');
      }
      outstanding = outstanding.filter((task) => task.status === 'submitted');

      if (outstanding.length > 0) {
        try {
          await sleep(pollIntervalMs, undefined, { signal });
        } catch (err) {
          if (!isAbortError(err)) throw err;
        }
      }
    }
  } catch (err) {
    await killSubmitted(driver, tasks);
    throw err;
  }

  const summary = summarize(tasks, outcomes);
  log.info({ succeeded: summary.succeeded, failed: summary.failed, killed: summary.killed }, 'run complete');
  return summary;
}
