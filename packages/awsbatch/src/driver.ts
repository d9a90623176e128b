import { logger, type BatchTask, type RemoteStatus, type TaskOutcome } from '@batchrun/shared';
import { createAwsClients, destroyAwsClients, type AwsClients } from './clients.js';
import { loadDriverConfig, type DriverConfig } from './config.js';
import type { DriverContext } from './context.js';
import { JobDefinitionRegistry } from './job-definitions.js';
import { submitJobs, type SubmitOptions, type SubmissionResult } from './submission.js';
import { filterCompleted, remoteStatuses } from './status-poller.js';
import { fetchJobLogs, fetchLogStream } from './log-retriever.js';
import { killTask, killTasks } from './terminator.js';

const log = logger.child({ module: 'awsbatch-driver' });

export interface AwsBatchDriverOptions {
  config?: Readonly<DriverConfig>;
  /** Supply pre-built clients (tests, custom endpoints); created from config otherwise */
  clients?: AwsClients;
}

/**
 * Runs workflow tasks as AWS Batch jobs: submit, poll, collect logs, clean up
 * and terminate. One instance owns one job-definition cache; call
 * `shutdown()` when the workflow is done to deregister those definitions.
 */
export class AwsBatchDriver {
  readonly name = 'awsbatch';
  private readonly ctx: DriverContext;
  private readonly ownsClients: boolean;

  constructor(options: AwsBatchDriverOptions = {}) {
    const config = options.config ?? loadDriverConfig();
    const clients = options.clients ?? createAwsClients(config);
    this.ownsClients = !options.clients;
    this.ctx = {
      config,
      clients,
      registry: new JobDefinitionRegistry(clients.batch, {
        namePrefix: config.jobNamePrefix,
        jobRoleArn: config.jobRoleArn,
      }),
    };
    log.info(
      { prefix: config.jobNamePrefix, maxConcurrency: config.maxConcurrency, logGroup: config.logGroup },
      'AwsBatchDriver initialized',
    );
  }

  get config(): Readonly<DriverConfig> {
    return this.ctx.config;
  }

  get jobDefinitions() {
    return this.ctx.registry.entries();
  }

  submitJobs(tasks: readonly BatchTask[], options?: SubmitOptions): Promise<SubmissionResult[]> {
    return submitJobs(this.ctx, tasks, options);
  }

  filterCompleted(
    tasks: readonly BatchTask[],
    options?: { signal?: AbortSignal },
  ): AsyncGenerator<[BatchTask, TaskOutcome]> {
    return filterCompleted(this.ctx, tasks, options);
  }

  remoteStatuses(tasks: readonly BatchTask[]): Promise<Map<string, RemoteStatus>> {
    return remoteStatuses(this.ctx, tasks);
  }

  /** Logs for a job, by stream name when known or by looking the job up. */
  fetchLogs(
    ref: { jobId: string } | { logStreamName: string },
    options: { attempts?: number; delayMs?: number; signal?: AbortSignal } = {},
  ): Promise<string> {
    const fetchOptions = {
      logGroup: this.ctx.config.logGroup,
      attempts: options.attempts ?? this.ctx.config.logFetchAttempts,
      delayMs: options.delayMs ?? this.ctx.config.logFetchDelayMs,
      signal: options.signal,
    };
    if ('logStreamName' in ref) {
      return fetchLogStream(this.ctx.clients.logs, ref.logStreamName, fetchOptions);
    }
    return fetchJobLogs(this.ctx.clients.batch, this.ctx.clients.logs, ref.jobId, fetchOptions);
  }

  kill(task: BatchTask): Promise<void> {
    return killTask(this.ctx, task);
  }

  killTasks(tasks: readonly BatchTask[]): Promise<void> {
    return killTasks(this.ctx, tasks);
  }

  async shutdown(): Promise<void> {
    await this.ctx.registry.deregisterAll();
    if (this.ownsClients) {
      destroyAwsClients(this.ctx.clients);
    }
    log.info('AwsBatchDriver shut down');
  }
}
