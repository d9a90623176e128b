import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { SubmitJobCommand, type ContainerOverrides, type KeyValuePair } from '@aws-sdk/client-batch';
import {
  logger,
  withSpan,
  mapWithConcurrency,
  containerSpecSchema,
  formatIssues,
  InvalidTaskError,
  type BatchTask,
  type ContainerSpec,
} from '@batchrun/shared';
import type { DriverContext } from './context.js';
import { assertApiSuccess, requireField } from './responses.js';
import { buildJobName, stageTag } from './job-name.js';
import { containerSpecKey } from './job-definitions.js';
import { parseScriptPrefix } from './s3-uri.js';
import { stageScript } from './script-staging.js';

const log = logger.child({ module: 'submission' });

export interface SubmitOptions {
  /** Checked before each task is staged; an aborted signal marks the remaining tasks killed. */
  signal?: AbortSignal;
}

export type SubmissionResult =
  | { status: 'submitted'; jobId: string; scriptUri: string; jobDefinitionArn: string }
  | { status: 'killed' };

/** A task that passed validation, with the values submission needs narrowed. */
interface PreparedTask {
  task: BatchTask;
  jobName: string;
  queue: string;
  cpuReq: number;
  memReq: number;
  container: ContainerSpec;
}

function requirePositive(task: BatchTask, field: 'cpuReq' | 'memReq', value: number | undefined): number {
  if (value === undefined) {
    throw new InvalidTaskError(task.uid, `${field} must be set`);
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidTaskError(task.uid, `${field} must be greater than 0, got ${value}`);
  }
  return value;
}

/**
 * Check everything that can be checked locally. Throws before any remote call
 * so a bad task never leaves half a submission behind.
 */
export function prepareTask(task: BatchTask, prefix: string, user: string): PreparedTask {
  if (!task.queue) {
    throw new InvalidTaskError(task.uid, 'queue must be set');
  }
  const cpuReq = requirePositive(task, 'cpuReq', task.cpuReq);
  const memReq = requirePositive(task, 'memReq', task.memReq);
  if (task.gpuReq !== undefined && (!Number.isInteger(task.gpuReq) || task.gpuReq < 0)) {
    throw new InvalidTaskError(task.uid, `gpuReq must be a non-negative integer, got ${task.gpuReq}`);
  }

  const container = containerSpecSchema.safeParse(task.container);
  if (!container.success) {
    throw new InvalidTaskError(task.uid, `invalid container spec: ${formatIssues(container.error)}`);
  }

  parseScriptPrefix(task.scriptPrefix);
  const jobName = buildJobName(prefix, user, task.stageName, task.uid);

  return { task, jobName, queue: task.queue, cpuReq, memReq, container: container.data };
}

/** `0,1,…,n-1` */
function visibleDevices(gpus: number): string {
  return Array.from({ length: gpus }, (_, i) => String(i)).join(',');
}

export function buildContainerOverrides(
  scriptUri: string,
  task: Pick<BatchTask, 'environment' | 'instanceType' | 'gpuReq'> & { cpuReq: number; memReq: number },
): ContainerOverrides {
  const command =
    `aws s3 cp --quiet ${scriptUri} command_script && ` +
    'chmod +x command_script && ' +
    './command_script';

  const environment: KeyValuePair[] = Object.entries(task.environment).map(([name, value]) => ({ name, value }));
  const overrides: ContainerOverrides = {
    resourceRequirements: [
      { type: 'VCPU', value: String(task.cpuReq) },
      { type: 'MEMORY', value: String(task.memReq) },
    ],
    environment,
    command: ['bash', '-c', command],
  };

  if (task.instanceType) {
    overrides.instanceType = task.instanceType;
  }
  if (task.gpuReq) {
    overrides.resourceRequirements?.push({ type: 'GPU', value: String(task.gpuReq) });
    environment.push({ name: 'CUDA_VISIBLE_DEVICES', value: visibleDevices(task.gpuReq) });
  }

  return overrides;
}

async function writeCaptureFiles(task: BatchTask, jobId: string): Promise<void> {
  await mkdir(dirname(task.stdoutPath), { recursive: true });
  await mkdir(dirname(task.stderrPath), { recursive: true });
  await writeFile(task.stdoutPath, '');
  // Logs land in stdout at cleanup; stderr keeps the job id for quick lookups.
  await writeFile(task.stderrPath, `${JSON.stringify({ job_id: jobId }, null, 2)}\n`);
}

async function submitOne(
  ctx: DriverContext,
  prepared: PreparedTask,
  signal: AbortSignal | undefined,
): Promise<SubmissionResult> {
  const { task, jobName } = prepared;

  if (signal?.aborted) {
    task.status = 'killed';
    log.info({ uid: task.uid }, 'termination requested before submission; task killed');
    return { status: 'killed' };
  }

  const jobDefinitionArn = await ctx.registry.getOrRegister(prepared.container, task.uid);
  const staged = await stageScript(ctx.clients.s3, task.commandScriptPath, task.scriptPrefix, jobName);

  const response = await ctx.clients.batch.send(
    new SubmitJobCommand({
      jobName,
      jobQueue: prepared.queue,
      jobDefinition: jobDefinitionArn,
      containerOverrides: buildContainerOverrides(staged.uri, { ...task, cpuReq: prepared.cpuReq, memReq: prepared.memReq }),
      propagateTags: true,
      tags: {
        job_type: ctx.config.jobNamePrefix,
        username: ctx.config.user,
        stage_name: stageTag(task.stageName),
        cwd: process.cwd(),
      },
    }),
  );
  assertApiSuccess('SubmitJob', response);
  const jobId = requireField('SubmitJob', 'jobId', response.jobId);

  task.jobId = jobId;
  task.scriptUri = staged.uri;
  task.jobDefinitionArn = jobDefinitionArn;
  task.status = 'submitted';

  await writeCaptureFiles(task, jobId);
  log.info({ uid: task.uid, jobId, jobName, queue: prepared.queue }, 'job submitted');

  return { status: 'submitted', jobId, scriptUri: staged.uri, jobDefinitionArn };
}

/**
 * Submit a batch of tasks. Results line up with `tasks` by position.
 *
 * Every task is validated first. Job definitions are then registered once per
 * distinct container configuration, and the submissions themselves run on a
 * bounded pool.
 */
export async function submitJobs(
  ctx: DriverContext,
  tasks: readonly BatchTask[],
  options: SubmitOptions = {},
): Promise<SubmissionResult[]> {
  if (tasks.length === 0) return [];

  const prepared = tasks.map((task) => prepareTask(task, ctx.config.jobNamePrefix, ctx.config.user));

  return withSpan('batchrun.submitJobs', { 'batchrun.tasks': tasks.length }, async () => {
    const groups = new Map<string, PreparedTask>();
    for (const p of prepared) {
      const key = containerSpecKey(p.container);
      if (!groups.has(key)) groups.set(key, p);
    }
    for (const first of groups.values()) {
      if (options.signal?.aborted) break;
      await ctx.registry.getOrRegister(first.container, first.task.uid);
    }

    const results = await mapWithConcurrency(prepared, ctx.config.maxConcurrency, (p) =>
      submitOne(ctx, p, options.signal),
    );

    const submitted = results.filter((r) => r.status === 'submitted').length;
    log.info({ submitted, killed: results.length - submitted }, 'batch submission finished');
    return results;
  });
}
