import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { BatchClient } from '@aws-sdk/client-batch';
import type { S3Client } from '@aws-sdk/client-s3';
import type { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import type { BatchTask } from '@batchrun/shared';
import type { DriverConfig } from '../config.js';
import type { DriverContext } from '../context.js';
import { JobDefinitionRegistry } from '../job-definitions.js';

// ---------------------------------------------------------------------------
// Fake SDK clients: every command goes through one handler
// ---------------------------------------------------------------------------

export const OK = { $metadata: { httpStatusCode: 200 } };

export type SendHandler = (command: object) => unknown;

function unexpected(command: object): never {
  throw new Error(`unexpected command ${command.constructor.name}`);
}

export function fakeClient<T>(handler: SendHandler = unexpected) {
  const send = vi.fn(async (command: object) => handler(command));
  const destroy = vi.fn();
  return { client: { send, destroy } as unknown as T, send, destroy };
}

/** Commands passed to a fake client's send, filtered by class. */
export function sentCommands<C>(send: { mock: { calls: unknown[][] } }, type: new (...args: never[]) => C): C[] {
  return send.mock.calls.map((call) => call[0]).filter((command): command is C => command instanceof type);
}

export function notFound(message = 'The specified log stream does not exist.'): Error {
  return Object.assign(new Error(message), { name: 'ResourceNotFoundException' });
}

// ---------------------------------------------------------------------------
// Driver context
// ---------------------------------------------------------------------------

export const testConfig: Readonly<DriverConfig> = {
  region: 'us-east-1',
  jobNamePrefix: 'batchrun',
  maxConcurrency: 4,
  apiMaxAttempts: 3,
  maxSockets: 5,
  describeBatchSize: 50,
  logGroup: '/aws/batch/job',
  logFetchAttempts: 3,
  logFetchDelayMs: 0,
  user: 'alice',
};

export function makeContext(
  handlers: { batch?: SendHandler; s3?: SendHandler; logs?: SendHandler } = {},
  config: Partial<DriverConfig> = {},
) {
  const batch = fakeClient<BatchClient>(handlers.batch);
  const s3 = fakeClient<S3Client>(handlers.s3);
  const logs = fakeClient<CloudWatchLogsClient>(handlers.logs);
  const merged = { ...testConfig, ...config };
  const ctx: DriverContext = {
    config: merged,
    clients: { batch: batch.client, s3: s3.client, logs: logs.client },
    registry: new JobDefinitionRegistry(batch.client, { namePrefix: merged.jobNamePrefix }),
  };
  return { ctx, batchSend: batch.send, s3Send: s3.send, logsSend: logs.send };
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

/** Temp dir holding a command script at `<dir>/script.sh`. */
export async function makeWorkDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'batchrun-test-'));
  await writeFile(join(dir, 'script.sh'), '#!/bin/bash\necho hello\n');
  return dir;
}

export function makeTask(dir: string, overrides: Partial<BatchTask> = {}): BatchTask {
  const uid = overrides.uid ?? 't1';
  return {
    uid,
    stageName: 'align',
    queue: 'default-queue',
    cpuReq: 2,
    memReq: 4096,
    environment: { SAMPLE: 'na1' },
    container: { image: 'ubuntu:22.04', mountPoints: [], volumes: [] },
    scriptPrefix: 's3://test-bucket/scripts',
    commandScriptPath: join(dir, 'script.sh'),
    stdoutPath: join(dir, 'out', uid, 'stdout.txt'),
    stderrPath: join(dir, 'out', uid, 'stderr.txt'),
    status: 'pending',
    ...overrides,
  };
}
