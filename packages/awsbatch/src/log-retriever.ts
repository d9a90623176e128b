import { setTimeout as sleep } from 'node:timers/promises';
import { GetLogEventsCommand, type CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import type { BatchClient } from '@aws-sdk/client-batch';
import { logger } from '@batchrun/shared';
import { assertApiSuccess } from './responses.js';
import { describeJobs } from './describe-jobs.js';

const log = logger.child({ module: 'log-retriever' });

export interface FetchLogsOptions {
  logGroup: string;
  /** Total tries while the stream does not exist yet */
  attempts: number;
  delayMs: number;
  /** Pagination stops early, keeping what was read, once this aborts */
  signal?: AbortSignal;
}

function isStreamNotFound(err: unknown): boolean {
  return err instanceof Error && err.name === 'ResourceNotFoundException';
}

async function readStream(
  logs: CloudWatchLogsClient,
  logStreamName: string,
  options: FetchLogsOptions,
): Promise<string> {
  const messages: string[] = [];
  let nextToken: string | undefined;

  for (;;) {
    const response = await logs.send(
      new GetLogEventsCommand({
        logGroupName: options.logGroup,
        logStreamName,
        startFromHead: true,
        nextToken,
      }),
    );
    assertApiSuccess('GetLogEvents', response);

    for (const event of response.events ?? []) {
      if (event.message !== undefined) messages.push(event.message);
    }

    // The service signals the end of the stream by handing back the token it was given.
    if (response.nextForwardToken === undefined || response.nextForwardToken === nextToken) break;
    nextToken = response.nextForwardToken;

    if (options.signal?.aborted) {
      log.info({ logStreamName, messages: messages.length }, 'termination requested; returning partial logs');
      break;
    }
  }

  return messages.filter((message) => !message.includes('\r')).join('\n');
}

/**
 * Read a log stream from the beginning. A stream that does not exist yet is
 * retried `attempts` times, `delayMs` apart, before settling for a placeholder.
 * Once the signal aborts no further attempt is made.
 */
export async function fetchLogStream(
  logs: CloudWatchLogsClient,
  logStreamName: string,
  options: FetchLogsOptions,
): Promise<string> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await readStream(logs, logStreamName, options);
    } catch (err) {
      if (!isStreamNotFound(err)) throw err;
      if (attempt >= options.attempts || options.signal?.aborted) {
        log.warn({ logStreamName, attempts: attempt }, 'log stream never appeared');
        return `log stream not found for log_stream_name: ${logStreamName}\n`;
      }
      log.debug({ logStreamName, attempt, delayMs: options.delayMs }, 'log stream not found yet, retrying');
      await sleep(options.delayMs);
    }
  }
}

/** Look the job up first to find its log stream, then read it. */
export async function fetchJobLogs(
  batch: BatchClient,
  logs: CloudWatchLogsClient,
  jobId: string,
  options: FetchLogsOptions,
): Promise<string> {
  const [record] = await describeJobs(batch, [jobId]);
  if (!record.logStreamName) {
    return `no log stream was available for job: ${jobId}\n`;
  }
  return fetchLogStream(logs, record.logStreamName, options);
}
