import type { JobDetail, JobStatus } from '@aws-sdk/client-batch';
import { UnknownRemoteStatusError, type RemoteJobRecord, type RemoteStatus } from '@batchrun/shared';

/**
 * Every status AWS Batch documents, mapped onto the driver's four states.
 * A value missing here fails loudly instead of being treated as non-terminal.
 */
const STATUS_TABLE: Record<JobStatus, RemoteStatus> = {
  SUBMITTED: 'queued',
  PENDING: 'queued',
  RUNNABLE: 'queued',
  STARTING: 'queued',
  RUNNING: 'running',
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
};

function isKnownStatus(raw: string): raw is JobStatus {
  return Object.prototype.hasOwnProperty.call(STATUS_TABLE, raw);
}

export function mapRemoteStatus(jobId: string, raw: string | undefined): RemoteStatus {
  if (raw === undefined || !isKnownStatus(raw)) {
    throw new UnknownRemoteStatusError(jobId, String(raw));
  }
  return STATUS_TABLE[raw];
}

export function isTerminal(status: RemoteStatus): status is 'succeeded' | 'failed' {
  return status === 'succeeded' || status === 'failed';
}

export function toRemoteJobRecord(detail: JobDetail): RemoteJobRecord {
  const jobId = detail.jobId ?? '<missing jobId>';
  return {
    jobId,
    status: mapRemoteStatus(jobId, detail.status),
    rawStatus: String(detail.status),
    attempts: detail.attempts?.map((attempt) => ({
      statusReason: attempt.statusReason,
      exitCode: attempt.container?.exitCode,
      containerReason: attempt.container?.reason,
    })),
    logStreamName: detail.container?.logStreamName,
    startedAt: detail.startedAt,
    stoppedAt: detail.stoppedAt,
  };
}
