import { DescribeJobsCommand, type BatchClient } from '@aws-sdk/client-batch';
import { ConsistencyError, InvalidArgumentError, type RemoteJobRecord } from '@batchrun/shared';
import { DESCRIBE_JOBS_LIMIT } from './config.js';
import { assertApiSuccess } from './responses.js';
import { toRemoteJobRecord } from './remote-status.js';

export interface DescribeOptions {
  /** Ids per request; capped at the service limit */
  batchSize?: number;
  /** Return whatever the service knows instead of failing on absent ids */
  missingOk?: boolean;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

function difference(a: readonly string[], b: ReadonlySet<string>): string[] {
  return a.filter((id) => !b.has(id));
}

/**
 * Describe jobs in request-sized chunks and return records in input order.
 * Unless `missingOk`, the returned id set must equal the requested one.
 */
export async function describeJobs(
  batch: BatchClient,
  jobIds: readonly string[],
  options: DescribeOptions = {},
): Promise<RemoteJobRecord[]> {
  const unique = new Set(jobIds);
  if (unique.size !== jobIds.length) {
    throw new InvalidArgumentError('job ids passed to describeJobs must be unique', jobIds);
  }

  const batchSize = Math.min(options.batchSize ?? DESCRIBE_JOBS_LIMIT, DESCRIBE_JOBS_LIMIT);
  const byId = new Map<string, RemoteJobRecord>();

  for (const ids of chunk(jobIds, batchSize)) {
    const response = await batch.send(new DescribeJobsCommand({ jobs: ids }));
    assertApiSuccess('DescribeJobs', response);
    for (const detail of response.jobs ?? []) {
      const record = toRemoteJobRecord(detail);
      byId.set(record.jobId, record);
    }
  }

  if (!options.missingOk) {
    const returned = new Set(byId.keys());
    const missing = difference(jobIds, returned);
    const unexpected = difference([...returned], unique);
    if (missing.length > 0 || unexpected.length > 0) {
      throw new ConsistencyError(
        `describe-jobs returned a different job set than requested (missing: ${missing.join(', ') || 'none'}; ` +
          `unexpected: ${unexpected.join(', ') || 'none'})`,
        { missing, unexpected },
      );
    }
  }

  const records: RemoteJobRecord[] = [];
  for (const id of jobIds) {
    const record = byId.get(id);
    if (record) records.push(record);
  }
  return records;
}
