/**
 * @batchrun/awsbatch — AWS Batch job lifecycle driver.
 *
 * - AwsBatchDriver: facade used by the runner and by workflow engines
 * - submission / status-poller / log-retriever / cleanup / terminator: the
 *   lifecycle steps, each usable on its own with a DriverContext
 */

export { AwsBatchDriver, type AwsBatchDriverOptions } from './driver.js';
export { loadDriverConfig, DESCRIBE_JOBS_LIMIT, type DriverConfig } from './config.js';
export { createAwsClients, destroyAwsClients, type AwsClients } from './clients.js';
export type { DriverContext } from './context.js';

// Lifecycle steps
export { submitJobs, prepareTask, buildContainerOverrides, type SubmitOptions, type SubmissionResult } from './submission.js';
export { filterCompleted, remoteStatuses, extractOutcome, EXIT_NO_ATTEMPT, EXIT_UNKNOWN } from './status-poller.js';
export { describeJobs, type DescribeOptions } from './describe-jobs.js';
export { fetchLogStream, fetchJobLogs, type FetchLogsOptions } from './log-retriever.js';
export { cleanupTask, type CleanupOptions } from './cleanup.js';
export { killTask, killTasks, TERMINATION_REASON } from './terminator.js';

// Building blocks
export {
  JobDefinitionRegistry,
  buildContainerProperties,
  containerSpecKey,
  type JobDefinitionEntry,
} from './job-definitions.js';
export { buildJobName, validateJobName, isValidJobName, jobDefinitionName, MAX_NAME_LENGTH } from './job-name.js';
export { splitBucketKey, joinBucketKey, parseScriptPrefix, type BucketKey } from './s3-uri.js';
export { stageScript, deleteStagedScript } from './script-staging.js';
export { mapRemoteStatus, toRemoteJobRecord, isTerminal } from './remote-status.js';
export { assertApiSuccess } from './responses.js';
