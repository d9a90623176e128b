import { BatchClient } from '@aws-sdk/client-batch';
import { S3Client } from '@aws-sdk/client-s3';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { logger } from '@batchrun/shared';
import type { DriverConfig } from './config.js';

const log = logger.child({ module: 'aws-clients' });

/** The three services the driver talks to. SDK clients are safe to share across concurrent calls. */
export interface AwsClients {
  batch: BatchClient;
  s3: S3Client;
  logs: CloudWatchLogsClient;
}

type ClientSettings = Pick<DriverConfig, 'region' | 'apiMaxAttempts' | 'maxSockets'>;

function baseClientConfig(config: ClientSettings) {
  return {
    ...(config.region ? { region: config.region } : {}),
    // Adaptive mode adds client-side rate limiting on top of exponential backoff.
    retryMode: 'adaptive',
    maxAttempts: config.apiMaxAttempts,
    requestHandler: {
      httpsAgent: { maxSockets: config.maxSockets, keepAlive: true },
    },
  };
}

export function createAwsClients(config: ClientSettings): AwsClients {
  const base = baseClientConfig(config);
  log.debug(
    { region: config.region ?? 'default', maxAttempts: config.apiMaxAttempts, maxSockets: config.maxSockets },
    'creating AWS clients',
  );
  return {
    batch: new BatchClient(base),
    s3: new S3Client(base),
    logs: new CloudWatchLogsClient(base),
  };
}

/** Release sockets held by the clients' HTTP agents. */
export function destroyAwsClients(clients: AwsClients): void {
  clients.batch.destroy();
  clients.s3.destroy();
  clients.logs.destroy();
}
