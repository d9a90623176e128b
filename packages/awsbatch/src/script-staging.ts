import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { PutObjectCommand, DeleteObjectCommand, type S3Client } from '@aws-sdk/client-s3';
import { logger, type StagedScript } from '@batchrun/shared';
import { assertApiSuccess } from './responses.js';
import { joinBucketKey, parseScriptPrefix, splitBucketKey } from './s3-uri.js';

const log = logger.child({ module: 'script-staging' });

/** 32 random hex digits; keeps keys unique across retries of the same job. */
function randomToken(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * Upload a local command script under `<prefix>/<random>.<jobName>.script`.
 * Every call creates a new object, so a retried submission leaves its earlier
 * upload behind and each must be deleted on its own.
 */
export async function stageScript(
  s3: S3Client,
  localPath: string,
  prefix: string,
  jobName: string,
): Promise<StagedScript> {
  const { bucket, key: prefixKey } = parseScriptPrefix(prefix);
  const key = `${prefixKey}/${randomToken()}.${jobName}.script`;

  const body = await readFile(localPath);
  const response = await s3.send(
    new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentType: 'text/x-shellscript',
    }),
  );
  assertApiSuccess('PutObject', response);

  const uri = joinBucketKey(bucket, key);
  log.debug({ uri, bytes: body.length }, 'command script staged');
  return { bucket, key, uri };
}

export async function deleteStagedScript(s3: S3Client, uri: string): Promise<void> {
  const { bucket, key } = splitBucketKey(uri);
  const response = await s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  // DeleteObject answers 204 No Content
  if (response.$metadata.httpStatusCode !== 204) {
    assertApiSuccess('DeleteObject', response);
  }
  log.debug({ uri }, 'command script deleted');
}
