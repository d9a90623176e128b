import { InvalidArgumentError } from '@batchrun/shared';

const S3_URI = /^s3:\/\/([^/]+)\/(.+)$/;

export interface BucketKey {
  bucket: string;
  key: string;
}

/**
 * Split `s3://bucket/path/to/fname` into `{ bucket: 'bucket', key: 'path/to/fname' }`.
 * A URI without a key is rejected.
 */
export function splitBucketKey(uri: string): BucketKey {
  const match = S3_URI.exec(uri);
  if (!match) {
    throw new InvalidArgumentError(`'${uri}' is not an s3://bucket/key URI`);
  }
  return { bucket: match[1], key: match[2] };
}

export function joinBucketKey(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}

/**
 * Validate a staging prefix: must use the s3 scheme, name a key below the
 * bucket and carry no trailing slash.
 */
export function parseScriptPrefix(prefix: string): BucketKey {
  if (!prefix.startsWith('s3://')) {
    throw new InvalidArgumentError(`invalid script prefix '${prefix}': must start with s3://`);
  }
  if (prefix.endsWith('/')) {
    throw new InvalidArgumentError(`invalid script prefix '${prefix}': must not have a trailing slash`);
  }
  return splitBucketKey(prefix);
}
