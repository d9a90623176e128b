import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@batchrun/shared';
import { splitBucketKey, joinBucketKey, parseScriptPrefix } from '../s3-uri.js';

describe('splitBucketKey', () => {
  it('splits bucket and key', () => {
    expect(splitBucketKey('s3://bucket/path/to/fname')).toEqual({ bucket: 'bucket', key: 'path/to/fname' });
  });

  it('rejects a URI without a key', () => {
    expect(() => splitBucketKey('s3://bucket')).toThrow("'s3://bucket' is not an s3://bucket/key URI");
  });

  it('rejects other schemes', () => {
    expect(() => splitBucketKey('https://bucket/key')).toThrow(InvalidArgumentError);
  });

  it('inverts joinBucketKey', () => {
    expect(splitBucketKey(joinBucketKey('b', 'a/b.script'))).toEqual({ bucket: 'b', key: 'a/b.script' });
  });
});

describe('parseScriptPrefix', () => {
  it('accepts a prefix below the bucket', () => {
    expect(parseScriptPrefix('s3://test-bucket/scripts')).toEqual({ bucket: 'test-bucket', key: 'scripts' });
  });

  it('rejects a trailing slash', () => {
    expect(() => parseScriptPrefix('s3://test-bucket/scripts/')).toThrow(
      "invalid script prefix 's3://test-bucket/scripts/': must not have a trailing slash",
    );
  });

  it('rejects a non-s3 scheme', () => {
    expect(() => parseScriptPrefix('gs://test-bucket/scripts')).toThrow(
      "invalid script prefix 'gs://test-bucket/scripts': must start with s3://",
    );
  });
});
