import path from 'path';

import { ErrorFactory, type ValidationError } from '@bucketferry/errors';

/**
 * Local path for an object: `<targetPath>/<bucket>/<key>`, keeping the key's
 * directory structure. Keys that would resolve outside the bucket directory
 * (`..` segments, absolute keys) are rejected.
 */
export function destinationFor(targetPath: string, bucket: string, key: string): string {
  const bucketDir = bucketDirectory(targetPath, bucket);
  const segments = key.split('/').filter(segment => segment !== '' && segment !== '.');

  if (segments.length === 0 || segments.includes('..') || key.startsWith('/')) {
    throw unsafeKey(bucket, key);
  }

  const destination = path.join(bucketDir, ...segments);
  const relative = path.relative(bucketDir, destination);
  if (
    relative === '' ||
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw unsafeKey(bucket, key);
  }

  return destination;
}

export function bucketDirectory(targetPath: string, bucket: string): string {
  if (bucket === '' || bucket === '.' || bucket === '..' || bucket.includes('/')) {
    throw ErrorFactory.validation(`Bucket name cannot be used as a directory: ${bucket}`, {
      code: 'UNSAFE_BUCKET_NAME',
    });
  }
  return path.join(path.resolve(targetPath), bucket);
}

/**
 * Keys ending in `/` are folder placeholders rather than downloadable objects
 */
export function isDirectoryMarker(key: string): boolean {
  return key.endsWith('/');
}

function unsafeKey(bucket: string, key: string): ValidationError {
  return ErrorFactory.validation(`Object key escapes the bucket directory: ${bucket}/${key}`, {
    code: 'UNSAFE_OBJECT_KEY',
    data: { bucket, key },
  });
}
