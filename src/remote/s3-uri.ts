/**
 * S3 URI helpers
 */

const S3_SCHEME = 's3://';

/**
 * Bucket and key of an s3:// URI
 */
export interface S3Location {
  bucket: string;
  key: string;
}

/**
 * Check whether a path points at S3 rather than the local filesystem
 */
export function isRemoteUri(path: string): boolean {
  return path.startsWith(S3_SCHEME);
}

/**
 * Split an s3://bucket/key URI into its parts
 */
export function parseS3Uri(uri: string): S3Location {
  if (!isRemoteUri(uri)) {
    throw new Error(`Not an S3 URI: ${uri}`);
  }

  const rest = uri.slice(S3_SCHEME.length);
  const slash = rest.indexOf('/');
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const key = slash === -1 ? '' : rest.slice(slash + 1);

  if (!bucket) {
    throw new Error(`S3 URI has no bucket: ${uri}`);
  }

  return { bucket, key };
}

/**
 * Append a file name to a remote directory URI
 */
export function joinRemotePath(directory: string, fileName: string): string {
  return `${directory.replace(/\/+$/, '')}/${fileName}`;
}
