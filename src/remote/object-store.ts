/**
 * Object Store
 *
 * Read access to descriptor and provider files kept in S3.
 */

import {
  S3Client,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { RemoteFetchError } from '../errors';
import { parseS3Uri } from './s3-uri';
import { withFetchTimeout } from './with-timeout';

/**
 * Read-only view of a remote object store
 */
export interface ObjectStore {
  /**
   * Read an object as UTF-8 text, or null when it does not exist
   */
  readText(uri: string): Promise<string | null>;

  /**
   * List the file stems directly under a directory URI that end with the extension
   */
  listNames(directoryUri: string, extension: string): Promise<string[]>;
}

export interface S3ObjectStoreOptions {
  client?: S3Client;
  region?: string;
  timeoutMs: number;
}

function isMissingObject(error: unknown): boolean {
  if (error instanceof NoSuchKey) {
    return true;
  }
  return error instanceof S3ServiceException
    && (error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404);
}

/**
 * ObjectStore backed by the AWS SDK S3 client
 */
export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly timeoutMs: number;

  constructor(options: S3ObjectStoreOptions) {
    this.client = options.client ?? new S3Client(options.region ? { region: options.region } : {});
    this.timeoutMs = options.timeoutMs;
  }

  async readText(uri: string): Promise<string | null> {
    const { bucket, key } = parseS3Uri(uri);

    try {
      // The body is streamed, so reading it stays inside the time budget
      return await withFetchTimeout(uri, this.timeoutMs, async signal => {
        const response = await this.client.send(
          new GetObjectCommand({ Bucket: bucket, Key: key }),
          { abortSignal: signal },
        );
        return response.Body ? response.Body.transformToString('utf-8') : '';
      });
    } catch (error) {
      if (isMissingObject(error)) {
        return null;
      }
      if (error instanceof RemoteFetchError) {
        throw error;
      }
      throw RemoteFetchError.from(uri, error);
    }
  }

  async listNames(directoryUri: string, extension: string): Promise<string[]> {
    const { bucket, key } = parseS3Uri(directoryUri);
    const prefix = key === '' || key.endsWith('/') ? key : `${key}/`;
    const names: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page = await withFetchTimeout(directoryUri, this.timeoutMs, signal =>
          this.client.send(
            new ListObjectsV2Command({
              Bucket: bucket,
              Prefix: prefix,
              Delimiter: '/',
              ContinuationToken: continuationToken,
            }),
            { abortSignal: signal },
          ),
        );

        for (const object of page.Contents ?? []) {
          const objectKey = object.Key;
          if (objectKey && objectKey.endsWith(extension)) {
            names.push(objectKey.slice(prefix.length, -extension.length));
          }
        }

        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      if (error instanceof RemoteFetchError) {
        throw error;
      }
      throw RemoteFetchError.from(directoryUri, error);
    }

    return names.filter(name => name.length > 0);
  }
}
