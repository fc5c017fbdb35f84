/**
 * Blob inventory over S3 (or any S3-compatible store)
 *
 * Only counts objects; the gap detector never needs their contents.
 */

import { ListObjectsV2Command, S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';

export interface S3Config {
  region: string;
  bucket: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  endpoint?: string; // S3-compatible services (MinIO)
}

export class BlobInventory {
  private client: S3Client;
  private bucket: string;

  constructor(config: S3Config, client?: S3Client) {
    this.bucket = config.bucket;

    const clientConfig: S3ClientConfig = { region: config.region };
    if (config.accessKeyId && config.secretAccessKey) {
      clientConfig.credentials = {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      };
    }
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
      clientConfig.forcePathStyle = true;
    }

    this.client = client ?? new S3Client(clientConfig);
  }

  /**
   * Count objects under a prefix, following continuation tokens. Keys ending
   * in "/" are folder markers and are not counted.
   */
  async countObjects(prefix: string): Promise<number> {
    let count = 0;
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
          MaxKeys: 1000,
        })
      );

      for (const object of response.Contents ?? []) {
        if (object.Key && !object.Key.endsWith('/')) {
          count += 1;
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return count;
  }

  destroy(): void {
    this.client.destroy();
  }
}

export function resolvePrefix(template: string, businessDate: string): string {
  return template.split('{date}').join(businessDate);
}
