import { Inject, Injectable, Logger } from '@nestjs/common';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl as getS3SignedUrl } from '@aws-sdk/s3-request-presigner';
import { v4 as uuid } from 'uuid';
import { promises as fs } from 'fs';
import path from 'path';
import { throwIfCancelled } from '../common/abort';
import { APP_CONFIG, AppConfig, S3StorageConfig, StorageConfig } from '../config/app-config';

export interface StoredAudio {
  key: string;
  url: string;
  localPath?: string;
}

export interface AudioUploadOptions {
  extension?: string;
  contentType?: string;
  /** Abandons the upload, leaving nothing behind, once this fires. */
  signal?: AbortSignal;
}

@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);
  private readonly config: StorageConfig;
  private client?: S3Client;

  constructor(@Inject(APP_CONFIG) appConfig: AppConfig) {
    this.config = appConfig.storage;
  }

  /** Absolute directory the local driver writes into and `main.ts` serves. */
  get localDirectory(): string {
    return path.resolve(process.cwd(), this.config.localDir);
  }

  get publicPath(): string {
    return this.config.publicPath;
  }

  async uploadAudio(buffer: Buffer, options: AudioUploadOptions = {}): Promise<StoredAudio> {
    const extension = (options.extension ?? 'mp3').replace(/^\.+/, '');
    const objectKey = `audio/${uuid()}.${extension}`;
    throwIfCancelled(options.signal);

    if (this.config.driver === 'local') {
      const localPath = await this.saveLocalCopy(objectKey, buffer, options.signal);
      return { key: objectKey, url: `${this.config.publicPath}/${objectKey}`, localPath };
    }

    const s3 = this.requireS3Config();
    const client = this.getClient(s3);
    await client.send(
      new PutObjectCommand({
        Bucket: s3.bucket,
        Key: objectKey,
        Body: buffer,
        ContentType: options.contentType ?? 'audio/mpeg',
      }),
      { abortSignal: options.signal },
    );
    this.logger.debug(`Uploaded ${buffer.length} bytes to s3://${s3.bucket}/${objectKey}`);
    const url = await getS3SignedUrl(client, new GetObjectCommand({ Bucket: s3.bucket, Key: objectKey }), {
      expiresIn: s3.urlExpirySeconds,
    });
    return { key: objectKey, url };
  }

  private async saveLocalCopy(objectKey: string, buffer: Buffer, signal?: AbortSignal): Promise<string> {
    const fullPath = path.join(this.localDirectory, objectKey);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    try {
      await fs.writeFile(fullPath, buffer, { signal });
      throwIfCancelled(signal);
    } catch (error) {
      await fs.rm(fullPath, { force: true });
      throw error;
    }
    return fullPath;
  }

  private requireS3Config(): S3StorageConfig {
    if (!this.config.s3) {
      throw new Error('S3 storage selected but S3 settings are missing');
    }
    return this.config.s3;
  }

  private getClient(s3: S3StorageConfig): S3Client {
    if (!this.client) {
      this.client = new S3Client({
        region: s3.region,
        endpoint: s3.endpoint || undefined,
        forcePathStyle: Boolean(s3.endpoint),
        credentials: {
          accessKeyId: s3.accessKeyId,
          secretAccessKey: s3.secretAccessKey,
        },
      });
    }
    return this.client;
  }
}
