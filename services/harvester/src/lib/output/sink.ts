import { writeFile } from 'node:fs/promises';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { ConfigError } from '../../errors.js';
import type { Logger } from '../../logger.js';

export interface ObjectStore {
  put(bucket: string, key: string, body: string, contentType: string): Promise<void>;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(opts: { client?: S3Client; region?: string } = {}) {
    this.client = opts.client ?? new S3Client(opts.region ? { region: opts.region } : {});
  }

  async put(bucket: string, key: string, body: string, contentType: string): Promise<void> {
    await this.client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType }));
  }
}

export function parseS3Url(target: string): { bucket: string; key: string } | undefined {
  const m = /^s3:\/\/([^/]+)\/(.+)$/.exec(target);
  if (!m) {
    if (target.startsWith('s3://')) throw new ConfigError(`expected s3://bucket/key, got ${target}`);
    return undefined;
  }
  return { bucket: m[1], key: m[2] };
}

export interface SinkOptions {
  contentType: string;
  store?: () => ObjectStore;
  stdout?: (chunk: string) => void;
  logger?: Logger;
}

/** Writes to stdout for `-`, to object storage for `s3://bucket/key`, else to a local file. */
export async function writeOutput(target: string, content: string, opts: SinkOptions): Promise<void> {
  if (target === '-') {
    (opts.stdout ?? ((s: string) => process.stdout.write(s)))(content);
    return;
  }
  const s3 = parseS3Url(target);
  if (s3) {
    const store = opts.store ? opts.store() : new S3ObjectStore();
    opts.logger?.info({ msg: 'writing output to object storage', bucket: s3.bucket, key: s3.key });
    await store.put(s3.bucket, s3.key, content, opts.contentType);
    return;
  }
  opts.logger?.info({ msg: 'writing output to file', path: target });
  await writeFile(target, content, 'utf8');
}
