/**
 * Artifact storage: S3, local directory or in-memory, behind one interface.
 * Every save records an MD5 checksum and byte size.
 *
 * Keys are relative paths shared by every adapter:
 * - outputs/call_script_{lead_id}.md
 * - runs/{lead_id}/run_record.json
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { mkdir, readFile, readdir, rm, stat, writeFile } from 'fs/promises';
import { dirname, join, relative, resolve, sep } from 'path';
import type { ArtifactMetadata, StorageAdapter } from '../types/index.js';

export type { StorageAdapter };

/**
 * Bucket settings for S3StorageAdapter
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects */
  prefix?: string;
  /** Endpoint override, e.g. a local S3-compatible server */
  endpoint?: string;
  /** Falls back to the SDK's default credential chain when omitted */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Path-style addressing for S3-compatible servers */
  forcePathStyle?: boolean;
}

function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

/**
 * Content type inferred from the key's extension
 */
export function inferContentType(key: string): string {
  if (key.endsWith('.md')) {
    return 'text/markdown';
  }
  if (key.endsWith('.txt')) {
    return 'text/plain';
  }
  return 'application/json';
}

/**
 * Reject empty keys and keys that climb out of the storage root
 */
export function validateKey(key: string): string {
  const normalized = key.replace(/\\/g, '/').replace(/^\/+/, '');
  if (normalized.length === 0) {
    throw new Error('Storage key cannot be empty');
  }
  if (normalized.split('/').some((segment) => segment === '..')) {
    throw new Error(`Invalid storage key: ${key}`);
  }
  return normalized;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

function buildMetadata(key: string, content: string | Buffer, contentType?: string): ArtifactMetadata {
  return {
    key,
    createdAt: new Date().toISOString(),
    contentType: contentType ?? inferContentType(key),
    size: getContentSize(content),
    checksum: calculateChecksum(content),
  };
}

/**
 * Stores run artifacts as S3 objects under an optional key prefix
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3Config) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ? config.prefix.replace(/\/+$/, '') : '';

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  private objectKey(key: string): string {
    const valid = validateKey(key);
    return this.prefix ? `${this.prefix}/${valid}` : valid;
  }

  private storageKey(objectKey: string): string {
    return this.prefix && objectKey.startsWith(`${this.prefix}/`)
      ? objectKey.slice(this.prefix.length + 1)
      : objectKey;
  }

  async save(key: string, content: string | Buffer, metadata?: { contentType?: string }): Promise<ArtifactMetadata> {
    const artifactMetadata = buildMetadata(validateKey(key), content, metadata?.contentType);

    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: this.objectKey(key),
      Body: content,
      ContentType: artifactMetadata.contentType,
      Metadata: {
        'created-at': artifactMetadata.createdAt,
        checksum: artifactMetadata.checksum ?? '',
      },
    });

    await this.client.send(command);
    return artifactMetadata;
  }

  async load(key: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: this.objectKey(key),
    });

    const response = await this.client.send(command);

    if (!response.Body) {
      throw new Error(`Artifact not found: ${key}`);
    }

    const content = await response.Body.transformToString();

    const metadata: ArtifactMetadata = {
      key: validateKey(key),
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? inferContentType(key),
    };

    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }

    if (response.Metadata?.['checksum']) {
      metadata.checksum = response.Metadata['checksum'];
    }

    return { content, metadata };
  }

  async exists(key: string): Promise<boolean> {
    try {
      const command = new HeadObjectCommand({
        Bucket: this.bucket,
        Key: this.objectKey(key),
      });

      await this.client.send(command);
      return true;
    } catch (error: unknown) {
      if (
        error instanceof Error &&
        (error.name === 'NotFound' ||
          error.name === 'NoSuchKey' ||
          error.message.includes('404') ||
          error.message.includes('Not Found'))
      ) {
        return false;
      }
      throw error;
    }
  }

  async list(prefix: string): Promise<ArtifactMetadata[]> {
    const command = new ListObjectsV2Command({
      Bucket: this.bucket,
      Prefix: this.prefix ? `${this.prefix}/${prefix}` : prefix,
    });

    const response = await this.client.send(command);

    if (!response.Contents) {
      return [];
    }

    return response.Contents.map((obj) => {
      const key = this.storageKey(obj.Key ?? '');
      const metadata: ArtifactMetadata = {
        key,
        createdAt: obj.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: inferContentType(key),
      };
      if (obj.Size !== undefined) {
        metadata.size = obj.Size;
      }
      return metadata;
    });
  }

  async delete(key: string): Promise<void> {
    const command = new DeleteObjectCommand({
      Bucket: this.bucket,
      Key: this.objectKey(key),
    });
    await this.client.send(command);
  }
}

/**
 * Local filesystem storage rooted at a directory
 */
export class FileStorageAdapter implements StorageAdapter {
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = resolve(rootDir);
  }

  private pathFor(key: string): string {
    return join(this.root, ...validateKey(key).split('/'));
  }

  async save(key: string, content: string | Buffer, metadata?: { contentType?: string }): Promise<ArtifactMetadata> {
    const filePath = this.pathFor(key);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
    return buildMetadata(validateKey(key), content, metadata?.contentType);
  }

  async load(key: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const filePath = this.pathFor(key);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new Error(`Artifact not found: ${key}`, { cause: error });
    }
    const info = await stat(filePath);
    return {
      content,
      metadata: {
        key: validateKey(key),
        createdAt: info.mtime.toISOString(),
        contentType: inferContentType(key),
        size: info.size,
        checksum: calculateChecksum(content),
      },
    };
  }

  async exists(key: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(key));
      return info.isFile();
    } catch {
      return false;
    }
  }

  async list(prefix: string): Promise<ArtifactMetadata[]> {
    const files = await this.walk(this.root);
    const artifacts: ArtifactMetadata[] = [];
    for (const filePath of files) {
      const key = relative(this.root, filePath).split(sep).join('/');
      if (!key.startsWith(prefix)) {
        continue;
      }
      const info = await stat(filePath);
      artifacts.push({
        key,
        createdAt: info.mtime.toISOString(),
        contentType: inferContentType(key),
        size: info.size,
      });
    }
    return artifacts.sort((a, b) => a.key.localeCompare(b.key));
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  private async walk(dir: string): Promise<string[]> {
    if (!(await isDirectory(dir))) {
      return [];
    }
    const entries = await readdir(dir, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fullPath)));
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
    return files;
  }
}

/**
 * Process-local storage, used by tests and the `memory` STORAGE_TYPE
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string | Buffer; metadata: ArtifactMetadata }> = new Map();

  async save(key: string, content: string | Buffer, metadata?: { contentType?: string }): Promise<ArtifactMetadata> {
    const artifactMetadata = buildMetadata(validateKey(key), content, metadata?.contentType);
    this.store.set(artifactMetadata.key, { content, metadata: artifactMetadata });
    return artifactMetadata;
  }

  async load(key: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const item = this.store.get(validateKey(key));

    if (!item) {
      throw new Error(`Artifact not found: ${key}`);
    }

    return item;
  }

  async exists(key: string): Promise<boolean> {
    return this.store.has(validateKey(key));
  }

  async list(prefix: string): Promise<ArtifactMetadata[]> {
    const artifacts: ArtifactMetadata[] = [];

    for (const [key, value] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        artifacts.push(value.metadata);
      }
    }

    return artifacts;
  }

  async delete(key: string): Promise<void> {
    this.store.delete(validateKey(key));
  }

  /**
   * Drop every stored artifact
   */
  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

export type StorageSettings =
  | ({ type: 's3' } & S3Config)
  | { type: 'file'; rootDir: string }
  | { type: 'memory' };

/**
 * Factory function to create the storage adapter named by configuration
 */
export function createStorageAdapter(settings: StorageSettings): StorageAdapter {
  switch (settings.type) {
    case 'memory':
      return new MemoryStorageAdapter();
    case 'file':
      return new FileStorageAdapter(settings.rootDir);
    case 's3':
      return new S3StorageAdapter(settings);
  }
}
