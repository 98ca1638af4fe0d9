/**
 * Model hub client
 * ================
 * Talks to a Hugging Face compatible hub: token check and
 * download-by-repository-and-path into a local cache.
 */

import { createWriteStream } from 'fs';
import { mkdir, rename, rm } from 'fs/promises';
import * as path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  DEFAULT_HUB_ENDPOINT,
  DEFAULT_REQUEST_TIMEOUT_MS,
  TransferFailedError,
  createLogger,
} from '@model-bootstrap/utils';
import { BaseApiClient } from './base-client.js';
import { INCOMPLETE_SUFFIX, cachePathFor, findCachedFile } from './cache.js';
import { toHubError } from './errors.js';

const logger = createLogger('hub-client');

export const DEFAULT_REVISION = 'main';

export interface HubClientConfig {
  endpoint?: string;
  /** Bearer token; omitted from requests when undefined */
  token?: string;
  cacheDir: string;
  revision?: string;
  timeout?: number;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

export interface DownloadProgress {
  receivedBytes: number;
  /** From Content-Length; undefined when the hub does not send one */
  totalBytes?: number;
}

export interface DownloadOptions {
  /** Overrides the client's configured token for this download */
  token?: string;
  onProgress?: (progress: DownloadProgress) => void;
}

const whoAmISchema = z
  .object({
    name: z.string(),
    fullname: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

export type WhoAmI = z.infer<typeof whoAmISchema>;

/**
 * The subset of the hub the fetcher depends on
 */
export interface ModelHub {
  whoAmI(token?: string): Promise<WhoAmI>;
  downloadToCache(sourceId: string, sourcePath: string, options?: DownloadOptions): Promise<string>;
}

export class HubClient extends BaseApiClient implements ModelHub {
  private readonly endpoint: string;
  private readonly token?: string;
  private readonly cacheDir: string;
  private readonly revision: string;

  constructor(config: HubClientConfig) {
    const endpoint = (config.endpoint ?? DEFAULT_HUB_ENDPOINT).replace(/\/+$/, '');

    super({
      baseURL: endpoint,
      apiName: 'HuggingFaceHub',
      timeout: config.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS,
      axiosInstance: config.axiosInstance,
    });

    this.endpoint = endpoint;
    this.token = config.token;
    this.cacheDir = config.cacheDir;
    this.revision = config.revision ?? DEFAULT_REVISION;
  }

  /**
   * Direct download URL of a file in a repository
   */
  resolveUrl(sourceId: string, sourcePath: string, revision: string = this.revision): string {
    const encodedPath = sourcePath
      .split('/')
      .filter((segment) => segment.length > 0)
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    return `${this.endpoint}/${sourceId}/resolve/${encodeURIComponent(revision)}/${encodedPath}`;
  }

  cachePath(sourceId: string, sourcePath: string): string {
    return cachePathFor(this.cacheDir, sourceId, sourcePath, this.revision);
  }

  /**
   * Identify the token owner; used to validate the credential up front
   */
  async whoAmI(token?: string): Promise<WhoAmI> {
    const data = await this.get<unknown>('/api/whoami-v2', {
      headers: this.authHeaders(token),
    });

    const parsed = whoAmISchema.safeParse(data);
    if (!parsed.success) {
      throw new TransferFailedError('Unexpected whoami response from hub', parsed.error);
    }
    return parsed.data;
  }

  /**
   * Ensure the file is in the local cache and return its path.
   * A cached copy is reused without contacting the hub.
   */
  async downloadToCache(
    sourceId: string,
    sourcePath: string,
    options: DownloadOptions = {}
  ): Promise<string> {
    const resource = `${sourceId}/${sourcePath}`;
    const cached = await findCachedFile(this.cacheDir, sourceId, sourcePath, this.revision);
    if (cached !== undefined) {
      logger.debug('Cache hit', { sourceId, sourcePath, cached });
      return cached;
    }

    const target = this.cachePath(sourceId, sourcePath);

    await mkdir(path.dirname(target), { recursive: true });
    const incomplete = `${target}${INCOMPLETE_SUFFIX}`;

    try {
      const response = await this.request<unknown>(
        {
          method: 'GET',
          url: this.resolveUrl(sourceId, sourcePath),
          headers: this.authHeaders(options.token),
          responseType: 'stream',
        },
        resource
      );

      const body = response.data;
      if (!(body instanceof Readable)) {
        throw new TransferFailedError(`Hub returned no body for ${resource}`);
      }

      const contentLength = Number(response.headers['content-length']);
      const totalBytes = Number.isFinite(contentLength) && contentLength > 0 ? contentLength : undefined;
      let receivedBytes = 0;

      const counter = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          receivedBytes += chunk.length;
          options.onProgress?.({ receivedBytes, totalBytes });
          callback(null, chunk);
        },
      });

      await pipeline(body, counter, createWriteStream(incomplete));
      await rename(incomplete, target);

      logger.info('Downloaded to cache', { sourceId, sourcePath, bytes: receivedBytes });
      return target;
    } catch (error) {
      await rm(incomplete, { force: true });
      throw toHubError(error, resource);
    }
  }

  private authHeaders(token: string | undefined = this.token): Record<string, string> {
    return token ? { Authorization: `Bearer ${token}` } : {};
  }
}
