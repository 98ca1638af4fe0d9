/**
 * Base API Client
 * ===============
 * Axios wrapper shared by hub clients: instance setup, request timing,
 * debug logging and translation of transport failures into typed errors.
 *
 * No retry layer: a failed request surfaces once.
 */

import { Readable } from 'stream';
import axios, { isAxiosError } from 'axios';
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { createLogger } from '@model-bootstrap/utils';
import { toHubError } from './errors.js';

const logger = createLogger('hub-client');

/**
 * Base API client configuration
 */
export interface BaseApiClientConfig {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  apiName?: string;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

type TimedRequestConfig = AxiosRequestConfig & { _startTime?: number };

export class BaseApiClient {
  protected axiosInstance: AxiosInstance;
  protected apiName: string;

  constructor(config: BaseApiClientConfig) {
    this.apiName = config.apiName || 'API';

    this.axiosInstance =
      config.axiosInstance ??
      axios.create({
        baseURL: config.baseURL,
        timeout: config.timeout || 30000,
        headers: {
          'User-Agent': 'model-bootstrap/1.0',
          ...config.headers,
        },
      });

    this.axiosInstance.interceptors.request.use(
      (requestConfig) => {
        (requestConfig as TimedRequestConfig)._startTime = Date.now();
        logger.debug('Hub request', {
          apiName: this.apiName,
          method: requestConfig.method?.toUpperCase(),
          url: requestConfig.url,
        });
        return requestConfig;
      },
      (error: unknown) => Promise.reject(error)
    );
  }

  /**
   * Make a request, mapping any failure to NotFound/Unauthorized/TransferFailed
   */
  protected async request<T = unknown>(
    config: AxiosRequestConfig,
    resource?: string
  ): Promise<AxiosResponse<T>> {
    try {
      const response = await this.axiosInstance.request<T>(config);
      const startTime = (response.config as TimedRequestConfig | undefined)?._startTime;
      logger.debug('Hub response', {
        apiName: this.apiName,
        url: config.url,
        status: response.status,
        latencyMs: startTime ? Date.now() - startTime : undefined,
      });
      return response;
    } catch (error) {
      // A streamed error response is never read; release its socket
      if (isAxiosError(error) && error.response?.data instanceof Readable) {
        error.response.data.destroy();
      }
      throw toHubError(error, resource ?? config.url ?? 'unknown');
    }
  }

  async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.request<T>({ ...config, method: 'GET', url });
    return response.data;
  }
}
