import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosRequestConfig, Method } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../../utils/logger.js';

const REQUEST_ID_HEADER = 'X-Request-ID';
const RETRYABLE_STATUS = [429, 502, 503, 504];

export interface OpenSearchCoreOptions {
  baseURL: string;
  apiKey?: string;
  username?: string;
  password?: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  /** Replaces the HTTP transport; tests pass an in-process stub */
  adapter?: AxiosAdapter;
}

/**
 * Request failure with the cluster's reason attached
 */
export class OpenSearchRequestError extends Error {
  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'OpenSearchRequestError';
  }
}

function errorReason(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('error' in data)) {
    return undefined;
  }
  const error = data.error;
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'reason' in error && typeof error.reason === 'string') {
    return error.reason;
  }
  return undefined;
}

/**
 * HTTP plumbing shared by the OpenSearch sources: auth, request ids and
 * linear-backoff retries on throttling and gateway errors.
 */
export class OpenSearchCore {
  protected client: AxiosInstance;
  protected openSearchOptions: OpenSearchCoreOptions;
  private readonly retryCounts = new Map<string, number>();

  constructor(options: OpenSearchCoreOptions) {
    this.openSearchOptions = options;

    const axiosConfig: AxiosRequestConfig = {
      baseURL: options.baseURL,
      timeout: options.timeout ?? 30000,
      headers: {
        'Content-Type': 'application/json'
      }
    };

    if (options.adapter) {
      axiosConfig.adapter = options.adapter;
    }

    // Set up authentication
    if (options.apiKey) {
      axiosConfig.headers = {
        ...axiosConfig.headers,
        'Authorization': `ApiKey ${options.apiKey}`
      };
    } else if (options.username && options.password) {
      axiosConfig.auth = {
        username: options.username,
        password: options.password
      };
    }

    this.client = axios.create(axiosConfig);

    this.client.interceptors.request.use(config => {
      // Retries keep the id of the original request
      if (!config.headers.has(REQUEST_ID_HEADER)) {
        config.headers.set(REQUEST_ID_HEADER, uuidv4());
      }

      logger.debug('Making OpenSearch request', {
        requestId: config.headers.get(REQUEST_ID_HEADER),
        method: config.method,
        url: config.url,
        baseURL: config.baseURL
      });

      return config;
    });

    this.client.interceptors.response.use(
      response => {
        const requestId = String(response.config.headers.get(REQUEST_ID_HEADER));
        this.retryCounts.delete(requestId);
        logger.debug('OpenSearch response received', {
          requestId,
          status: response.status,
          url: response.config.url
        });
        return response;
      },
      async (error: AxiosError) => {
        const requestConfig = error.config;
        if (!requestConfig) {
          return Promise.reject(error);
        }

        const requestId = String(requestConfig.headers.get(REQUEST_ID_HEADER));
        const retryCount = this.retryCounts.get(requestId) ?? 0;
        const maxRetries = this.openSearchOptions.maxRetries ?? 3;
        const retryDelay = this.openSearchOptions.retryDelay ?? 1000;

        logger.error('OpenSearch request failed', {
          requestId,
          error: error.message,
          status: error.response?.status,
          url: requestConfig.url,
          retryCount
        });

        if (retryCount < maxRetries && error.response && RETRYABLE_STATUS.includes(error.response.status)) {
          this.retryCounts.set(requestId, retryCount + 1);

          logger.info('Retrying OpenSearch request', {
            requestId,
            retryCount: retryCount + 1,
            maxRetries,
            delay: retryDelay * (retryCount + 1)
          });

          await new Promise(resolve => setTimeout(resolve, retryDelay * (retryCount + 1)));
          return this.client.request(requestConfig);
        }

        this.retryCounts.delete(requestId);
        return Promise.reject(error);
      }
    );
  }

  /**
   * Make a request to OpenSearch and return the response body
   * @throws OpenSearchRequestError
   */
  public async callRequest(method: Method, url: string, data?: unknown, config?: AxiosRequestConfig): Promise<unknown> {
    try {
      const response = await this.client.request<unknown>({
        method,
        url,
        data,
        ...config
      });

      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const reason = errorReason(error.response?.data) ?? error.message;
        logger.error('OpenSearch request error', {
          method,
          url,
          status: error.response?.status,
          statusText: error.response?.statusText,
          error: reason
        });

        throw new OpenSearchRequestError(reason, method, url, error.response?.status);
      }

      throw error;
    }
  }

  /**
   * Check if OpenSearch is available
   */
  public async checkConnection(): Promise<boolean> {
    try {
      await this.callRequest('GET', '/_cluster/health');
      return true;
    } catch (error) {
      logger.error('OpenSearch connection check failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }
}
