import axios, {
  AxiosAdapter,
  AxiosInstance,
  AxiosError,
  InternalAxiosRequestConfig,
} from 'axios';
import { logger } from '../../utils/logger';

export interface ClientConfig {
  baseUrl: string;
  timeout?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
}

export interface TextResponse {
  status: number;
  data: string;
}

interface RetryConfig extends InternalAxiosRequestConfig {
  __retryCount?: number;
}

export class HttpClient {
  protected axiosInstance: AxiosInstance;
  protected serviceName: string;
  protected maxRetries: number;
  protected retryBaseDelayMs: number;

  constructor(config: ClientConfig, serviceName: string = 'http') {
    this.serviceName = serviceName;
    this.maxRetries = config.maxRetries ?? 0;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;

    this.axiosInstance = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout || 30000,
      responseType: 'text',
      headers: {
        Accept: 'text/html,application/xhtml+xml',
        ...config.headers,
      },
      ...(config.adapter && { adapter: config.adapter }),
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.axiosInstance.interceptors.request.use((config) => {
      logger.debug(`[${this.serviceName}] ${config.method?.toUpperCase()} ${config.url}`);
      return config;
    });

    // Retry with backoff, only when retries are configured
    this.axiosInstance.interceptors.response.use(
      (response) => response,
      async (error: AxiosError) => {
        const config = error.config as RetryConfig | undefined;

        if (!config) {
          return Promise.reject(error);
        }

        config.__retryCount = config.__retryCount || 0;

        if (config.__retryCount >= this.maxRetries) {
          if (this.maxRetries > 0) {
            logger.error(`[${this.serviceName}] Max retries (${this.maxRetries}) reached for ${config.url}`);
          }
          return Promise.reject(error);
        }

        // Only retry on network errors or 5xx server errors
        const shouldRetry =
          error.code === 'ECONNABORTED' ||
          error.code === 'ETIMEDOUT' ||
          error.code === 'ECONNREFUSED' ||
          error.code === 'ENOTFOUND' ||
          (error.response !== undefined && error.response.status >= 500);

        if (!shouldRetry) {
          return Promise.reject(error);
        }

        config.__retryCount += 1;

        // Exponential backoff: 2, 4, 8 times the base delay
        const delay = Math.pow(2, config.__retryCount) * this.retryBaseDelayMs;

        logger.warn(
          `[${this.serviceName}] Retrying request (${config.__retryCount}/${this.maxRetries}) after ${delay}ms: ${config.url}`
        );

        await new Promise((resolve) => setTimeout(resolve, delay));

        return this.axiosInstance(config);
      }
    );
  }

  /**
   * GET returning the raw body. Non-2xx statuses reject with an AxiosError.
   */
  async getText(url: string): Promise<TextResponse> {
    const response = await this.axiosInstance.get<string>(url);
    const data = typeof response.data === 'string' ? response.data : String(response.data ?? '');
    return { status: response.status, data };
  }
}
