export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
}

export interface FetchConfig {
  downloadDirectory: string;
  chunkSize: number;
  retry: RetryConfig;
  /** Overall deadline for one download in ms, 0 means none */
  downloadTimeout: number;
  connectTimeout: number;
  /** Longest silence allowed while reading a body, in ms */
  readTimeout: number;
  userAgent: string;
  cacheDirectory: string;
  cacheDisabled: boolean;
  logLevel: string;
  sentryDsn?: string;
}
