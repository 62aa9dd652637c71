// Pure HTTP utility functions

import type { ErrorClassification } from './types.js';

/**
 * Build URL from base URL and endpoint
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  // Empty endpoint targets the base URL itself (rate documents often live there)
  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Sanitize URL for logging (redact credential-like query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'access_key', 'app_id', 'secret'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Classify a failed attempt for the retry loop.
 * Only transport failures are retried; an HTTP status is an answer.
 */
export const classifyHttpError = (status: number | undefined, timedOut = false): ErrorClassification => {
  if (timedOut) {
    return { shouldRetry: true, type: 'timeout' };
  }

  if (status === undefined) {
    return { shouldRetry: true, type: 'network' };
  }

  if (status >= 500 && status < 600) {
    return { shouldRetry: false, type: 'server' };
  }

  if (status >= 400 && status < 500) {
    return { shouldRetry: false, type: 'client' };
  }

  return { shouldRetry: false, type: 'unknown' };
};

/**
 * Calculate exponential backoff delay
 */
export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelayMs);
};
