import { getLogger, type Logger } from '@fiatledger/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { FetchResponse, HttpEffects } from './core/types.js';
import type { HttpClientConfig, SchemaRequestOptions } from './types.js';
import { HttpError, ResponseValidationError, TimeoutError } from './types.js';

const DEFAULT_RETRIES = 3;
const DEFAULT_TIMEOUT_MS = 10_000;

export class HttpClient {
  private readonly config: HttpClientConfig;
  private readonly retries: number;
  private readonly timeout: number;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private closePromise?: Promise<void>;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'fiatledger/0.1.0',
        ...config.defaultHeaders,
      },
    };
    this.retries = Math.max(1, config.retries ?? DEFAULT_RETRIES);
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${HttpUtils.sanitizeUrl(config.baseUrl)}, Timeout: ${this.timeout}ms, Retries: ${this.retries}`
    );
  }

  /**
   * GET a JSON document, retrying transport failures, and validate it against `options.schema`
   */
  async get<T>(endpoint: string, options: SchemaRequestOptions<T>): Promise<Result<T, Error>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const method = 'GET';
    const timeout = options.timeout ?? this.timeout;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      let response: FetchResponse | undefined;

      try {
        this.effects.log(
          'debug',
          `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Method: ${method}, Attempt: ${attempt}/${this.retries}`
        );

        response = await this.effects.fetch(url, {
          headers: { ...this.config.defaultHeaders, ...options.headers },
          method,
          signal: controller.signal,
        });

        if (!response.ok) {
          const errorText = await response.text().catch(() => 'Unknown error');
          return err(new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText));
        }

        const data = await response.json();
        return this.validate(data, options, endpoint, response.status);
      } catch (error) {
        const timedOut = error instanceof Error && error.name === 'AbortError';
        lastError = timedOut ? new TimeoutError(timeout) : error instanceof Error ? error : new Error(String(error));

        const classification = HttpUtils.classifyHttpError(response?.status, timedOut);
        this.effects.log(
          'warn',
          `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${this.retries}, Error: ${lastError.message}`,
          { method, providerName: this.config.providerName, type: classification.type }
        );

        if (!classification.shouldRetry) {
          return err(lastError);
        }

        if (attempt < this.retries) {
          const delay = HttpUtils.calculateExponentialBackoff(attempt, 1000, 10_000);
          this.effects.log('debug', `Retrying after delay - Delay: ${delay}ms, NextAttempt: ${attempt + 1}`);
          await this.effects.delay(delay);
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    return err(lastError ?? new Error('Request failed with unknown error'));
  }

  /**
   * Close the undici agent so keep-alive sockets do not hold the process open.
   * Idempotent.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.agent.close().then(() => {
        this.logger.debug('HTTP agent closed');
      });
    }
    return this.closePromise;
  }

  private validate<T>(
    data: unknown,
    options: SchemaRequestOptions<T>,
    endpoint: string,
    status: number
  ): Result<T, Error> {
    const parseResult = options.schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const truncatedPayload = JSON.stringify(data).slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      { providerName: this.config.providerName, status, truncatedPayload }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.config.providerName,
        endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }
}
