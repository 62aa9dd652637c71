// Pure types for the functional core

/**
 * HTTP error classification
 */
export interface ErrorClassification {
  shouldRetry: boolean;
  type: 'server' | 'client' | 'timeout' | 'network' | 'unknown';
}

export interface FetchInit {
  headers: Record<string, string>;
  method: 'GET';
  signal: AbortSignal;
}

/**
 * The part of a fetch Response the client reads
 */
export interface FetchResponse {
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: (url: string, init: FetchInit) => Promise<FetchResponse>;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
}
