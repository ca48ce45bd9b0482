/**
 * Error taxonomy for source ingestion.
 * Only TerminalSourceError is ever observed by a circuit breaker.
 */

export class TransientNetworkError extends Error {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientNetworkError';
  }
}

export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
  }
}

export type TerminalReason = 'attempts_exhausted' | 'non_retryable' | 'throttle_ceiling';

export class TerminalSourceError extends Error {
  constructor(
    readonly source: string,
    readonly reason: TerminalReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${source}: ${message}`, options);
    this.name = 'TerminalSourceError';
  }
}

export class CircuitOpenError extends Error {
  constructor(readonly source: string, readonly retryAt: number | null) {
    super(`Circuit breaker OPEN for '${source}', skipping request`);
    this.name = 'CircuitOpenError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, readonly problems: string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export class ScanCancelledError extends Error {
  constructor(message = 'Scan deadline reached') {
    super(message);
    this.name = 'ScanCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
