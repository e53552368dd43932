/**
 * Base error type for failures coming from provider adapters.
 *
 * Lets callers tell "provider problems" apart from snapshot, link or rule
 * errors.
 */
export class AIProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AIProviderError';
  }
}

/**
 * Thrown when a provider request exceeds the configured timeout.
 */
export class AIProviderTimeoutError extends AIProviderError {
  constructor(timeoutMs: number) {
    super(`AI provider request timed out after ${timeoutMs}ms`);
    this.name = 'AIProviderTimeoutError';
  }
}

/**
 * Thrown when the provider replied with text that holds no recommendation list.
 */
export class AIProviderParseError extends AIProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AIProviderParseError';
  }
}
