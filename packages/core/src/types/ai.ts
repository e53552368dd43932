/**
 * Optional request knobs forwarded to a custom handler.
 */
export interface AiRequestContext {
  /** Upper bound on tokens for the response (provider-specific). */
  maxTokens?: number;

  /** Sampling temperature (provider-specific). */
  temperature?: number;
}

/**
 * Normalized AI response shape used across providers.
 *
 * `content` is the model's text output. `usage` is optional and provider-dependent.
 */
export interface AiResponse {
  /** Model output text. */
  content: string;

  /** Token accounting when the provider returns it. */
  usage?: {
    /** Prompt/input tokens consumed. */
    promptTokens: number;

    /** Completion/output tokens consumed. */
    completionTokens: number;
  };
}

/**
 * Provider-agnostic interface for calling an LLM.
 *
 * This allows plugging in any recommendation backend without changing the
 * audit pipeline.
 */
export interface AiHandler {
  (prompt: string, context?: AiRequestContext): Promise<AiResponse>;
}
