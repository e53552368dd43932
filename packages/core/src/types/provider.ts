import type { AiResponse } from './ai.js';
import type { Position, Size } from './element.js';

/**
 * Per-element payload sent to the recommendation service.
 */
export interface RecommendationElement {
  text: string;
  type: string;
  position: Position;
  size: Size;
  href: string | null;
}

/**
 * Request sent to an external recommendation service.
 */
export interface RecommendationRequest {
  /** Audited page URL. */
  url: string;

  elements: RecommendationElement[];
}

/**
 * Normalized output from a recommendation service call.
 *
 * `raw` is preserved for debugging and to help improve the list parser.
 */
export interface RecommendationResult {
  /** At most five recommendation strings. */
  recommendations: string[];

  /** Raw provider text output. */
  raw: string;

  /** End-to-end latency for the provider call (including retries). */
  latencyMs: number;

  /** How many attempts were made before success. */
  attempts: number;

  /** Optional provider usage information (token counts), when available. */
  usage?: AiResponse['usage'];
}

/**
 * Provider interface used by the auditing pipeline.
 */
export interface AIProvider {
  recommend(request: RecommendationRequest): Promise<RecommendationResult>;
}
