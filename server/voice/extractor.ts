/**
 * Speaker embedding: turn canonical 16kHz mono WAV into a voiceprint vector.
 *
 * The model runs out of process. HttpEmbeddingExtractor POSTs the WAV bytes
 * to EMBEDDER_URL and expects `{ "embedding": number[] }` back.
 */

import { z } from "zod";
import {
  CircuitOpenError,
  HttpStatusError,
  embedderBreaker,
  isRetryableError,
  withReliability,
  type CircuitBreaker,
  type RetryConfig,
} from "../../lib/reliability";
import { ExtractionError } from "./errors";

export interface EmbeddingExtractor {
  /** Rejects with ExtractionError when no embedding can be produced. */
  extract(canonicalAudio: Buffer): Promise<number[]>;
}

const embedderResponseSchema = z.object({
  embedding: z.array(z.number().finite()).min(1),
});

export interface HttpExtractorOptions {
  url: string;
  timeoutMs: number;
  breaker?: CircuitBreaker;
  retry?: Partial<RetryConfig>;
}

export class HttpEmbeddingExtractor implements EmbeddingExtractor {
  private readonly breaker: CircuitBreaker;
  private readonly retry: Partial<RetryConfig>;

  constructor(private readonly options: HttpExtractorOptions) {
    this.breaker = options.breaker ?? embedderBreaker;
    this.retry = { maxRetries: 1, baseDelayMs: 500, maxDelayMs: 5000, ...options.retry };
  }

  get circuit(): CircuitBreaker {
    return this.breaker;
  }

  async extract(canonicalAudio: Buffer): Promise<number[]> {
    try {
      // A rejected clip (4xx, unusable body) says nothing about the embedder's health.
      return await withReliability(
        () => this.request(canonicalAudio),
        this.breaker,
        this.retry,
        isRetryableError
      );
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      if (error instanceof CircuitOpenError) {
        throw new ExtractionError("Embedding service is temporarily unavailable", { cause: error });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(`Embedding request failed: ${reason}`, { cause: error });
    }
  }

  private async request(canonicalAudio: Buffer): Promise<number[]> {
    const response = await fetch(this.options.url, {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream" },
      body: canonicalAudio,
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, `Embedder responded with ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ExtractionError("Embedder returned a non-JSON response", { cause: error });
    }

    const parsed = embedderResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionError("Embedder returned an invalid embedding", { cause: parsed.error });
    }
    return parsed.data.embedding;
  }
}
