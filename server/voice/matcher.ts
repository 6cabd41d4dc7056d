import {
  UNKNOWN_SPEAKER,
  type IdentificationResult,
  type SimilarityMetric,
} from "@shared/schema";
import { ValidationError } from "./errors";
import type { EmbeddingRegistry } from "./registry";
import { cosineSimilarity, dotProduct, isFiniteVector } from "./vectors";

export interface MatcherOptions {
  threshold: number;
  /**
   * `dot` assumes the extractor emits unit-length vectors. `cosine` divides
   * by both magnitudes, for extractors that do not normalize.
   */
  metric: SimilarityMetric;
}

/**
 * Scores a probe fingerprint against every enrolled identity. Read-only.
 */
export class IdentificationMatcher {
  constructor(
    private readonly registry: EmbeddingRegistry,
    private readonly options: MatcherOptions
  ) {}

  async identify(probe: readonly number[]): Promise<IdentificationResult> {
    if (!isFiniteVector(probe)) {
      throw new ValidationError("Probe fingerprint must be a non-empty vector of finite numbers");
    }

    const threshold = this.options.threshold;
    const entries = await this.registry.list();

    if (entries.length === 0) {
      return {
        prediction: UNKNOWN_SPEAKER,
        confidence: 0,
        threshold,
        allScores: {},
        message: "No enrolled users in system",
      };
    }

    const score = this.options.metric === "cosine" ? cosineSimilarity : dotProduct;
    const scores: Array<[string, number]> = [];
    let best: { identity: string; score: number } | null = null;

    // list() order is deterministic; strict ">" keeps the earliest identity on ties
    for (const entry of entries) {
      if (entry.fingerprint.length !== probe.length) continue;
      const similarity = score(probe, entry.fingerprint);
      scores.push([entry.identity, similarity]);
      if (best === null || similarity > best.score) {
        best = { identity: entry.identity, score: similarity };
      }
    }

    const allScores = Object.fromEntries(scores);

    if (best === null) {
      return {
        prediction: UNKNOWN_SPEAKER,
        confidence: 0,
        threshold,
        allScores,
        message: "No enrolled fingerprint has the probe's dimension",
      };
    }

    if (best.score >= threshold) {
      return {
        prediction: best.identity,
        confidence: best.score,
        threshold,
        allScores,
        message: `Matched with ${best.identity}`,
      };
    }

    return {
      prediction: UNKNOWN_SPEAKER,
      confidence: best.score,
      threshold,
      allScores,
      message: "No match found above threshold",
    };
  }
}
