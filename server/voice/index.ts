/**
 * Voiceprint Pipeline - Main Entry Point
 *
 * Builds the speaker service (registry, transcoder, extractor) from the
 * validated environment.
 */

import type { Env } from "../src/config/env";
import { HttpEmbeddingExtractor } from "./extractor";
import { createRegistry } from "./registry";
import { SpeakerService } from "./speakerService";
import { FfmpegTranscoder } from "./transcoder";

export { EnrollmentAccumulator, normalizeIdentity } from "./accumulator";
export * from "./errors";
export { HttpEmbeddingExtractor, type EmbeddingExtractor } from "./extractor";
export { IdentificationMatcher } from "./matcher";
export { createRegistry, type EmbeddingRegistry } from "./registry";
export { SpeakerService, type SpeakerServiceConfig, type SpeakerServiceStats } from "./speakerService";
export { FfmpegTranscoder, type AudioTranscoder } from "./transcoder";

export const TARGET_CHANNELS = 1;

export function createSpeakerServiceFromEnv(env: Env, embedderUrl: string): SpeakerService {
  return new SpeakerService({
    registry: createRegistry({
      backend: env.REGISTRY_BACKEND,
      sqlitePath: env.REGISTRY_PATH,
      directory: env.REGISTRY_DIR,
    }),
    transcoder: new FfmpegTranscoder({
      ffmpegPath: env.FFMPEG_PATH,
      timeoutMs: env.FFMPEG_TIMEOUT_MS,
    }),
    extractor: new HttpEmbeddingExtractor({
      url: embedderUrl,
      timeoutMs: env.EMBEDDER_TIMEOUT_MS,
    }),
    config: {
      requiredClips: env.REQUIRED_CLIPS,
      similarityThreshold: env.SIMILARITY_THRESHOLD,
      similarityMetric: env.SIMILARITY_METRIC,
      targetSampleRate: env.TARGET_SAMPLE_RATE,
      targetChannels: TARGET_CHANNELS,
    },
  });
}
