/**
 * Speaker Service
 *
 * The four operations the transport layer exposes: submit an enrollment
 * clip, identify a probe clip, list enrolled identities and delete one.
 */

import type {
  EnrolledIdentity,
  EnrollmentProgress,
  EnrollmentStatus,
  IdentificationResult,
  SimilarityMetric,
} from "@shared/schema";
import { EnrollmentAccumulator } from "./accumulator";
import { ValidationError } from "./errors";
import type { EmbeddingExtractor } from "./extractor";
import { IdentificationMatcher } from "./matcher";
import type { EmbeddingRegistry } from "./registry";
import type { AudioTranscoder } from "./transcoder";

export interface SpeakerServiceConfig {
  requiredClips: number;
  similarityThreshold: number;
  similarityMetric: SimilarityMetric;
  targetSampleRate: number;
  targetChannels: number;
}

export interface SpeakerServiceDeps {
  registry: EmbeddingRegistry;
  transcoder: AudioTranscoder;
  extractor: EmbeddingExtractor;
  config: SpeakerServiceConfig;
  now?: () => Date;
}

export interface SpeakerServiceStats {
  enrolledUsers: number;
  requiredClips: number;
  threshold: number;
}

export class SpeakerService {
  readonly registry: EmbeddingRegistry;
  private readonly transcoder: AudioTranscoder;
  private readonly extractor: EmbeddingExtractor;
  private readonly accumulator: EnrollmentAccumulator;
  private readonly matcher: IdentificationMatcher;
  private readonly config: SpeakerServiceConfig;

  constructor(deps: SpeakerServiceDeps) {
    this.registry = deps.registry;
    this.transcoder = deps.transcoder;
    this.extractor = deps.extractor;
    this.config = deps.config;
    this.accumulator = new EnrollmentAccumulator(deps.registry, deps.transcoder, deps.extractor, {
      requiredClips: deps.config.requiredClips,
      targetSampleRate: deps.config.targetSampleRate,
      targetChannels: deps.config.targetChannels,
      now: deps.now,
    });
    this.matcher = new IdentificationMatcher(deps.registry, {
      threshold: deps.config.similarityThreshold,
      metric: deps.config.similarityMetric,
    });
  }

  submitClip(identity: string, slot: number, audio: Buffer): Promise<EnrollmentProgress> {
    return this.accumulator.submitClip(identity, slot, audio);
  }

  resetEnrollment(identity: string): Promise<EnrollmentStatus> {
    return this.accumulator.resetEnrollment(identity);
  }

  importClips(identity: string, clips: Buffer[], migratedFrom: string): Promise<EnrollmentProgress> {
    return this.accumulator.importClips(identity, clips, migratedFrom);
  }

  getProgress(identity: string): Promise<EnrollmentStatus> {
    return this.accumulator.getProgress(identity);
  }

  async identify(audio: Buffer): Promise<IdentificationResult> {
    if (audio.length === 0) {
      throw new ValidationError("Audio clip is empty");
    }
    const canonical = await this.transcoder.transcode(
      audio,
      this.config.targetSampleRate,
      this.config.targetChannels
    );
    const probe = await this.extractor.extract(canonical);
    return this.matcher.identify(probe);
  }

  async listIdentities(): Promise<EnrolledIdentity[]> {
    const records = await this.registry.list();
    return records.map((record) => ({
      identity: record.identity,
      enrolledDate: record.enrolledDate,
      clipsCount: record.clipsCount,
    }));
  }

  deleteIdentity(identity: string): Promise<void> {
    return this.accumulator.remove(identity);
  }

  async stats(): Promise<SpeakerServiceStats> {
    return {
      enrolledUsers: await this.registry.count(),
      requiredClips: this.config.requiredClips,
      threshold: this.config.similarityThreshold,
    };
  }
}
