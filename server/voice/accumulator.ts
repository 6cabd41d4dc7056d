/**
 * Enrollment Accumulator
 *
 * Collects REQUIRED_CLIPS canonical clips per identity and, once every slot
 * is filled, extracts each clip, averages the embeddings and commits a single
 * fingerprint to the registry.
 *
 * State per identity: NEW -> COLLECTING(k of N) -> COMPLETE. An identity with
 * a registry entry and no open session is COMPLETE and refuses new clips
 * until reset() opens a fresh session. The previous fingerprint keeps
 * matching until the new enrollment commits over it.
 */

import {
  UNKNOWN_SPEAKER,
  type EnrollmentProgress,
  type EnrollmentStatus,
  type SlotFailure,
} from "@shared/schema";
import {
  AlreadyEnrolledError,
  ExtractionError,
  InsufficientDataError,
  TranscodeError,
  ValidationError,
} from "./errors";
import type { EmbeddingExtractor } from "./extractor";
import { KeyedMutex } from "./keyedMutex";
import type { EmbeddingRegistry } from "./registry";
import type { AudioTranscoder } from "./transcoder";
import { isFiniteVector, meanVector } from "./vectors";

export interface AccumulatorOptions {
  requiredClips: number;
  targetSampleRate: number;
  targetChannels: number;
  now?: () => Date;
}

interface EnrollmentSession {
  slots: Array<Buffer | undefined>;
}

export function normalizeIdentity(identity: string): string {
  const normalized = identity.trim().toLowerCase();
  if (!normalized) {
    throw new ValidationError("Username is required");
  }
  if (normalized === UNKNOWN_SPEAKER) {
    throw new ValidationError(`"${UNKNOWN_SPEAKER}" is reserved and cannot be enrolled`);
  }
  return normalized;
}

export class EnrollmentAccumulator {
  private sessions: Map<string, EnrollmentSession> = new Map();
  private locks = new KeyedMutex();
  private readonly now: () => Date;

  constructor(
    private readonly registry: EmbeddingRegistry,
    private readonly transcoder: AudioTranscoder,
    private readonly extractor: EmbeddingExtractor,
    private readonly options: AccumulatorOptions
  ) {
    if (!Number.isInteger(options.requiredClips) || options.requiredClips < 1) {
      throw new RangeError("requiredClips must be a positive integer");
    }
    this.now = options.now ?? (() => new Date());
  }

  private assertSlot(slotIndex: number): void {
    if (!Number.isInteger(slotIndex) || slotIndex < 1 || slotIndex > this.options.requiredClips) {
      throw new ValidationError(`clip_number must be between 1 and ${this.options.requiredClips}`);
    }
  }

  private emptySession(): EnrollmentSession {
    return { slots: new Array<Buffer | undefined>(this.options.requiredClips).fill(undefined) };
  }

  private filledSlots(session: EnrollmentSession): number[] {
    const filled: number[] = [];
    session.slots.forEach((clip, index) => {
      if (clip) filled.push(index + 1);
    });
    return filled;
  }

  /**
   * Store one clip. Commits the fingerprint when this clip fills the last slot.
   */
  async submitClip(identity: string, slotIndex: number, rawAudio: Buffer): Promise<EnrollmentProgress> {
    const key = normalizeIdentity(identity);
    this.assertSlot(slotIndex);
    if (rawAudio.length === 0) {
      throw new ValidationError("Audio clip is empty");
    }

    // Refuse completed identities before paying for a transcode; re-checked under the lock.
    if (!this.sessions.has(key) && (await this.registry.has(key))) {
      throw new AlreadyEnrolledError(key);
    }

    // Transcoding runs outside the identity lock; only fill -> check -> commit is serialized.
    const canonical = await this.transcoder.transcode(
      rawAudio,
      this.options.targetSampleRate,
      this.options.targetChannels
    );

    return this.locks.runExclusive(key, async () => {
      let session = this.sessions.get(key);
      if (!session) {
        if (await this.registry.has(key)) {
          throw new AlreadyEnrolledError(key);
        }
        session = this.emptySession();
        this.sessions.set(key, session);
      }

      session.slots[slotIndex - 1] = canonical;

      const clipsReceived = this.filledSlots(session).length;
      if (clipsReceived < this.options.requiredClips) {
        return {
          identity: key,
          clipsReceived,
          requiredClips: this.options.requiredClips,
          enrollmentComplete: false,
        };
      }

      return this.commit(key, session);
    });
  }

  /**
   * Extract every clip; failures are collected per slot instead of aborting.
   */
  private async extractAll(clips: Array<[number, Buffer]>): Promise<{ vectors: number[][]; failedSlots: SlotFailure[] }> {
    const vectors: number[][] = [];
    const failedSlots: SlotFailure[] = [];

    for (const [slot, clip] of clips) {
      let vector: number[];
      try {
        vector = await this.extractor.extract(clip);
      } catch (error) {
        if (error instanceof ExtractionError) {
          failedSlots.push({ slot, reason: error.message });
          continue;
        }
        throw error;
      }

      if (!isFiniteVector(vector)) {
        failedSlots.push({ slot, reason: "Embedding contains non-finite values" });
        continue;
      }
      if (vectors.length > 0 && vector.length !== vectors[0].length) {
        failedSlots.push({
          slot,
          reason: `Embedding dimension ${vector.length} does not match ${vectors[0].length}`,
        });
        continue;
      }
      vectors.push(vector);
    }

    return { vectors, failedSlots };
  }

  private async commit(identity: string, session: EnrollmentSession): Promise<EnrollmentProgress> {
    const clips: Array<[number, Buffer]> = [];
    session.slots.forEach((clip, index) => {
      if (clip) clips.push([index + 1, clip]);
    });

    const { vectors, failedSlots } = await this.extractAll(clips);
    if (vectors.length === 0) {
      // Slots stay in place so the caller can resubmit the failing clips.
      throw new InsufficientDataError(identity, failedSlots);
    }

    await this.registry.put(identity, meanVector(vectors), {
      enrolledDate: this.now().toISOString(),
      clipsCount: vectors.length,
    });

    this.sessions.delete(identity);

    return {
      identity,
      clipsReceived: this.options.requiredClips,
      requiredClips: this.options.requiredClips,
      enrollmentComplete: true,
      clipsCount: vectors.length,
      failedSlots,
    };
  }

  /**
   * Enroll from an existing batch of clips in one step, replacing any
   * committed voiceprint. Used by bulk migration; `migratedFrom` names the
   * source the clips came from.
   */
  async importClips(identity: string, rawClips: Buffer[], migratedFrom: string): Promise<EnrollmentProgress> {
    const key = normalizeIdentity(identity);
    if (rawClips.length === 0 || rawClips.length > this.options.requiredClips) {
      throw new ValidationError(`Between 1 and ${this.options.requiredClips} clips are required`);
    }

    const clips: Array<[number, Buffer]> = [];
    const transcodeFailures: SlotFailure[] = [];
    for (let index = 0; index < rawClips.length; index++) {
      try {
        clips.push([
          index + 1,
          await this.transcoder.transcode(rawClips[index], this.options.targetSampleRate, this.options.targetChannels),
        ]);
      } catch (error) {
        if (!(error instanceof TranscodeError)) throw error;
        transcodeFailures.push({ slot: index + 1, reason: error.message });
      }
    }

    return this.locks.runExclusive(key, async () => {
      const { vectors, failedSlots } = await this.extractAll(clips);
      const allFailures = [...transcodeFailures, ...failedSlots].sort((a, b) => a.slot - b.slot);
      if (vectors.length === 0) {
        throw new InsufficientDataError(key, allFailures);
      }

      await this.registry.put(key, meanVector(vectors), {
        enrolledDate: this.now().toISOString(),
        clipsCount: vectors.length,
        migratedFrom,
      });
      this.sessions.delete(key);

      return {
        identity: key,
        clipsReceived: rawClips.length,
        requiredClips: this.options.requiredClips,
        enrollmentComplete: true,
        clipsCount: vectors.length,
        failedSlots: allFailures,
      };
    });
  }

  /**
   * Open a fresh COLLECTING session, discarding any clips already held.
   */
  async resetEnrollment(identity: string): Promise<EnrollmentStatus> {
    const key = normalizeIdentity(identity);
    return this.locks.runExclusive(key, async () => {
      this.sessions.set(key, this.emptySession());
      return this.describe(key);
    });
  }

  async getProgress(identity: string): Promise<EnrollmentStatus> {
    const key = normalizeIdentity(identity);
    return this.describe(key);
  }

  /**
   * Remove the committed voiceprint and any in-flight clips for an identity.
   * Throws NotFoundError when nothing is enrolled under that key.
   */
  async remove(identity: string): Promise<void> {
    const key = normalizeIdentity(identity);
    await this.locks.runExclusive(key, async () => {
      await this.registry.delete(key);
      this.sessions.delete(key);
    });
  }

  private async describe(identity: string): Promise<EnrollmentStatus> {
    const session = this.sessions.get(identity);
    if (session) {
      const filledSlots = this.filledSlots(session);
      return {
        identity,
        state: "collecting",
        filledSlots,
        clipsReceived: filledSlots.length,
        requiredClips: this.options.requiredClips,
      };
    }

    const enrolled = await this.registry.has(identity);
    return {
      identity,
      state: enrolled ? "complete" : "new",
      filledSlots: [],
      clipsReceived: 0,
      requiredClips: this.options.requiredClips,
    };
  }
}
