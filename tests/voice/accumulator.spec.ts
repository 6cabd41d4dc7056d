import { beforeEach, describe, expect, it } from 'vitest';
import type { EnrollmentProgress } from '@shared/schema';
import { EnrollmentAccumulator, normalizeIdentity } from '../../server/voice/accumulator';
import {
  AlreadyEnrolledError,
  InsufficientDataError,
  NotFoundError,
  StorageError,
  TranscodeError,
  ValidationError,
} from '../../server/voice/errors';
import {
  FAILING_CLIP,
  FakeExtractor,
  FakeTranscoder,
  InMemoryRegistry,
  UNTRANSCODABLE_CLIP,
  clip,
} from './fakes';

const NOW = new Date('2026-03-01T10:00:00.000Z');

describe('normalizeIdentity', () => {
  it('trims and lowercases', () => {
    expect(normalizeIdentity('  Alice ')).toBe('alice');
  });

  it('rejects blank and reserved identities', () => {
    expect(() => normalizeIdentity('   ')).toThrow('Username is required');
    expect(() => normalizeIdentity('Unknown')).toThrow(ValidationError);
  });
});

describe('EnrollmentAccumulator', () => {
  let registry: InMemoryRegistry;
  let transcoder: FakeTranscoder;
  let extractor: FakeExtractor;
  let accumulator: EnrollmentAccumulator;

  beforeEach(() => {
    registry = new InMemoryRegistry();
    transcoder = new FakeTranscoder();
    extractor = new FakeExtractor();
    accumulator = new EnrollmentAccumulator(registry, transcoder, extractor, {
      requiredClips: 4,
      targetSampleRate: 16000,
      targetChannels: 1,
      now: () => NOW,
    });
  });

  async function enroll(identity: string, vectors: number[][]): Promise<EnrollmentProgress | undefined> {
    let last: EnrollmentProgress | undefined;
    for (let slot = 1; slot <= vectors.length; slot++) {
      last = await accumulator.submitClip(identity, slot, clip(vectors[slot - 1]));
    }
    return last;
  }

  describe('input validation', () => {
    it('rejects out-of-range slots before doing any work', async () => {
      await expect(accumulator.submitClip('alice', 0, clip([1, 0]))).rejects.toThrow(
        'clip_number must be between 1 and 4'
      );
      await expect(accumulator.submitClip('alice', 5, clip([1, 0]))).rejects.toThrow(ValidationError);
      await expect(accumulator.submitClip('alice', 1.5, clip([1, 0]))).rejects.toThrow(ValidationError);
      expect(transcoder.calls).toBe(0);
    });

    it('rejects empty audio and blank identities', async () => {
      await expect(accumulator.submitClip('alice', 1, Buffer.alloc(0))).rejects.toThrow('Audio clip is empty');
      await expect(accumulator.submitClip('', 1, clip([1, 0]))).rejects.toThrow('Username is required');
      expect(transcoder.calls).toBe(0);
    });

    it('refuses a non-positive clip requirement', () => {
      expect(
        () =>
          new EnrollmentAccumulator(registry, transcoder, extractor, {
            requiredClips: 0,
            targetSampleRate: 16000,
            targetChannels: 1,
          })
      ).toThrow(RangeError);
    });
  });

  describe('collecting clips', () => {
    it('reports partial progress without touching the registry', async () => {
      await accumulator.submitClip('Bob', 1, clip([1, 0]));
      const progress = await accumulator.submitClip('bob', 3, clip([0, 1]));

      expect(progress).toEqual({
        identity: 'bob',
        clipsReceived: 2,
        requiredClips: 4,
        enrollmentComplete: false,
      });
      expect(extractor.calls).toBe(0);
      await expect(registry.has('bob')).resolves.toBe(false);
      await expect(accumulator.getProgress('bob')).resolves.toEqual({
        identity: 'bob',
        state: 'collecting',
        filledSlots: [1, 3],
        clipsReceived: 2,
        requiredClips: 4,
      });
    });

    it('keeps only the latest clip submitted for a slot', async () => {
      await accumulator.submitClip('alice', 1, clip([0, 1]));
      const again = await accumulator.submitClip('alice', 1, clip([1, 0]));
      expect(again.clipsReceived).toBe(1);

      await accumulator.submitClip('alice', 2, clip([1, 0]));
      await accumulator.submitClip('alice', 3, clip([1, 0]));
      await accumulator.submitClip('alice', 4, clip([1, 0]));

      const record = await registry.get('alice');
      expect(record.fingerprint).toEqual([1, 0]);
    });

    it('leaves state untouched when a clip cannot be transcoded', async () => {
      await expect(accumulator.submitClip('alice', 1, UNTRANSCODABLE_CLIP)).rejects.toBeInstanceOf(TranscodeError);

      await expect(accumulator.getProgress('alice')).resolves.toMatchObject({ state: 'new', clipsReceived: 0 });
    });
  });

  describe('commit', () => {
    it('commits the elementwise mean of every clip', async () => {
      const progress = await enroll('alice', [
        [1, 0],
        [0.75, 0.5],
        [0.5, 0.75],
        [0.75, 0.25],
      ]);

      expect(progress).toEqual({
        identity: 'alice',
        clipsReceived: 4,
        requiredClips: 4,
        enrollmentComplete: true,
        clipsCount: 4,
        failedSlots: [],
      });
      await expect(registry.get('alice')).resolves.toEqual({
        identity: 'alice',
        enrolledDate: '2026-03-01T10:00:00.000Z',
        clipsCount: 4,
        fingerprint: [0.75, 0.375],
        migratedFrom: null,
      });
      await expect(accumulator.getProgress('alice')).resolves.toMatchObject({ state: 'complete', filledSlots: [] });
    });

    it('skips clips that fail extraction and averages the rest', async () => {
      await accumulator.submitClip('alice', 1, clip([1, 0]));
      await accumulator.submitClip('alice', 2, FAILING_CLIP);
      await accumulator.submitClip('alice', 3, clip([0, 1]));
      const progress = await accumulator.submitClip('alice', 4, clip([0.5, 0.5]));

      expect(progress.clipsCount).toBe(3);
      expect(progress.failedSlots).toEqual([{ slot: 2, reason: 'No speech detected' }]);
      const record = await registry.get('alice');
      expect(record.fingerprint).toEqual([0.5, 0.5]);
      expect(record.clipsCount).toBe(3);
    });

    it('treats mismatched dimensions and non-finite values as slot failures', async () => {
      await accumulator.submitClip('alice', 1, clip([1, 0]));
      await accumulator.submitClip('alice', 2, clip([1, 0, 0]));
      await accumulator.submitClip('alice', 3, Buffer.from('[1,"x"]'));
      const progress = await accumulator.submitClip('alice', 4, clip([0, 1]));

      expect(progress.failedSlots).toEqual([
        { slot: 2, reason: 'Embedding dimension 3 does not match 2' },
        { slot: 3, reason: 'Embedding contains non-finite values' },
      ]);
      await expect(registry.get('alice')).resolves.toMatchObject({ fingerprint: [0.5, 0.5], clipsCount: 2 });
    });

    it('does not commit when no clip extracts and keeps the slots for retry', async () => {
      for (let slot = 1; slot <= 3; slot++) {
        await accumulator.submitClip('alice', slot, FAILING_CLIP);
      }

      const error = await accumulator.submitClip('alice', 4, FAILING_CLIP).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(InsufficientDataError);
      if (error instanceof InsufficientDataError) {
        expect(error.failedSlots.map((failure) => failure.slot)).toEqual([1, 2, 3, 4]);
      }
      await expect(registry.has('alice')).resolves.toBe(false);
      await expect(accumulator.getProgress('alice')).resolves.toMatchObject({
        state: 'collecting',
        filledSlots: [1, 2, 3, 4],
      });

      const retried = await accumulator.submitClip('alice', 1, clip([0.6, 0.8]));
      expect(retried.enrollmentComplete).toBe(true);
      expect(retried.clipsCount).toBe(1);
      await expect(registry.get('alice')).resolves.toMatchObject({ fingerprint: [0.6, 0.8] });
    });

    it('keeps collecting after a storage failure and commits on retry', async () => {
      registry.failWrites = true;
      await expect(
        enroll('alice', [[1, 0], [1, 0], [1, 0], [1, 0]])
      ).rejects.toBeInstanceOf(StorageError);
      await expect(accumulator.getProgress('alice')).resolves.toMatchObject({ state: 'collecting', clipsReceived: 4 });

      registry.failWrites = false;
      const progress = await accumulator.submitClip('alice', 4, clip([1, 0]));

      expect(progress.enrollmentComplete).toBe(true);
      expect(registry.puts).toBe(1);
    });

    it('commits exactly once when clips race for the last slots', async () => {
      const results = await Promise.all(
        [1, 2, 3, 4].map((slot) => accumulator.submitClip('alice', slot, clip([1, 0])))
      );

      expect(results.filter((result) => result.enrollmentComplete)).toHaveLength(1);
      expect(registry.puts).toBe(1);
    });

    it('lets only one of two concurrent final clips commit', async () => {
      await enroll('alice', [[1, 0], [1, 0], [1, 0]]);

      const results = await Promise.allSettled([
        accumulator.submitClip('alice', 4, clip([1, 0])),
        accumulator.submitClip('alice', 4, clip([0, 1])),
      ]);

      expect(results[0].status).toBe('fulfilled');
      expect(results[1].status).toBe('rejected');
      if (results[1].status === 'rejected') {
        expect(results[1].reason).toBeInstanceOf(AlreadyEnrolledError);
      }
      expect(registry.puts).toBe(1);
      await expect(registry.get('alice')).resolves.toMatchObject({ fingerprint: [1, 0] });
    });
  });

  describe('re-enrollment', () => {
    it('refuses new clips for an enrolled identity until reset', async () => {
      await enroll('alice', [[1, 0], [1, 0], [1, 0], [1, 0]]);

      await expect(accumulator.submitClip('alice', 1, clip([0, 1]))).rejects.toBeInstanceOf(AlreadyEnrolledError);

      await expect(accumulator.resetEnrollment('alice')).resolves.toEqual({
        identity: 'alice',
        state: 'collecting',
        filledSlots: [],
        clipsReceived: 0,
        requiredClips: 4,
      });

      await accumulator.submitClip('alice', 1, clip([0, 1]));
      // The old voiceprint stays in place until the new one commits
      await expect(registry.get('alice')).resolves.toMatchObject({ fingerprint: [1, 0] });

      await accumulator.submitClip('alice', 2, clip([0, 1]));
      await accumulator.submitClip('alice', 3, clip([0, 1]));
      await accumulator.submitClip('alice', 4, clip([0, 1]));
      await expect(registry.get('alice')).resolves.toMatchObject({ fingerprint: [0, 1] });
      await expect(registry.count()).resolves.toBe(1);
    });

    it('refuses an enrolled identity without transcoding the upload', async () => {
      await enroll('alice', [[1, 0], [1, 0], [1, 0], [1, 0]]);
      const transcodesBefore = transcoder.calls;

      await expect(accumulator.submitClip('alice', 2, UNTRANSCODABLE_CLIP)).rejects.toBeInstanceOf(
        AlreadyEnrolledError
      );

      expect(transcoder.calls).toBe(transcodesBefore);
    });

    it('discards held clips on reset', async () => {
      await accumulator.submitClip('alice', 1, clip([1, 0]));
      await accumulator.submitClip('alice', 2, clip([1, 0]));

      const status = await accumulator.resetEnrollment('alice');

      expect(status.filledSlots).toEqual([]);
    });
  });

  describe('importClips', () => {
    it('enrolls from a batch and records where it came from', async () => {
      const progress = await accumulator.importClips(
        'Carol',
        [clip([1, 0]), UNTRANSCODABLE_CLIP, clip([0, 1])],
        'Carol'
      );

      expect(progress).toEqual({
        identity: 'carol',
        clipsReceived: 3,
        requiredClips: 4,
        enrollmentComplete: true,
        clipsCount: 2,
        failedSlots: [{ slot: 2, reason: 'Invalid data found when processing input' }],
      });
      await expect(registry.get('carol')).resolves.toMatchObject({
        fingerprint: [0.5, 0.5],
        clipsCount: 2,
        migratedFrom: 'Carol',
      });
    });

    it('rejects empty and oversized batches', async () => {
      await expect(accumulator.importClips('carol', [], 'Carol')).rejects.toThrow(
        'Between 1 and 4 clips are required'
      );
      const five = [1, 2, 3, 4, 5].map(() => clip([1, 0]));
      await expect(accumulator.importClips('carol', five, 'Carol')).rejects.toBeInstanceOf(ValidationError);
    });

    it('fails with InsufficientDataError when nothing extracts', async () => {
      await expect(
        accumulator.importClips('carol', [FAILING_CLIP, UNTRANSCODABLE_CLIP], 'Carol')
      ).rejects.toBeInstanceOf(InsufficientDataError);
      await expect(registry.has('carol')).resolves.toBe(false);
    });
  });

  describe('remove', () => {
    it('deletes the voiceprint and any held clips', async () => {
      await enroll('alice', [[1, 0], [1, 0], [1, 0], [1, 0]]);
      await accumulator.resetEnrollment('alice');
      await accumulator.submitClip('alice', 1, clip([0, 1]));

      await accumulator.remove('ALICE');

      await expect(registry.has('alice')).resolves.toBe(false);
      await expect(accumulator.getProgress('alice')).resolves.toMatchObject({ state: 'new', filledSlots: [] });
    });

    it('reports NotFound for an identity that was never enrolled', async () => {
      await expect(accumulator.remove('nobody')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
