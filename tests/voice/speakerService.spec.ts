import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { NotFoundError, ValidationError } from '../../server/voice/errors';
import { SqliteEmbeddingRegistry, type EmbeddingRegistry } from '../../server/voice/registry';
import { SpeakerService, type SpeakerServiceConfig } from '../../server/voice/speakerService';
import { FakeExtractor, FakeTranscoder, InMemoryRegistry, clip } from './fakes';

const config: SpeakerServiceConfig = {
  requiredClips: 4,
  similarityThreshold: 0.75,
  similarityMetric: 'dot',
  targetSampleRate: 16000,
  targetChannels: 1,
};

const NOW = new Date('2026-03-01T10:00:00.000Z');

function createService(registry: EmbeddingRegistry): SpeakerService {
  return new SpeakerService({
    registry,
    transcoder: new FakeTranscoder(),
    extractor: new FakeExtractor(),
    config,
    now: () => NOW,
  });
}

const ALICE_CLIPS = [
  [1, 0],
  [0.75, 0.5],
  [0.5, 0.75],
  [0.75, 0.25],
];

async function enrollAll(service: SpeakerService, identity: string, vectors: number[][]): Promise<void> {
  for (let slot = 1; slot <= vectors.length; slot++) {
    await service.submitClip(identity, slot, clip(vectors[slot - 1]));
  }
}

describe('SpeakerService', () => {
  let service: SpeakerService;

  beforeEach(() => {
    service = createService(new InMemoryRegistry());
  });

  it('identifies alice from her first enrollment clip', async () => {
    await enrollAll(service, 'alice', ALICE_CLIPS);

    // mean = [0.75, 0.375]; dot(mean, [1, 0]) = 0.75, exactly the threshold
    await expect(service.identify(clip([1, 0]))).resolves.toEqual({
      prediction: 'alice',
      confidence: 0.75,
      threshold: 0.75,
      allScores: { alice: 0.75 },
      message: 'Matched with alice',
    });
  });

  it('does not match alice for a probe below the threshold', async () => {
    await enrollAll(service, 'alice', ALICE_CLIPS);

    const result = await service.identify(clip([0, 1]));

    expect(result.prediction).toBe('unknown');
    expect(result.confidence).toBe(0.375);
  });

  it('never matches a partially enrolled identity', async () => {
    await service.submitClip('bob', 1, clip([0, 1]));
    const progress = await service.submitClip('bob', 2, clip([0, 1]));

    expect(progress).toEqual({ identity: 'bob', clipsReceived: 2, requiredClips: 4, enrollmentComplete: false });
    await expect(service.identify(clip([0, 1]))).resolves.toMatchObject({
      prediction: 'unknown',
      confidence: 0,
      message: 'No enrolled users in system',
    });
  });

  it('lists and deletes identities', async () => {
    await enrollAll(service, 'alice', ALICE_CLIPS);
    await enrollAll(service, 'Bob', [[0, 1], [0, 1], [0, 1], [0, 1]]);

    await expect(service.listIdentities()).resolves.toEqual([
      { identity: 'alice', enrolledDate: '2026-03-01T10:00:00.000Z', clipsCount: 4 },
      { identity: 'bob', enrolledDate: '2026-03-01T10:00:00.000Z', clipsCount: 4 },
    ]);

    await service.deleteIdentity('bob');

    await expect(service.identify(clip([0, 1]))).resolves.toMatchObject({ prediction: 'unknown' });
    await expect(service.deleteIdentity('bob')).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.stats()).resolves.toEqual({ enrolledUsers: 1, requiredClips: 4, threshold: 0.75 });
  });

  it('rejects an empty probe', async () => {
    await expect(service.identify(Buffer.alloc(0))).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('SpeakerService across a restart', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'voiceprint-restart-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reproduces the registry and match scores after reopening', async () => {
    const dbPath = path.join(dir, 'voiceprints.db');
    const before = createService(new SqliteEmbeddingRegistry(dbPath));
    await enrollAll(before, 'alice', ALICE_CLIPS);
    await enrollAll(before, 'bob', [[0, 1], [0, 1], [0.5, 0.5], [0.5, 0.5]]);
    const probe = clip([0.6, 0.8]);
    const listed = await before.listIdentities();
    const scored = await before.identify(probe);
    await before.registry.close();

    const after = createService(new SqliteEmbeddingRegistry(dbPath));
    try {
      await expect(after.listIdentities()).resolves.toEqual(listed);
      await expect(after.identify(probe)).resolves.toEqual(scored);
    } finally {
      await after.registry.close();
    }
  });
});
