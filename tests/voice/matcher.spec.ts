import { beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../../server/voice/errors';
import { IdentificationMatcher } from '../../server/voice/matcher';
import { InMemoryRegistry } from './fakes';

const ENROLLED_AT = '2026-03-01T10:00:00.000Z';

describe('IdentificationMatcher', () => {
  let registry: InMemoryRegistry;

  beforeEach(() => {
    registry = new InMemoryRegistry();
  });

  async function enroll(identity: string, fingerprint: number[]): Promise<void> {
    await registry.put(identity, fingerprint, { enrolledDate: ENROLLED_AT, clipsCount: 4 });
  }

  it('answers unknown with zero confidence on an empty registry', async () => {
    const matcher = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'dot' });

    await expect(matcher.identify([1, 0])).resolves.toEqual({
      prediction: 'unknown',
      confidence: 0,
      threshold: 0.75,
      allScores: {},
      message: 'No enrolled users in system',
    });
  });

  it('picks the best score at or above the threshold', async () => {
    await enroll('alice', [1, 0]);
    await enroll('bob', [0, 1]);
    const matcher = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'dot' });

    await expect(matcher.identify([0.75, 0.5])).resolves.toEqual({
      prediction: 'alice',
      confidence: 0.75,
      threshold: 0.75,
      allScores: { alice: 0.75, bob: 0.5 },
      message: 'Matched with alice',
    });
  });

  it('reports the best score even when nothing passes the threshold', async () => {
    await enroll('alice', [1, 0]);
    await enroll('bob', [0, 1]);
    const matcher = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'dot' });

    await expect(matcher.identify([0.5, 0.25])).resolves.toEqual({
      prediction: 'unknown',
      confidence: 0.5,
      threshold: 0.75,
      allScores: { alice: 0.5, bob: 0.25 },
      message: 'No match found above threshold',
    });
  });

  it('keeps the first identity in list order on a tie', async () => {
    await enroll('bob', [0.5, 0.5]);
    await enroll('alice', [0.5, 0.5]);
    const matcher = new IdentificationMatcher(registry, { threshold: 0.5, metric: 'dot' });

    const result = await matcher.identify([1, 1]);

    expect(result.prediction).toBe('alice');
    expect(result.confidence).toBe(1);
  });

  it('skips fingerprints of another dimension', async () => {
    await enroll('alice', [1, 0, 0]);
    await enroll('bob', [0, 1]);
    const matcher = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'dot' });

    const result = await matcher.identify([0, 1]);

    expect(result.prediction).toBe('bob');
    expect(result.allScores).toEqual({ bob: 1 });
  });

  it('answers unknown when no fingerprint shares the probe dimension', async () => {
    await enroll('alice', [1, 0, 0]);
    const matcher = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'dot' });

    await expect(matcher.identify([1, 0])).resolves.toEqual({
      prediction: 'unknown',
      confidence: 0,
      threshold: 0.75,
      allScores: {},
      message: "No enrolled fingerprint has the probe's dimension",
    });
  });

  it('normalizes both sides under the cosine metric', async () => {
    await enroll('alice', [2, 0]);
    const dot = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'dot' });
    const cosine = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'cosine' });

    await expect(dot.identify([3, 4])).resolves.toMatchObject({ prediction: 'alice', confidence: 6 });
    await expect(cosine.identify([3, 4])).resolves.toMatchObject({ prediction: 'unknown', confidence: 0.6 });
  });

  it('never returns a deleted identity', async () => {
    await enroll('alice', [1, 0]);
    const matcher = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'dot' });
    await expect(matcher.identify([1, 0])).resolves.toMatchObject({ prediction: 'alice' });

    await registry.delete('alice');

    await expect(matcher.identify([1, 0])).resolves.toMatchObject({
      prediction: 'unknown',
      confidence: 0,
    });
  });

  it('rejects an invalid probe', async () => {
    const matcher = new IdentificationMatcher(registry, { threshold: 0.75, metric: 'dot' });

    await expect(matcher.identify([])).rejects.toBeInstanceOf(ValidationError);
    await expect(matcher.identify([Number.NaN])).rejects.toBeInstanceOf(ValidationError);
  });
});
