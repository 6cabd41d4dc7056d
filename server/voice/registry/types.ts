import { voiceprintSchema, type Voiceprint, type VoiceprintMetadata } from "@shared/schema";
import { ValidationError } from "../errors";

/**
 * Durable identity -> fingerprint store.
 *
 * Every write is all-or-nothing: a reader sees either the previous record or
 * the new one, never a mix. list() is sorted by identity.
 */
export interface EmbeddingRegistry {
  put(identity: string, fingerprint: readonly number[], metadata: VoiceprintMetadata): Promise<Voiceprint>;
  get(identity: string): Promise<Voiceprint>;
  has(identity: string): Promise<boolean>;
  list(): Promise<Voiceprint[]>;
  delete(identity: string): Promise<void>;
  count(): Promise<number>;
  close(): Promise<void>;
}

export function buildVoiceprint(
  identity: string,
  fingerprint: readonly number[],
  metadata: VoiceprintMetadata
): Voiceprint {
  const parsed = voiceprintSchema.safeParse({
    identity,
    enrolledDate: metadata.enrolledDate,
    clipsCount: metadata.clipsCount,
    fingerprint: [...fingerprint],
    migratedFrom: metadata.migratedFrom ?? null,
  });

  if (!parsed.success) {
    const details = parsed.error.errors.map((err) => `${err.path.join(".")}: ${err.message}`);
    throw new ValidationError(`Invalid voiceprint for ${identity}: ${details.join("; ")}`);
  }

  return {
    identity: parsed.data.identity,
    enrolledDate: parsed.data.enrolledDate,
    clipsCount: parsed.data.clipsCount,
    fingerprint: parsed.data.fingerprint,
    migratedFrom: parsed.data.migratedFrom,
  };
}

export function compareIdentity(a: Voiceprint, b: Voiceprint): number {
  return Buffer.compare(Buffer.from(a.identity, "utf8"), Buffer.from(b.identity, "utf8"));
}
