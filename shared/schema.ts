import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { createSelectSchema } from "drizzle-zod";
import { z } from "zod";

// Voiceprints table: one committed fingerprint per enrolled identity
export const voiceprints = sqliteTable("voiceprints", {
  identity: text("identity").primaryKey(), // trimmed, lowercased speaker name
  enrolledDate: text("enrolled_date").notNull(), // ISO-8601
  clipsCount: integer("clips_count").notNull(),
  fingerprint: text("fingerprint", { mode: "json" }).$type<number[]>().notNull(),
  migratedFrom: text("migrated_from"), // source folder when bulk-imported
});

export const fingerprintSchema = z.array(z.number().finite()).min(1, "Fingerprint must not be empty");

export const voiceprintSchema = createSelectSchema(voiceprints, {
  identity: z.string().min(1),
  enrolledDate: z.string().datetime({ offset: true }),
  clipsCount: z.number().int().positive(),
  fingerprint: fingerprintSchema,
  migratedFrom: z.string().nullable(),
});

export type Voiceprint = typeof voiceprints.$inferSelect;

export interface VoiceprintMetadata {
  enrolledDate: string;
  clipsCount: number;
  migratedFrom?: string | null;
}

export const similarityMetrics = ["dot", "cosine"] as const;
export type SimilarityMetric = (typeof similarityMetrics)[number];

export const registryBackends = ["sqlite", "file"] as const;
export type RegistryBackend = (typeof registryBackends)[number];

export const UNKNOWN_SPEAKER = "unknown";

// Enrollment lifecycle: NEW -> COLLECTING -> COMPLETE
export const enrollmentStates = ["new", "collecting", "complete"] as const;
export type EnrollmentState = (typeof enrollmentStates)[number];

export interface SlotFailure {
  slot: number;
  reason: string;
}

export interface EnrollmentProgress {
  identity: string;
  clipsReceived: number;
  requiredClips: number;
  enrollmentComplete: boolean;
  clipsCount?: number;
  failedSlots?: SlotFailure[];
}

export interface EnrollmentStatus {
  identity: string;
  state: EnrollmentState;
  filledSlots: number[];
  clipsReceived: number;
  requiredClips: number;
}

export interface IdentificationResult {
  prediction: string;
  confidence: number;
  threshold: number;
  allScores: Record<string, number>;
  message: string;
}

export interface EnrolledIdentity {
  identity: string;
  enrolledDate: string;
  clipsCount: number;
}

// Multipart form fields for POST /enroll (file arrives separately via multer)
export const enrollRequestSchema = z.object({
  username: z.string().default(""),
  clip_number: z
    .string({ required_error: "clip_number is required" })
    .trim()
    .regex(/^\d+$/, "clip_number must be a positive integer")
    .transform(Number),
});

export type EnrollRequest = z.infer<typeof enrollRequestSchema>;

export const usernameParamsSchema = z.object({
  username: z.string().min(1),
});
