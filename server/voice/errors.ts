import type { SlotFailure } from "@shared/schema";

export type SpeakerErrorCode =
  | "validation_error"
  | "transcode_error"
  | "extraction_error"
  | "insufficient_data"
  | "not_found"
  | "already_enrolled"
  | "storage_error";

/**
 * Base class for every failure the voiceprint core reports.
 * `status` is the HTTP status the transport layer answers with.
 */
export class SpeakerError extends Error {
  constructor(
    message: string,
    public readonly code: SpeakerErrorCode,
    public readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SpeakerError";
  }
}

export class ValidationError extends SpeakerError {
  constructor(message: string) {
    super(message, "validation_error", 400);
    this.name = "ValidationError";
  }
}

export class TranscodeError extends SpeakerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "transcode_error", 400, options);
    this.name = "TranscodeError";
  }
}

export class ExtractionError extends SpeakerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "extraction_error", 422, options);
    this.name = "ExtractionError";
  }
}

export class InsufficientDataError extends SpeakerError {
  constructor(
    public readonly identity: string,
    public readonly failedSlots: SlotFailure[]
  ) {
    super(`Failed to extract embeddings from any clip for ${identity}`, "insufficient_data", 422);
    this.name = "InsufficientDataError";
  }
}

export class NotFoundError extends SpeakerError {
  constructor(public readonly identity: string) {
    super(`User ${identity} not found`, "not_found", 404);
    this.name = "NotFoundError";
  }
}

export class AlreadyEnrolledError extends SpeakerError {
  constructor(public readonly identity: string) {
    super(
      `${identity} is already enrolled; reset the enrollment before submitting new clips`,
      "already_enrolled",
      409
    );
    this.name = "AlreadyEnrolledError";
  }
}

export class StorageError extends SpeakerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "storage_error", 500, options);
    this.name = "StorageError";
  }
}

export function isSpeakerError(error: unknown): error is SpeakerError {
  return error instanceof SpeakerError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
