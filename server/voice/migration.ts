/**
 * Bulk enrollment from a folder of existing recordings:
 * `<source>/<Speaker>/*.wav`, one sub-folder per speaker.
 */

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { SlotFailure } from "@shared/schema";
import { log, logWarn } from "../logger";
import { describeError } from "./errors";
import type { SpeakerService } from "./speakerService";

export const DEFAULT_CLIPS_TO_USE = 3;

export interface MigratedSpeaker {
  speaker: string;
  identity: string;
  clipsUsed: number;
  clipsCount: number;
  failedSlots: SlotFailure[];
}

export interface FailedSpeaker {
  speaker: string;
  reason: string;
}

export interface MigrationSummary {
  migrated: MigratedSpeaker[];
  failed: FailedSpeaker[];
}

export interface MigrationOptions {
  sourceDir: string;
  clipsToUse?: number;
}

async function listWavFiles(folder: string): Promise<string[]> {
  const entries = await readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".wav"))
    .map((entry) => entry.name)
    .sort();
}

export async function migrateSpeaker(
  service: SpeakerService,
  sourceDir: string,
  speaker: string,
  clipsToUse = DEFAULT_CLIPS_TO_USE
): Promise<MigratedSpeaker> {
  const folder = path.join(sourceDir, speaker);
  const files = await listWavFiles(folder);
  if (files.length === 0) {
    throw new Error(`No .wav files in ${folder}`);
  }

  const selected = files.slice(0, clipsToUse);
  log(`${speaker}: found ${files.length} clips, using ${selected.join(", ")}`, "migrate");

  const clips = await Promise.all(selected.map((file) => readFile(path.join(folder, file))));
  const progress = await service.importClips(speaker, clips, speaker);

  return {
    speaker,
    identity: progress.identity,
    clipsUsed: selected.length,
    clipsCount: progress.clipsCount ?? 0,
    failedSlots: progress.failedSlots ?? [],
  };
}

/**
 * Enroll every speaker folder under `sourceDir`. A failing speaker is
 * reported in the summary and does not stop the others.
 */
export async function migrateSpeakers(
  service: SpeakerService,
  options: MigrationOptions
): Promise<MigrationSummary> {
  const clipsToUse = options.clipsToUse ?? DEFAULT_CLIPS_TO_USE;
  const entries = await readdir(options.sourceDir, { withFileTypes: true });
  const speakers = entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort();

  const summary: MigrationSummary = { migrated: [], failed: [] };

  for (const speaker of speakers) {
    try {
      summary.migrated.push(await migrateSpeaker(service, options.sourceDir, speaker, clipsToUse));
    } catch (error) {
      const reason = describeError(error);
      logWarn(`${speaker}: ${reason}`, "migrate");
      summary.failed.push({ speaker, reason });
    }
  }

  return summary;
}
