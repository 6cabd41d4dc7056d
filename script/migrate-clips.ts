/**
 * Enroll speakers from existing recordings.
 *
 * Usage: npm run migrate:clips -- [source-folder]
 *
 * Each sub-folder of the source (default `audio_clips`) is one speaker; the
 * first CLIPS_TO_USE `.wav` files by name are averaged into a voiceprint.
 */

import { getEnv, requireEnv } from "../server/src/config/env";
import { setLogLevel } from "../server/logger";
import { createSpeakerServiceFromEnv } from "../server/voice";
import { DEFAULT_CLIPS_TO_USE, migrateSpeakers } from "../server/voice/migration";

async function main() {
  const env = getEnv();
  setLogLevel(env.LOG_LEVEL);

  const sourceDir = process.argv[2] || "audio_clips";
  const clipsToUse = Number.parseInt(process.env.CLIPS_TO_USE || String(DEFAULT_CLIPS_TO_USE), 10);
  if (!Number.isInteger(clipsToUse) || clipsToUse < 1 || clipsToUse > env.REQUIRED_CLIPS) {
    throw new Error(`CLIPS_TO_USE must be between 1 and ${env.REQUIRED_CLIPS}`);
  }

  const service = createSpeakerServiceFromEnv(env, requireEnv("EMBEDDER_URL"));

  console.log("=== Migrating Existing Audio Clips ===\n");
  console.log(`Source: ${sourceDir}`);
  console.log(`Clips per speaker: ${clipsToUse}\n`);

  try {
    const summary = await migrateSpeakers(service, { sourceDir, clipsToUse });

    console.log("\n=== Migration Complete ===");
    console.log(`  Migrated: ${summary.migrated.length}`);
    for (const speaker of summary.migrated) {
      const skipped = speaker.failedSlots.length > 0 ? ` (skipped ${speaker.failedSlots.length})` : "";
      console.log(`    ${speaker.identity}: ${speaker.clipsCount}/${speaker.clipsUsed} clips${skipped}`);
    }
    console.log(`  Failed: ${summary.failed.length}`);
    for (const speaker of summary.failed) {
      console.log(`    ${speaker.speaker}: ${speaker.reason}`);
    }
    console.log(`\nTotal enrolled: ${await service.registry.count()}`);

    if (summary.failed.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await service.registry.close();
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
