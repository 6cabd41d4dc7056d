/**
 * SQLite-backed voiceprint registry.
 *
 * One row per identity. Puts are a single upsert and deletes a single
 * statement, so the WAL journal makes each write atomic and crash-safe.
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { asc, count, eq } from "drizzle-orm";
import fs from "fs";
import path from "path";
import { voiceprints, type Voiceprint, type VoiceprintMetadata } from "@shared/schema";
import { NotFoundError, SpeakerError, StorageError } from "../errors";
import { buildVoiceprint, type EmbeddingRegistry } from "./types";

function ensureVoiceprintsTable(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS voiceprints (
      identity TEXT PRIMARY KEY,
      enrolled_date TEXT NOT NULL,
      clips_count INTEGER NOT NULL,
      fingerprint TEXT NOT NULL,
      migrated_from TEXT
    )
  `);
}

export class SqliteEmbeddingRegistry implements EmbeddingRegistry {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;

  constructor(filename: string) {
    try {
      if (filename !== ":memory:") {
        fs.mkdirSync(path.dirname(filename), { recursive: true });
      }
      this.sqlite = new Database(filename);
      this.sqlite.pragma("journal_mode = WAL");
      this.sqlite.pragma("synchronous = FULL");
      ensureVoiceprintsTable(this.sqlite);
      this.db = drizzle(this.sqlite);
    } catch (error) {
      throw new StorageError(`Failed to open voiceprint registry at ${filename}`, { cause: error });
    }
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof SpeakerError) {
        throw error;
      }
      throw new StorageError(`Registry ${operation} failed`, { cause: error });
    }
  }

  async put(identity: string, fingerprint: readonly number[], metadata: VoiceprintMetadata): Promise<Voiceprint> {
    const record = buildVoiceprint(identity, fingerprint, metadata);

    this.guard("put", () =>
      this.db
        .insert(voiceprints)
        .values(record)
        .onConflictDoUpdate({
          target: voiceprints.identity,
          set: {
            enrolledDate: record.enrolledDate,
            clipsCount: record.clipsCount,
            fingerprint: record.fingerprint,
            migratedFrom: record.migratedFrom,
          },
        })
        .run()
    );

    return record;
  }

  async get(identity: string): Promise<Voiceprint> {
    const row = this.guard("get", () =>
      this.db.select().from(voiceprints).where(eq(voiceprints.identity, identity)).get()
    );
    if (!row) {
      throw new NotFoundError(identity);
    }
    return row;
  }

  async has(identity: string): Promise<boolean> {
    const row = this.guard("lookup", () =>
      this.db
        .select({ identity: voiceprints.identity })
        .from(voiceprints)
        .where(eq(voiceprints.identity, identity))
        .get()
    );
    return row !== undefined;
  }

  async list(): Promise<Voiceprint[]> {
    return this.guard("list", () =>
      this.db.select().from(voiceprints).orderBy(asc(voiceprints.identity)).all()
    );
  }

  async delete(identity: string): Promise<void> {
    const result = this.guard("delete", () =>
      this.db.delete(voiceprints).where(eq(voiceprints.identity, identity)).run()
    );
    if (result.changes === 0) {
      throw new NotFoundError(identity);
    }
  }

  async count(): Promise<number> {
    const row = this.guard("count", () =>
      this.db.select({ value: count() }).from(voiceprints).get()
    );
    return row?.value ?? 0;
  }

  async close(): Promise<void> {
    this.guard("close", () => this.sqlite.close());
  }
}
