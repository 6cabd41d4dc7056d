/**
 * File-backed voiceprint registry.
 *
 * One JSON document per identity. A write lands in a uniquely named temp file
 * in the same directory, is fsynced, and is renamed over the target, so a
 * crash leaves either the old document or the new one. Temp files are never
 * read back.
 */

import { promises as fs } from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { voiceprintSchema, type Voiceprint, type VoiceprintMetadata } from "@shared/schema";
import { NotFoundError, SpeakerError, StorageError } from "../errors";
import { buildVoiceprint, compareIdentity, type EmbeddingRegistry } from "./types";

const RECORD_SUFFIX = ".json";
const TEMP_SUFFIX = ".tmp";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function isMissingFile(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}

export class FileEmbeddingRegistry implements EmbeddingRegistry {
  constructor(private readonly directory: string) {}

  private recordPath(identity: string): string {
    return path.join(this.directory, `${encodeURIComponent(identity)}${RECORD_SUFFIX}`);
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof SpeakerError) {
        throw error;
      }
      throw new StorageError(`Registry ${operation} failed`, { cause: error });
    }
  }

  private async syncDirectory(): Promise<void> {
    const handle = await fs.open(this.directory, "r");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  private async readRecord(filePath: string): Promise<Voiceprint> {
    const raw = await fs.readFile(filePath, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(`Corrupt voiceprint record ${path.basename(filePath)}`, { cause: error });
    }

    const parsed = voiceprintSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`Invalid voiceprint record ${path.basename(filePath)}`, { cause: parsed.error });
    }
    return {
      identity: parsed.data.identity,
      enrolledDate: parsed.data.enrolledDate,
      clipsCount: parsed.data.clipsCount,
      fingerprint: parsed.data.fingerprint,
      migratedFrom: parsed.data.migratedFrom,
    };
  }

  async put(identity: string, fingerprint: readonly number[], metadata: VoiceprintMetadata): Promise<Voiceprint> {
    const record = buildVoiceprint(identity, fingerprint, metadata);
    const target = this.recordPath(identity);
    const temp = path.join(this.directory, `.${encodeURIComponent(identity)}.${uuidv4()}${TEMP_SUFFIX}`);

    await this.guard("put", async () => {
      await fs.mkdir(this.directory, { recursive: true });
      try {
        const handle = await fs.open(temp, "wx");
        try {
          await handle.writeFile(JSON.stringify(record, null, 2), "utf8");
          await handle.sync();
        } finally {
          await handle.close();
        }
        await fs.rename(temp, target);
      } catch (error) {
        await fs.rm(temp, { force: true });
        throw error;
      }
      await this.syncDirectory();
    });

    return record;
  }

  async get(identity: string): Promise<Voiceprint> {
    return this.guard("get", async () => {
      try {
        return await this.readRecord(this.recordPath(identity));
      } catch (error) {
        if (isMissingFile(error)) {
          throw new NotFoundError(identity);
        }
        throw error;
      }
    });
  }

  async has(identity: string): Promise<boolean> {
    return this.guard("lookup", async () => {
      try {
        await fs.access(this.recordPath(identity));
        return true;
      } catch (error) {
        if (isMissingFile(error)) {
          return false;
        }
        throw error;
      }
    });
  }

  private async recordFiles(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.directory);
      return entries
        .filter((name) => name.endsWith(RECORD_SUFFIX))
        .map((name) => path.join(this.directory, name));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  async list(): Promise<Voiceprint[]> {
    return this.guard("list", async () => {
      const files = await this.recordFiles();
      const records: Voiceprint[] = [];
      for (const file of files) {
        try {
          records.push(await this.readRecord(file));
        } catch (error) {
          // Deleted between readdir and read
          if (isMissingFile(error)) continue;
          throw error;
        }
      }
      return records.sort(compareIdentity);
    });
  }

  async delete(identity: string): Promise<void> {
    await this.guard("delete", async () => {
      try {
        await fs.unlink(this.recordPath(identity));
      } catch (error) {
        if (isMissingFile(error)) {
          throw new NotFoundError(identity);
        }
        throw error;
      }
      await this.syncDirectory();
    });
  }

  async count(): Promise<number> {
    return this.guard("count", async () => (await this.recordFiles()).length);
  }

  async close(): Promise<void> {}
}
