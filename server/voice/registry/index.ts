import type { RegistryBackend } from "@shared/schema";
import { FileEmbeddingRegistry } from "./fileRegistry";
import { SqliteEmbeddingRegistry } from "./sqliteRegistry";
import type { EmbeddingRegistry } from "./types";

export { FileEmbeddingRegistry } from "./fileRegistry";
export { SqliteEmbeddingRegistry } from "./sqliteRegistry";
export { buildVoiceprint, compareIdentity, type EmbeddingRegistry } from "./types";

export interface RegistryOptions {
  backend: RegistryBackend;
  sqlitePath: string;
  directory: string;
}

export function createRegistry(options: RegistryOptions): EmbeddingRegistry {
  switch (options.backend) {
    case "sqlite":
      return new SqliteEmbeddingRegistry(options.sqlitePath);
    case "file":
      return new FileEmbeddingRegistry(options.directory);
  }
}
