import { createServer } from "http";
import { createApp } from "./app";
import { log, logError, setLogLevel } from "./logger";
import { getEnv, requireEnv } from "./src/config/env";
import { createSpeakerServiceFromEnv } from "./voice";
import { embedderBreaker } from "../lib/reliability";

const env = getEnv();
setLogLevel(env.LOG_LEVEL);

const service = createSpeakerServiceFromEnv(env, requireEnv("EMBEDDER_URL"));

const app = createApp(service, {
  appName: env.APP_NAME,
  maxUploadBytes: env.MAX_UPLOAD_BYTES,
  embedderCircuit: () => embedderBreaker.stats,
});
const httpServer = createServer(app);

log(
  `registry=${env.REGISTRY_BACKEND} required_clips=${env.REQUIRED_CLIPS} threshold=${env.SIMILARITY_THRESHOLD} metric=${env.SIMILARITY_METRIC}`,
  "startup"
);

httpServer.listen({ port: env.PORT, host: "0.0.0.0" }, () => {
  log(`serving on port ${env.PORT}`);
});

function shutdown(signal: string): void {
  log(`${signal} received, closing registry`, "startup");
  httpServer.close(() => {
    service.registry
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError("Failed to close registry", "startup", error);
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
