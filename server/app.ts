import express, { type Express } from "express";
import { createApiErrorHandler } from "./middleware/apiValidation";
import { registerRoutes, type RouteOptions } from "./routes";
import { log } from "./logger";
import type { SpeakerService } from "./voice/speakerService";

export interface AppOptions extends RouteOptions {
  appName: string;
}

export function createApp(service: SpeakerService, options: AppOptions): Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Health endpoint (no logging, no dependencies)
  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, service: options.appName });
  });

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    });

    next();
  });

  registerRoutes(app, service, options);

  app.use(createApiErrorHandler({ maxUploadBytes: options.maxUploadBytes }));

  return app;
}
