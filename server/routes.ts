import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import path from "node:path";
import {
  enrollRequestSchema,
  usernameParamsSchema,
  type EnrollRequest,
  type EnrollmentStatus,
} from "@shared/schema";
import { validateParams } from "./middleware/apiValidation";
import { createHealthCheckHandler, type HealthCheckDeps } from "./middleware/healthCheck";
import { log, logWarn } from "./logger";
import { ValidationError } from "./voice/errors";
import type { SpeakerService } from "./voice/speakerService";

export const ALLOWED_AUDIO_EXTENSIONS = ["wav", "mp3", "ogg", "webm", "m4a"] as const;

export interface RouteOptions {
  maxUploadBytes: number;
  embedderCircuit?: HealthCheckDeps["embedderCircuit"];
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware.
function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function hasAllowedExtension(filename: string): boolean {
  const ext = path.extname(filename).slice(1).toLowerCase();
  return ALLOWED_AUDIO_EXTENSIONS.some((allowed) => allowed === ext);
}

function requireAudio(req: Request): Buffer {
  if (!req.file) {
    throw new ValidationError("No audio file provided");
  }
  return req.file.buffer;
}

// multer fills req.body from the text fields of the multipart form
function parseEnrollForm(body: unknown): EnrollRequest {
  const result = enrollRequestSchema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(result.error.errors[0]?.message ?? "Invalid enrollment form");
  }
  return result.data;
}

function statusBody(status: EnrollmentStatus) {
  return {
    status: "success",
    username: status.identity,
    state: status.state,
    filled_slots: status.filledSlots,
    clips_received: status.clipsReceived,
    required_clips: status.requiredClips,
  };
}

export function registerRoutes(app: Express, service: SpeakerService, options: RouteOptions): void {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      if (!file.originalname) {
        cb(new ValidationError("No file selected"));
        return;
      }
      if (!hasAllowedExtension(file.originalname)) {
        cb(
          new ValidationError(
            `Unsupported file type. Allowed: ${ALLOWED_AUDIO_EXTENSIONS.join(", ")}`
          )
        );
        return;
      }
      cb(null, true);
    },
  });

  app.get(
    "/",
    asyncHandler(async (_req, res) => {
      const stats = await service.stats();
      res.json({
        status: "running",
        message: "Speaker Recognition Server",
        enrolled_users: stats.enrolledUsers,
        required_clips: stats.requiredClips,
        threshold: stats.threshold,
        endpoints: {
          health: "/ (GET)",
          enroll: "/enroll (POST)",
          enroll_status: "/enroll/<username> (GET)",
          enroll_reset: "/enroll/<username>/reset (POST)",
          predict: "/predict (POST)",
          enrolled_users: "/enrolled-users (GET)",
          delete_user: "/delete-user/<username> (DELETE)",
        },
      });
    })
  );

  app.get(
    "/api/health",
    createHealthCheckHandler({ service, embedderCircuit: options.embedderCircuit })
  );

  app.post(
    "/enroll",
    upload.single("audio"),
    asyncHandler(async (req, res) => {
      const { username, clip_number } = parseEnrollForm(req.body);
      const audio = requireAudio(req);

      const progress = await service.submitClip(username, clip_number, audio);

      if (progress.failedSlots && progress.failedSlots.length > 0) {
        const slots = progress.failedSlots.map((failure) => failure.slot).join(", ");
        logWarn(`Enrollment for ${progress.identity} skipped clips ${slots}`, "enroll");
      }

      if (progress.enrollmentComplete) {
        log(`Enrolled ${progress.identity} from ${progress.clipsCount ?? 0} clips`, "enroll");
        res.json({
          status: "success",
          message: `Enrollment complete for ${progress.identity}!`,
          username: progress.identity,
          clips_received: progress.clipsReceived,
          required_clips: progress.requiredClips,
          enrollment_complete: true,
          clips_count: progress.clipsCount,
          failed_slots: progress.failedSlots ?? [],
        });
        return;
      }

      res.json({
        status: "success",
        message: `Clip ${clip_number}/${progress.requiredClips} received`,
        username: progress.identity,
        clips_received: progress.clipsReceived,
        required_clips: progress.requiredClips,
        enrollment_complete: false,
      });
    })
  );

  app.get(
    "/enroll/:username",
    validateParams(usernameParamsSchema),
    asyncHandler(async (req, res) => {
      res.json(statusBody(await service.getProgress(req.params.username)));
    })
  );

  app.post(
    "/enroll/:username/reset",
    validateParams(usernameParamsSchema),
    asyncHandler(async (req, res) => {
      const status = await service.resetEnrollment(req.params.username);
      log(`Enrollment reset for ${status.identity}`, "enroll");
      res.json(statusBody(status));
    })
  );

  app.post(
    "/predict",
    upload.single("audio"),
    asyncHandler(async (req, res) => {
      const result = await service.identify(requireAudio(req));
      log(`Prediction: ${result.prediction} (confidence: ${result.confidence.toFixed(3)})`, "predict");
      res.json({
        status: "success",
        prediction: result.prediction,
        confidence: result.confidence,
        threshold: result.threshold,
        all_similarities: result.allScores,
        message: result.message,
      });
    })
  );

  app.get(
    "/enrolled-users",
    asyncHandler(async (_req, res) => {
      const users = await service.listIdentities();
      res.json({
        status: "success",
        count: users.length,
        users: users.map((user) => ({
          username: user.identity,
          enrolled_date: user.enrolledDate,
          clips_count: user.clipsCount,
        })),
      });
    })
  );

  app.delete(
    "/delete-user/:username",
    validateParams(usernameParamsSchema),
    asyncHandler(async (req, res) => {
      const username = req.params.username.trim().toLowerCase();
      await service.deleteIdentity(username);
      log(`Deleted user: ${username}`, "registry");
      res.json({
        status: "success",
        message: `User ${username} deleted successfully`,
      });
    })
  );
}
