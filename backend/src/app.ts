import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { randomUUID } from "node:crypto";
import { z } from "zod";

import { getMetricsSnapshot } from "./metrics.js";
import { isUniqueViolation } from "./nutritionStore.js";
import type { NutritionAnalysisService } from "./nutritionAnalysis.js";
import { IMAGE_SOURCE_TYPES, type ErrorResponse } from "./types.js";
import type { UserService } from "./userService.js";
import type { VisionAnalyzer } from "./visionClient.js";

export interface AppDependencies {
  users: UserService;
  analyses: NutritionAnalysisService;
  analyzer: VisionAnalyzer;
}

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

const idParam = z.coerce.number().int().positive();

const UserParamsSchema = z.object({ userId: idParam });
const UserImageParamsSchema = z.object({ userId: idParam, imageId: idParam });
const ImageParamsSchema = z.object({ imageId: idParam });
const AnalysisParamsSchema = z.object({ analysisId: idParam });
const LimitQuerySchema = z.object({ limit: z.coerce.number().int().positive().max(100).optional() });

const CreateUserBodySchema = z.object({
  email: z.string().trim().email(),
  name: z.string().trim().min(1),
});

const UpdateUserBodySchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    email: z.string().trim().email().optional(),
    isActive: z.boolean().optional(),
  })
  .strict();

const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;

const UploadImageBodySchema = z.object({
  filename: z.string().trim().min(1).max(255),
  imageBase64: z
    .string()
    .min(1)
    .transform((value) => value.replace(DATA_URL_PREFIX, "")),
  sourceType: z.enum(IMAGE_SOURCE_TYPES).optional(),
});

// ============================================================================
// HELPERS
// ============================================================================

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not forward rejected promises to the error middleware. */
const route =
  (handler: AsyncRoute) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const sendError = (res: Response, status: number, body: ErrorResponse): void => {
  res.status(status).json(body);
};

/** Parses `value` or answers 400 and returns null. */
const parseOr400 = <T extends z.ZodTypeAny>(schema: T, value: unknown, res: Response): z.infer<T> | null => {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  const detail = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  sendError(res, 400, { error: "invalid_request", detail });
  return null;
};

/** 4xx status carried by body-parser errors (malformed JSON, oversized body). */
const clientErrorStatus = (error: unknown): number | null => {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
};

// ============================================================================
// EXPRESS APP
// ============================================================================

export function createApp({ users, analyses, analyzer }: AppDependencies): express.Express {
  const app = express();
  app.set("trust proxy", 1);
  app.use(cors());
  app.use(express.json({ limit: "15mb" }));

  // Minimal request logging (no body / no secrets)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = randomUUID();
    res.setHeader("x-request-id", requestId);
    const startedAt = process.hrtime.bigint();

    res.on("finish", () => {
      if (req.path === "/health") return;

      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      console.log(`[HTTP] ${res.statusCode} ${req.method} ${req.path} (${durationMs.toFixed(1)}ms) id=${requestId}`);
    });

    next();
  });

  // --------------------------------------------------------------------------
  // Users
  // --------------------------------------------------------------------------

  app.post(
    "/api/users",
    route(async (req, res) => {
      const body = parseOr400(CreateUserBodySchema, req.body, res);
      if (!body) return;
      res.json(await users.getOrCreateUser(body.email, body.name));
    }),
  );

  app.get(
    "/api/users/:userId",
    route(async (req, res) => {
      const params = parseOr400(UserParamsSchema, req.params, res);
      if (!params) return;
      const user = await users.getUserById(params.userId);
      if (!user) {
        sendError(res, 404, { error: "user_not_found" });
        return;
      }
      res.json(user);
    }),
  );

  app.patch(
    "/api/users/:userId",
    route(async (req, res) => {
      const params = parseOr400(UserParamsSchema, req.params, res);
      if (!params) return;
      const body = parseOr400(UpdateUserBodySchema, req.body, res);
      if (!body) return;

      try {
        const user = await users.updateUser(params.userId, body);
        if (!user) {
          sendError(res, 404, { error: "user_not_found" });
          return;
        }
        res.json(user);
      } catch (error) {
        if (isUniqueViolation(error)) {
          sendError(res, 409, { error: "email_taken" });
          return;
        }
        throw error;
      }
    }),
  );

  // --------------------------------------------------------------------------
  // Food images
  // --------------------------------------------------------------------------

  app.get(
    "/api/users/:userId/images",
    route(async (req, res) => {
      const params = parseOr400(UserParamsSchema, req.params, res);
      if (!params) return;
      const query = parseOr400(LimitQuerySchema, req.query, res);
      if (!query) return;
      res.json(await users.getUserFoodImages(params.userId, query.limit));
    }),
  );

  app.post(
    "/api/users/:userId/images",
    route(async (req, res) => {
      const params = parseOr400(UserParamsSchema, req.params, res);
      if (!params) return;
      const body = parseOr400(UploadImageBodySchema, req.body, res);
      if (!body) return;

      if (!(await users.getUserById(params.userId))) {
        sendError(res, 404, { error: "user_not_found" });
        return;
      }

      const bytes = Buffer.from(body.imageBase64, "base64");
      const image = await users.createFoodImage(params.userId, bytes, body.filename, body.sourceType);
      if (!image) {
        sendError(res, 422, { error: "invalid_image", detail: "Image failed validation" });
        return;
      }
      res.status(201).json(image);
    }),
  );

  app.delete(
    "/api/users/:userId/images/:imageId",
    route(async (req, res) => {
      const params = parseOr400(UserImageParamsSchema, req.params, res);
      if (!params) return;
      if (!(await users.deleteFoodImage(params.imageId, params.userId))) {
        sendError(res, 404, { error: "image_not_found" });
        return;
      }
      res.status(204).end();
    }),
  );

  // --------------------------------------------------------------------------
  // Analyses
  // --------------------------------------------------------------------------

  app.post(
    "/api/images/:imageId/analyses",
    route(async (req, res) => {
      const params = parseOr400(ImageParamsSchema, req.params, res);
      if (!params) return;
      const analysis = await analyses.analyzeFoodImage(params.imageId);
      if (!analysis) {
        sendError(res, 404, { error: "image_not_found" });
        return;
      }
      res.status(201).json(analysis);
    }),
  );

  app.get(
    "/api/images/:imageId/analyses",
    route(async (req, res) => {
      const params = parseOr400(ImageParamsSchema, req.params, res);
      if (!params) return;
      res.json(await analyses.getImageAnalyses(params.imageId));
    }),
  );

  app.get(
    "/api/analyses",
    route(async (req, res) => {
      const query = parseOr400(LimitQuerySchema, req.query, res);
      if (!query) return;
      res.json(await analyses.getRecentAnalyses(query.limit));
    }),
  );

  app.get(
    "/api/analyses/:analysisId",
    route(async (req, res) => {
      const params = parseOr400(AnalysisParamsSchema, req.params, res);
      if (!params) return;
      const result = await analyses.getAnalysisWithAllergens(params.analysisId);
      if (!result) {
        sendError(res, 404, { error: "analysis_not_found" });
        return;
      }
      res.json(result);
    }),
  );

  /**
   * Health check
   */
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      uptimeSec: Math.round(process.uptime()),
      configured: {
        ai: analyzer.live,
        aiModel: analyzer.model,
      },
      metrics: getMetricsSnapshot(),
    });
  });

  // Minimal error logging (no secrets)
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status !== null && !res.headersSent) {
      sendError(res, status, { error: status === 413 ? "payload_too_large" : "invalid_request" });
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof Error) {
      console.error(`[ERR] ${req.method} ${req.path}: ${message}\n${error.stack ?? ""}`);
    } else {
      console.error(`[ERR] ${req.method} ${req.path}: ${message}`);
    }

    if (res.headersSent) {
      return;
    }

    res.status(500).json({ error: "internal_error" });
  });

  return app;
}
