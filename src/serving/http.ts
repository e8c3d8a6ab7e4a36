/**
 * HTTP surface over the prediction service
 *
 * Handlers are plain functions from request input to `{ status, body }`
 * so they can be exercised without opening a socket; `createApp` wires
 * them into express routes.
 */

import express from "express";
import { z } from "zod";

import { RelabelError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { VERSION } from "../version.js";

import type { Request, Response, NextFunction, Express } from "express";
import type { PredictionService } from "./prediction-service.js";

export interface HttpResponse {
  status: number;
  body: unknown;
}

const PredictRequestSchema = z.object({ text: z.string() });

const FeedbackRequestSchema = z.object({
  text: z.string(),
  model_prediction: z.string().default(""),
  human_label: z.string(),
});

const VersionQuerySchema = z.coerce.number().int().positive();

const log = logger.child("[http]");

/**
 * HTTP status for an error. Messages and codes are returned; storage paths never are.
 */
export function errorResponse(error: unknown): HttpResponse {
  if (error instanceof RelabelError) {
    const status = statusFor(error.code);
    return { status, body: { error: error.code, detail: error.message } };
  }
  if (isClientError(error)) {
    log.debug(`Rejected request: ${error.message}`);
    return { status: 400, body: { error: "VALIDATION_ERROR", detail: "Invalid request body" } };
  }
  log.error(`Unhandled error: ${error instanceof Error ? error.message : String(error)}`);
  return { status: 500, body: { error: "INTERNAL_ERROR", detail: "Internal server error" } };
}

/**
 * Errors raised by express's body parsing (malformed JSON, oversized body)
 * carry a 4xx `status` or `statusCode`
 */
function isClientError(error: unknown): error is Error {
  if (!(error instanceof Error)) return false;
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500;
}

function statusFor(code: string): number {
  switch (code) {
    case "VALIDATION_ERROR":
    case "EMPTY_INPUT":
      return 400;
    case "NOT_FOUND":
    case "NO_MODEL_AVAILABLE":
      return 404;
    case "VERSION_CONFLICT":
      return 409;
    default:
      return 500;
  }
}

function invalidBody(issues: z.ZodIssue[]): HttpResponse {
  return {
    status: 400,
    body: { error: "VALIDATION_ERROR", detail: issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ") },
  };
}

export function handleRoot(): HttpResponse {
  return {
    status: 200,
    body: {
      message: "relabel API",
      version: VERSION,
      endpoints: {
        predict: "POST /predict",
        feedback: "POST /feedback",
        metrics: "GET /metrics",
        model_version: "GET /model/version",
        health: "GET /health",
      },
    },
  };
}

export async function handlePredict(service: PredictionService, body: unknown): Promise<HttpResponse> {
  const request = PredictRequestSchema.safeParse(body);
  if (!request.success) return invalidBody(request.error.issues);

  const result = await service.predict(request.data.text);
  if (!result.success) return errorResponse(result.error);

  return {
    status: 200,
    body: {
      prediction: result.data.label,
      confidence: result.data.confidence,
      model_version: `v${result.data.versionId}`,
    },
  };
}

export async function handleFeedback(service: PredictionService, body: unknown): Promise<HttpResponse> {
  const request = FeedbackRequestSchema.safeParse(body);
  if (!request.success) return invalidBody(request.error.issues);

  const result = await service.submitFeedback({
    text: request.data.text,
    modelPrediction: request.data.model_prediction,
    humanLabel: request.data.human_label,
  });
  if (!result.success) return errorResponse(result.error);

  return {
    status: 200,
    body: { message: "Feedback received successfully", timestamp: result.data.timestamp },
  };
}

export async function handleMetrics(service: PredictionService, version: unknown): Promise<HttpResponse> {
  let versionId: number | undefined;
  if (version !== undefined) {
    const parsed = VersionQuerySchema.safeParse(version);
    if (!parsed.success) return invalidBody(parsed.error.issues);
    versionId = parsed.data;
  }

  const result = await service.getMetrics(versionId);
  if (!result.success) return errorResponse(result.error);

  return { status: 200, body: { version: `v${result.data.versionId}`, metrics: result.data.metrics } };
}

export async function handleModelVersion(service: PredictionService): Promise<HttpResponse> {
  const result = await service.getCurrentVersion();
  if (!result.success) return errorResponse(result.error);
  return { status: 200, body: { version: `v${result.data}`, version_number: result.data } };
}

export function handleHealth(service: PredictionService): HttpResponse {
  const health = service.health();
  return {
    status: 200,
    body: {
      status: health.status,
      model_loaded: health.modelLoaded,
      current_version: health.currentVersion === null ? null : `v${health.currentVersion}`,
    },
  };
}

function send(res: Response, response: HttpResponse): void {
  res.status(response.status).json(response.body);
}

/**
 * Wrap an async handler so rejections reach the error middleware
 */
function route(handler: (req: Request) => Promise<HttpResponse> | HttpResponse) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req))
      .then((response) => send(res, response))
      .catch(next);
  };
}

/**
 * Build the express application
 */
export function createApp(service: PredictionService): Express {
  const app = express();
  app.use(express.json());

  app.get("/", route(() => handleRoot()));
  app.post("/predict", route((req) => handlePredict(service, req.body)));
  app.post("/feedback", route((req) => handleFeedback(service, req.body)));
  app.get("/metrics", route((req) => handleMetrics(service, req.query["version"])));
  app.get("/model/version", route(() => handleModelVersion(service)));
  app.get("/health", route(() => handleHealth(service)));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    send(res, errorResponse(error));
  });

  return app;
}
