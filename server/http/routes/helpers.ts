import type { Response } from "express";
import { ZodError } from "zod";
import { isAbortError } from "../../abort.js";
import {
  MalformedJsonError,
  NoJsonFoundError,
  PipelineError,
  ProviderError,
  RateLimitedError,
  UnsupportedFrameworkError,
  ValidationFailure
} from "../../generator/errors.js";

function clipMessage(error: unknown, fallback: string): string {
  return error instanceof Error && error.message.trim().length > 0
    ? error.message.trim().replace(/\s+/g, " ").slice(0, 480)
    : fallback;
}

export function sendZodError(error: unknown, response: Response): void {
  if (error instanceof ZodError) {
    response.status(400).json({
      error: "Validation failed",
      details: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
    return;
  }

  console.error("[api-error]", error);
  response.status(500).json({ error: clipMessage(error, "Internal server error") });
}

/**
 * Maps pipeline failures onto status codes: 400 for an unsupported framework,
 * 422 when the model output could not be turned into a configuration, 429 once
 * rate-limit retries are spent, 502 for provider failures.
 */
export function sendPipelineError(error: unknown, response: Response): void {
  if (error instanceof UnsupportedFrameworkError) {
    response.status(400).json({ error: error.message, code: error.code, stage: error.stage });
    return;
  }

  if (error instanceof ValidationFailure) {
    response.status(422).json({ error: error.message, code: error.code, stage: error.stage, issues: error.issues });
    return;
  }

  if (error instanceof MalformedJsonError || error instanceof NoJsonFoundError) {
    response.status(422).json({ error: error.message, code: error.code, stage: error.stage });
    return;
  }

  if (error instanceof RateLimitedError) {
    if (error.retryAfterMs !== null) {
      response.setHeader("Retry-After", String(Math.ceil(error.retryAfterMs / 1000)));
    }
    response.status(429).json({ error: error.message, code: error.code, stage: error.stage });
    return;
  }

  if (error instanceof ProviderError) {
    response.status(502).json({
      error: clipMessage(error, "Provider request failed."),
      code: error.code,
      stage: error.stage,
      provider: error.providerId
    });
    return;
  }

  if (error instanceof PipelineError) {
    response.status(500).json({ error: clipMessage(error, "Generation failed."), code: error.code, stage: error.stage });
    return;
  }

  if (isAbortError(error)) {
    response.status(499).json({ error: "Generation aborted." });
    return;
  }

  sendZodError(error, response);
}
