import type { ProviderId, ValidationIssue } from "../types/contracts.js";

export type PipelineStage = "building" | "awaiting_completion" | "parsing" | "selecting" | "rendering";
export type PipelineState = PipelineStage | "done" | "failed";

export type PipelineErrorCode =
  | "provider_error"
  | "rate_limited"
  | "no_json_found"
  | "malformed_json"
  | "validation_failed"
  | "unsupported_framework";

export class PipelineError extends Error {
  readonly stage: PipelineStage;
  readonly code: PipelineErrorCode;

  constructor(input: { message: string; stage: PipelineStage; code: PipelineErrorCode; cause?: unknown }) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "PipelineError";
    this.stage = input.stage;
    this.code = input.code;
  }
}

export class ProviderError extends PipelineError {
  /** Provider id as requested; unknown ids are reported verbatim. */
  readonly providerId: string;
  readonly statusCode: number | null;
  /** Network-level failure worth retrying (connection reset, DNS, socket hang-up). */
  readonly transient: boolean;

  constructor(input: {
    providerId: string;
    message: string;
    statusCode?: number | null;
    transient?: boolean;
    cause?: unknown;
  }) {
    super({ message: input.message, stage: "awaiting_completion", code: "provider_error", cause: input.cause });
    this.name = "ProviderError";
    this.providerId = input.providerId;
    this.statusCode = input.statusCode ?? null;
    this.transient = input.transient ?? false;
  }
}

export class RateLimitedError extends PipelineError {
  readonly providerId: ProviderId;
  readonly retryAfterMs: number | null;

  constructor(input: { providerId: ProviderId; retryAfterMs: number | null; message?: string }) {
    super({
      message: input.message ?? `${input.providerId} rate limit reached.`,
      stage: "awaiting_completion",
      code: "rate_limited"
    });
    this.name = "RateLimitedError";
    this.providerId = input.providerId;
    this.retryAfterMs = input.retryAfterMs;
  }
}

export class NoJsonFoundError extends PipelineError {
  constructor(message = "Completion does not contain a JSON object.") {
    super({ message, stage: "parsing", code: "no_json_found" });
    this.name = "NoJsonFoundError";
  }
}

export class MalformedJsonError extends PipelineError {
  readonly candidate: string;

  constructor(input: { detail: string; candidate: string }) {
    super({
      message: `Completion JSON could not be decoded after repair: ${input.detail}`,
      stage: "parsing",
      code: "malformed_json"
    });
    this.name = "MalformedJsonError";
    this.candidate = input.candidate;
  }
}

export class ValidationFailure extends PipelineError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super({
      message: `Configuration failed validation with ${issues.length} issue(s): ${issues
        .slice(0, 3)
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join(" ")}`,
      stage: "parsing",
      code: "validation_failed"
    });
    this.name = "ValidationFailure";
    this.issues = issues;
  }
}

export class UnsupportedFrameworkError extends PipelineError {
  readonly framework: string;

  constructor(framework: string, stage: PipelineStage = "building") {
    super({ message: `Unsupported target framework "${framework}".`, stage, code: "unsupported_framework" });
    this.name = "UnsupportedFrameworkError";
    this.framework = framework;
  }
}

export function isCorrectableFailure(error: unknown): error is NoJsonFoundError | MalformedJsonError | ValidationFailure {
  return error instanceof NoJsonFoundError || error instanceof MalformedJsonError || error instanceof ValidationFailure;
}
