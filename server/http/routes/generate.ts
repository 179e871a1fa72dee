import type { Express, Request, Response } from "express";
import { nanoid } from "nanoid";
import { z } from "zod";
import { formatArtifact, generate } from "../../generator/pipeline.js";
import type { CompletionClient } from "../../providers/types.js";
import type { GenerationDefaults } from "../../runtime/config.js";
import { PROVIDER_IDS } from "../../types/contracts.js";
import { sendPipelineError } from "./helpers.js";

export interface GenerateRouteDependencies {
  defaults: GenerationDefaults;
  resolveClient: (providerId: string) => CompletionClient;
  log?: (requestId: string, message: string) => void;
}

export const generateRequestSchema = z.object({
  prompt: z.string().trim().min(1).max(20_000),
  framework: z.string().trim().min(1).max(64),
  provider: z.enum(PROVIDER_IDS).optional(),
  processType: z.enum(["sequential", "hierarchical", "auto"]).optional(),
  outputFormat: z.enum(["code", "json", "both"]).default("code"),
  model: z.string().trim().min(1).max(200).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().min(16).max(32_000).optional(),
  workflowSteps: z.array(z.string().max(200)).max(50).optional()
});

function defaultLog(requestId: string, message: string): void {
  console.log(`[generate:${requestId}] ${message}`);
}

export function registerGenerateRoutes(app: Express, deps: GenerateRouteDependencies): void {
  app.post("/api/generate", async (request: Request, response: Response) => {
    const parsed = generateRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      response.status(400).json({
        error: "Validation failed",
        details: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
      });
      return;
    }

    const body = parsed.data;
    const requestId = nanoid();
    const log = deps.log ?? defaultLog;
    const providerId = body.provider ?? deps.defaults.provider;

    try {
      const result = await generate(
        {
          prompt: body.prompt,
          framework: body.framework,
          provider: providerId,
          processType: body.processType,
          outputFormat: body.outputFormat,
          model: body.model,
          temperature: body.temperature ?? deps.defaults.temperature,
          maxTokens: body.maxTokens ?? deps.defaults.maxTokens,
          workflowSteps: body.workflowSteps
        },
        {
          resolveClient: deps.resolveClient,
          maxAttempts: deps.defaults.maxAttempts,
          maxRateLimitRetries: deps.defaults.maxRateLimitRetries,
          completionTimeoutMs: deps.defaults.completionTimeoutMs,
          createRequestId: () => requestId,
          log: (message) => log(requestId, message)
        }
      );

      response.json({ ...result, artifact: formatArtifact(result) });
    } catch (error) {
      sendPipelineError(error, response);
    }
  });
}
