import { nanoid } from "nanoid";
import { createAbortError, waitWithAbort } from "../abort.js";
import { resolveBackoffDelayMs } from "../providers/retryPolicy.js";
import { resolveRenderer } from "../renderers/index.js";
import type {
  Configuration,
  ConfigurationDraft,
  OutputFormat,
  ProcessDecision,
  TargetFramework
} from "../types/contracts.js";
import { isTargetFramework } from "../types/contracts.js";
import type { GenerationDependencies, GenerationRequest, GenerationResult } from "./contracts.js";
import {
  PipelineError,
  RateLimitedError,
  UnsupportedFrameworkError,
  ValidationFailure,
  isCorrectableFailure
} from "./errors.js";
import type { PipelineState } from "./errors.js";
import { parseConfigurationDraft } from "./parser.js";
import { finalizeConfiguration, selectProcessType } from "./processSelector.js";
import { buildCorrectivePrompt, buildGenerationPrompt } from "./prompts/builder.js";
import { validateConfigurationDraft } from "./validation.js";
import { alignTasksToWorkflowSteps, cleanWorkflowSteps } from "./workflowSteps.js";

const DEFAULT_MAX_ATTEMPTS = 2;
const DEFAULT_MAX_RATE_LIMIT_RETRIES = 3;

interface RunState {
  states: PipelineState[];
  attempts: number;
  notes: string[];
}

function resolveFramework(framework: string): TargetFramework {
  const normalized = framework.trim().toLowerCase();
  if (!isTargetFramework(normalized)) {
    throw new UnsupportedFrameworkError(framework);
  }
  return normalized;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError("Generation aborted.");
  }
}

function parseAndAlign(
  completion: string,
  framework: TargetFramework,
  workflowSteps: readonly string[]
): ConfigurationDraft {
  const draft = parseConfigurationDraft(completion, framework);
  if (framework !== "crewai-flow" || workflowSteps.length === 0) {
    return draft;
  }

  const aligned = alignTasksToWorkflowSteps(draft, workflowSteps);
  const issues = validateConfigurationDraft(aligned);
  if (issues.length > 0) {
    throw new ValidationFailure(issues);
  }
  return aligned;
}

interface AcceptedDraft {
  configuration: Configuration;
  decision: ProcessDecision;
}

/**
 * Runs one request through prompt construction, completion, parsing, process
 * selection and rendering. Resolves only with a fully rendered result; any
 * failure rejects with the typed error of the stage that produced it.
 */
export async function generate(request: GenerationRequest, deps: GenerationDependencies): Promise<GenerationResult> {
  const requestId = deps.createRequestId?.() ?? nanoid();
  const maxAttempts = Math.max(1, deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const maxRateLimitRetries = Math.max(0, deps.maxRateLimitRetries ?? DEFAULT_MAX_RATE_LIMIT_RETRIES);
  const outputFormat: OutputFormat = request.outputFormat ?? "code";
  const run: RunState = { states: [], attempts: 0, notes: [] };

  const transition = (state: PipelineState, detail?: string): void => {
    run.states.push(state);
    deps.onStateChange?.({ state, attempt: run.attempts, detail });
    deps.log?.(`state=${state}${detail ? ` (${detail})` : ""}`);
  };

  const explicitChoice = request.processType && request.processType !== "auto" ? request.processType : undefined;
  const decide = (draft: ConfigurationDraft): ProcessDecision => {
    if (explicitChoice) {
      return selectProcessType(draft, explicitChoice);
    }
    transition("selecting");
    return selectProcessType(draft, undefined, request.prompt);
  };

  try {
    transition("building");
    throwIfAborted(deps.signal);
    const framework = resolveFramework(request.framework);
    const completionClient = deps.resolveClient(request.provider);
    const workflowSteps = framework === "crewai-flow" ? cleanWorkflowSteps(request.workflowSteps ?? []) : [];
    const basePrompt = buildGenerationPrompt({
      requestText: request.prompt,
      targetFramework: framework,
      processHint: request.processType,
      workflowSteps
    });

    let prompt = basePrompt;
    let rateLimitWaits = 0;
    let accepted: AcceptedDraft | null = null;

    while (accepted === null) {
      throwIfAborted(deps.signal);
      run.attempts += 1;
      transition("awaiting_completion", `attempt ${run.attempts}/${maxAttempts}`);

      let completion: string;
      try {
        completion = await completionClient.complete(prompt, {
          model: request.model,
          temperature: request.temperature,
          maxTokens: request.maxTokens,
          timeoutMs: deps.completionTimeoutMs,
          signal: deps.signal,
          log: deps.log
        });
      } catch (error) {
        if (!(error instanceof RateLimitedError) || rateLimitWaits >= maxRateLimitRetries) {
          throw error;
        }

        rateLimitWaits += 1;
        run.attempts -= 1;
        const delayMs = resolveBackoffDelayMs(rateLimitWaits, error.retryAfterMs, deps.random);
        deps.log?.(`Rate limited; retry ${rateLimitWaits}/${maxRateLimitRetries} in ${delayMs}ms.`);
        run.notes.push(`Waited ${delayMs}ms after a rate limit response.`);
        await waitWithAbort(delayMs, deps.signal, "Generation aborted.");
        continue;
      }

      transition("parsing");
      try {
        const draft = parseAndAlign(completion, framework, workflowSteps);
        const decision = decide(draft);
        accepted = { configuration: finalizeConfiguration(draft, decision), decision };
      } catch (error) {
        if (!isCorrectableFailure(error) || run.attempts >= maxAttempts) {
          throw error;
        }

        deps.log?.(`Attempt ${run.attempts} rejected (${error.code}); re-prompting with corrective guidance.`);
        run.notes.push(`Attempt ${run.attempts} was rejected (${error.code}) and re-prompted.`);
        prompt = buildCorrectivePrompt(basePrompt, error, completion);
      }
    }

    const { configuration, decision } = accepted;
    if (workflowSteps.length > 0) {
      run.notes.push(`Aligned tasks to ${workflowSteps.length} workflow step(s).`);
    }
    run.notes.push(decision.rationale);

    transition("rendering");
    const code = resolveRenderer(configuration.targetFramework)(configuration);

    transition("done");
    return {
      requestId,
      framework,
      processType: configuration.processType,
      processDecision: decision,
      outputFormat,
      ...(outputFormat === "json" ? {} : { code }),
      ...(outputFormat === "code" ? {} : { configuration }),
      attempts: run.attempts,
      states: [...run.states],
      notes: [...run.notes]
    };
  } catch (error) {
    transition("failed", error instanceof PipelineError ? error.code : error instanceof Error ? error.name : undefined);
    throw error;
  }
}

function commentBlock(text: string): string[] {
  return text.split("\n").map((line) => (line.length > 0 ? `# ${line}` : "#"));
}

/**
 * The single document a caller writes out: the code, the configuration JSON,
 * or the configuration as a leading comment block followed by the code.
 */
export function formatArtifact(result: GenerationResult): string {
  const configurationJson = result.configuration ? JSON.stringify(result.configuration, null, 2) : "";
  const code = result.code ?? "";

  switch (result.outputFormat) {
    case "code":
      return code;
    case "json":
      return `${configurationJson}\n`;
    case "both":
      return [
        "# Configuration:",
        ...commentBlock(configurationJson),
        "",
        "# Generated code:",
        code
      ].join("\n");
  }
}
