import type { CompletionClient } from "../providers/types.js";
import type {
  Configuration,
  OutputFormat,
  ProcessChoice,
  ProcessDecision,
  ProcessType,
  TargetFramework
} from "../types/contracts.js";
import type { PipelineState } from "./errors.js";

export interface GenerationRequest {
  prompt: string;
  /** Checked against the renderer table; unknown values fail before any completion. */
  framework: string;
  /** Resolved through `GenerationDependencies.resolveClient` while building. */
  provider: string;
  processType?: ProcessChoice;
  outputFormat?: OutputFormat;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  workflowSteps?: string[];
}

export interface GenerationStateChange {
  state: PipelineState;
  attempt: number;
  detail?: string;
}

export interface GenerationDependencies {
  /** Throws a ProviderError for an unknown or unconfigured provider. */
  resolveClient: (providerId: string) => CompletionClient;
  /** Completions per request, corrective re-prompts included. */
  maxAttempts?: number;
  maxRateLimitRetries?: number;
  completionTimeoutMs?: number;
  signal?: AbortSignal;
  onStateChange?: (change: GenerationStateChange) => void;
  log?: (message: string) => void;
  random?: () => number;
  createRequestId?: () => string;
}

export interface GenerationResult {
  requestId: string;
  framework: TargetFramework;
  processType: ProcessType;
  processDecision: ProcessDecision;
  outputFormat: OutputFormat;
  code?: string;
  configuration?: Configuration;
  attempts: number;
  states: PipelineState[];
  notes: string[];
}
