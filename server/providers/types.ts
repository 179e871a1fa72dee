import type { ProviderId, ProviderSettings } from "../types/contracts.js";

export interface CompletionOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  log?: (message: string) => void;
}

/**
 * The single capability the pipeline needs from a language model: prompt in,
 * completion text out. Failures surface as ProviderError, RateLimitedError or
 * an AbortError.
 */
export interface CompletionClient {
  readonly providerId: ProviderId;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface ProviderRequestInput {
  settings: ProviderSettings;
  prompt: string;
  model: string;
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
  log?: (message: string) => void;
}
