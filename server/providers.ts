import { createAbortError, isAbortError, mergeAbortSignals, waitWithAbort } from "./abort.js";
import { PipelineError, ProviderError } from "./generator/errors.js";
import {
  createWatsonxRunner,
  executeClaudeMessages,
  executeOllamaGenerate,
  executeOpenAIChat
} from "./providers/clientFactory/apiRunner.js";
import { isTransientProviderError, resolveBackoffDelayMs } from "./providers/retryPolicy.js";
import type { CompletionClient, CompletionOptions, ProviderRequestInput } from "./providers/types.js";
import { isProviderId } from "./types/contracts.js";
import type { ProviderId, ProviderSettings } from "./types/contracts.js";

export type { CompletionClient, CompletionOptions } from "./providers/types.js";

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 4_000;
const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_TRANSIENT_RETRIES = 2;

type ProviderRunner = (input: ProviderRequestInput) => Promise<string>;

export interface CompletionClientOptions {
  /** Retries for network failures and 408/5xx responses; rate limits are left to the caller. */
  maxRetries?: number;
  random?: () => number;
}

function createRunner(providerId: ProviderId): ProviderRunner {
  switch (providerId) {
    case "openai":
      return executeOpenAIChat;
    case "claude":
      return executeClaudeMessages;
    case "watsonx":
      return createWatsonxRunner();
    case "ollama":
      return executeOllamaGenerate;
  }
}

/**
 * Returns a human-readable reason the provider cannot be called, or null when
 * its settings are complete.
 */
export function describeMissingProviderSettings(settings: ProviderSettings): string | null {
  if (settings.id !== "ollama" && settings.apiKey.trim().length === 0) {
    return `${settings.id} is not configured: an API key is required.`;
  }

  if (settings.id === "watsonx" && (settings.projectId ?? "").trim().length === 0) {
    return "watsonx is not configured: WATSONX_PROJECT_ID is required.";
  }

  return null;
}

function wrapTransportError(providerId: ProviderId, error: unknown): unknown {
  if (error instanceof PipelineError || isAbortError(error)) {
    return error;
  }

  // fetch rejects with a TypeError on DNS failures, refused connections and resets.
  if (error instanceof TypeError) {
    return new ProviderError({
      providerId,
      transient: true,
      message: `${providerId} request failed: ${error.message}`,
      cause: error
    });
  }

  return new ProviderError({
    providerId,
    message: error instanceof Error ? error.message : `${providerId} request failed.`,
    cause: error
  });
}

async function runWithTimeout(
  runner: ProviderRunner,
  input: Omit<ProviderRequestInput, "signal">,
  timeoutMs: number,
  callerSignal?: AbortSignal
): Promise<string> {
  const timeoutController = new AbortController();
  const timer = setTimeout(() => {
    timeoutController.abort(createAbortError(`${input.settings.id} completion timed out.`));
  }, timeoutMs);
  const signal = mergeAbortSignals([callerSignal, timeoutController.signal]) ?? timeoutController.signal;

  try {
    return await runner({ ...input, signal });
  } catch (error) {
    if (callerSignal?.aborted) {
      throw createAbortError("Completion request aborted.");
    }

    if (timeoutController.signal.aborted) {
      throw new ProviderError({
        providerId: input.settings.id,
        message: `${input.settings.id} completion timed out after ${timeoutMs}ms.`,
        cause: error
      });
    }

    throw wrapTransportError(input.settings.id, error);
  } finally {
    clearTimeout(timer);
  }
}

export function createCompletionClient(
  settings: ProviderSettings,
  clientOptions: CompletionClientOptions = {}
): CompletionClient {
  const missing = describeMissingProviderSettings(settings);
  if (missing) {
    throw new ProviderError({ providerId: settings.id, message: missing });
  }

  const runner = createRunner(settings.id);
  const maxRetries = Math.max(0, clientOptions.maxRetries ?? DEFAULT_MAX_TRANSIENT_RETRIES);
  const random = clientOptions.random ?? Math.random;

  return {
    providerId: settings.id,
    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
      const request = {
        settings,
        prompt,
        model: options.model?.trim() || settings.defaultModel,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        log: options.log
      };
      const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
      let retriesUsed = 0;

      while (true) {
        try {
          return await runWithTimeout(runner, request, timeoutMs, options.signal);
        } catch (error) {
          if (!isTransientProviderError(error) || retriesUsed >= maxRetries) {
            throw error;
          }

          retriesUsed += 1;
          const delayMs = resolveBackoffDelayMs(retriesUsed, null, random);
          const reason = error instanceof ProviderError && error.statusCode !== null ? `status=${error.statusCode}` : "network";
          options.log?.(`Provider retry ${retriesUsed}/${maxRetries} scheduled in ${delayMs}ms (${reason}).`);
          await waitWithAbort(delayMs, options.signal, "Provider retry aborted.");
        }
      }
    }
  };
}

/**
 * Resolves a provider by id against the configured settings table.
 */
export function resolveCompletionClient(
  providerId: string,
  providers: Record<ProviderId, ProviderSettings>,
  clientOptions?: CompletionClientOptions
): CompletionClient {
  const normalized = providerId.trim().toLowerCase();
  if (!isProviderId(normalized)) {
    throw new ProviderError({
      providerId,
      message: `Unknown provider "${providerId}". Expected one of openai, claude, watsonx, ollama.`
    });
  }

  return createCompletionClient(providers[normalized], clientOptions);
}
